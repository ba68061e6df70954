/**
 * Pool settings and pgvector conversions
 */

import { describe, it, expect } from 'vitest'
import { types } from 'pg'
import {
    buildPoolConfig,
    parseVector,
    registerVectorParser,
    toVectorLiteral,
} from '~/config/database'

describe('buildPoolConfig', () => {
    it('carries the pool size and statement timeout', () => {
        const config = buildPoolConfig({
            POSTGRES_DB_HOST: 'db.internal',
            POSTGRES_DB_USER: 'bot',
            POSTGRES_DB_NAME: 'knowledge',
            POSTGRES_DB_PASSWORD: 'test-secret',
            POSTGRES_DB_PORT: 6543,
            POSTGRES_POOL_MAX: 4,
            POSTGRES_STATEMENT_TIMEOUT_MS: 15000,
        })

        expect(config).toEqual({
            host: 'db.internal',
            user: 'bot',
            database: 'knowledge',
            password: 'test-secret',
            port: 6543,
            max: 4,
            statement_timeout: 15000,
            application_name: 'chat-knowledge-bot',
        })
    })
})

describe('vector conversions', () => {
    it('writes the pgvector text form', () => {
        expect(toVectorLiteral([0.5, -1, 2])).toBe('[0.5,-1,2]')
    })

    it('reads the pgvector text form', () => {
        expect(parseVector('[0.5,-1,2]')).toEqual([0.5, -1, 2])
        expect(parseVector('[]')).toEqual([])
    })

    it('installs the vector parser for the given type oid', () => {
        registerVectorParser(990001)

        expect(types.getTypeParser(990001, 'text')('[1,2,3]')).toEqual([1, 2, 3])
    })
})
