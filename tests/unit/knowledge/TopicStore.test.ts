/**
 * Topic store failure classification
 */

import { describe, it, expect } from 'vitest'
import { ServiceError } from '~/core/errors/ServiceError'
import { isRetryableError } from '~/core/utils/retry'
import type { TransactionRunner } from '~/database/transactionManager'
import type { UpsertKBTopic } from '~/database/schemas/kbTopic'
import { TopicStore } from '~/features/knowledge/services/TopicStore'
import { GROUP_ID, BASE_TIME } from '../../utils/factories'

const topic: UpsertKBTopic = {
    id: 'topic-1',
    group_id: GROUP_ID,
    start_time: BASE_TIME,
    speakers: '@972501111111',
    subject: 'Release plan',
    summary: 'Shipping on Friday',
    embedding: [0.1, 0.2],
}

function failingTransactions(failure: Error): TransactionRunner {
    return {
        withTransaction: async <T>(): Promise<T> => {
            throw failure
        },
    }
}

async function saveError(failure: Error): Promise<unknown> {
    const store = new TopicStore(failingTransactions(failure))
    return store.saveTopic(topic, ['m1']).then(
        () => null,
        (error: unknown) => error
    )
}

describe('TopicStore', () => {
    it('flags a dropped connection as retryable', async () => {
        const error = await saveError(Object.assign(new Error('terminating connection'), { code: '57P01' }))

        expect(error).toBeInstanceOf(ServiceError)
        expect(error).toMatchObject({ serviceName: 'TopicStore', code: 'STORE_UNAVAILABLE', retryable: true })
        expect(isRetryableError(error)).toBe(true)
    })

    it('flags a deadlock that outlived the transaction retries as retryable', async () => {
        const error = await saveError(Object.assign(new Error('deadlock detected'), { code: '40P01' }))

        expect(isRetryableError(error)).toBe(true)
    })

    it('treats constraint violations as fatal', async () => {
        const failure = Object.assign(new Error('violates foreign key constraint'), { code: '23503' })

        const error = await saveError(failure)

        expect(error).toMatchObject({
            code: 'STORE_FAILED',
            message: 'Failed to store topic topic-1',
            retryable: false,
            cause: failure,
        })
        expect(isRetryableError(error)).toBe(false)
    })
})
