import { Pool, types, type PoolConfig } from 'pg'
import { env, type Env } from './env'
import { loggers } from '~/core/utils/logger'
import type { Queryable } from '~/database/types'

type DatabaseSettings = Pick<
    Env,
    | 'POSTGRES_DB_HOST'
    | 'POSTGRES_DB_USER'
    | 'POSTGRES_DB_NAME'
    | 'POSTGRES_DB_PASSWORD'
    | 'POSTGRES_DB_PORT'
    | 'POSTGRES_POOL_MAX'
    | 'POSTGRES_STATEMENT_TIMEOUT_MS'
>

export function buildPoolConfig(settings: DatabaseSettings): PoolConfig {
    return {
        host: settings.POSTGRES_DB_HOST,
        user: settings.POSTGRES_DB_USER,
        database: settings.POSTGRES_DB_NAME,
        password: settings.POSTGRES_DB_PASSWORD,
        port: settings.POSTGRES_DB_PORT,
        max: settings.POSTGRES_POOL_MAX,
        // Applies to every pooled client; transactions may lower it with SET LOCAL
        statement_timeout: settings.POSTGRES_STATEMENT_TIMEOUT_MS,
        application_name: 'chat-knowledge-bot',
    }
}

export const pool = new Pool(buildPoolConfig(env))

pool.on('error', (err) => {
    loggers.database.fatal({ err }, 'Unexpected error on idle client')
    process.exit(-1)
})

/**
 * pgvector text form, e.g. `[0.1,0.2]`
 */
export function toVectorLiteral(values: number[]): string {
    return `[${values.join(',')}]`
}

export function parseVector(text: string): number[] {
    const body = text.trim().slice(1, -1)
    return body ? body.split(',').map(Number) : []
}

export function registerVectorParser(oid: number): void {
    types.setTypeParser(oid, parseVector)
}

/**
 * Teach the driver to read `vector` columns as number arrays. The type's oid is
 * assigned when the extension is created, so this runs after migrations.
 * @returns false when the extension is not installed
 */
export async function registerVectorType(db: Queryable = pool): Promise<boolean> {
    const result = await db.query<{ oid: number }>(`SELECT oid FROM pg_type WHERE typname = 'vector'`)
    const oid = result.rows[0]?.oid

    if (oid === undefined) {
        loggers.database.warn('pgvector extension is not installed')
        return false
    }

    registerVectorParser(Number(oid))
    loggers.database.debug({ oid }, 'Registered vector type parser')
    return true
}

/**
 * Check connectivity and report the server and pool settings in use
 */
export async function testConnection(): Promise<boolean> {
    try {
        const result = await pool.query<{ version: string }>('SELECT version() AS version')
        loggers.database.info(
            {
                server: result.rows[0]?.version,
                maxConnections: env.POSTGRES_POOL_MAX,
                statementTimeoutMs: env.POSTGRES_STATEMENT_TIMEOUT_MS,
            },
            'Database connection successful'
        )
        return true
    } catch (error) {
        loggers.database.error({ err: error }, 'Database connection failed')
        return false
    }
}

export async function closeConnection(): Promise<void> {
    await pool.end()
    loggers.database.info('Database connection closed')
}
