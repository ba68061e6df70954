/**
 * Transaction Manager
 *
 * Runs a callback inside BEGIN/COMMIT on a dedicated client, rolling back on
 * failure and retrying serialization failures and deadlocks.
 *
 * @example
 * ```typescript
 * await transactionManager.withTransaction(async (client) => {
 *     await topicRepository.withClient(client).upsert(topic)
 *     await messageRepository.withClient(client).linkToTopic(ids, topic.id)
 * })
 * ```
 */

import type { Pool, PoolClient } from 'pg'
import { pool } from '~/config/database'
import { env } from '~/config/env'
import { createFlowLogger } from '~/core/utils/logger'
import { hasProperty } from '~/core/utils/guards'

const txLogger = createFlowLogger('transaction-manager')

const RETRYABLE_CODES = new Set(['40001', '40P01']) // serialization_failure, deadlock_detected

export interface TransactionOptions {
    isolationLevel?: 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE'
    /** Statement timeout in milliseconds */
    timeout?: number
    maxRetries?: number
}

export type TransactionCallback<T> = (client: PoolClient) => Promise<T>

/**
 * Anything able to wrap a callback in a transaction
 */
export interface TransactionRunner {
    withTransaction<T>(callback: TransactionCallback<T>, options?: TransactionOptions): Promise<T>
}

export class TransactionManager implements TransactionRunner {
    constructor(private readonly db: Pool = pool) {}

    async withTransaction<T>(callback: TransactionCallback<T>, options: TransactionOptions = {}): Promise<T> {
        const { isolationLevel = 'READ COMMITTED', timeout = env.POSTGRES_STATEMENT_TIMEOUT_MS, maxRetries = 3 } = options

        let attempt = 0

        while (true) {
            attempt++
            const client = await this.db.connect()

            try {
                await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`)
                await client.query(`SET LOCAL statement_timeout = ${Math.floor(timeout)}`)

                txLogger.debug({ isolationLevel, attempt }, 'Transaction started')

                const result = await callback(client)
                await client.query('COMMIT')

                txLogger.debug({ attempt }, 'Transaction committed')
                return result
            } catch (error) {
                try {
                    await client.query('ROLLBACK')
                } catch (rollbackError) {
                    txLogger.error({ err: rollbackError }, 'Failed to rollback transaction')
                }

                const retriable =
                    hasProperty(error, 'code') && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code)

                if (retriable && attempt < maxRetries) {
                    txLogger.warn({ err: error, attempt, maxRetries }, 'Transaction failed, retrying')
                    await new Promise((resolve) => setTimeout(resolve, Math.pow(2, attempt) * 100))
                    continue
                }

                txLogger.error({ err: error, attempt }, 'Transaction failed')
                throw error
            } finally {
                client.release()
            }
        }
    }
}

export const transactionManager = new TransactionManager()
