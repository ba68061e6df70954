import { pool } from '~/config/database'
import type { Queryable } from '../types'

export class OptOutRepository {
    constructor(private readonly db: Queryable = pool) {}

    async isOptedOut(senderId: string): Promise<boolean> {
        const result = await this.db.query('SELECT 1 FROM opt_outs WHERE sender_id = $1', [senderId])
        return result.rows.length > 0
    }

    /**
     * @returns false when the sender was already opted out
     */
    async create(senderId: string): Promise<boolean> {
        const result = await this.db.query(
            'INSERT INTO opt_outs (sender_id) VALUES ($1) ON CONFLICT (sender_id) DO NOTHING',
            [senderId]
        )
        return (result.rowCount ?? 0) > 0
    }

    /**
     * @returns false when there was nothing to delete
     */
    async delete(senderId: string): Promise<boolean> {
        const result = await this.db.query('DELETE FROM opt_outs WHERE sender_id = $1', [senderId])
        return (result.rowCount ?? 0) > 0
    }

    /**
     * The subset of `senderIds` that opted out
     */
    async filterOptedOut(senderIds: string[]): Promise<string[]> {
        if (senderIds.length === 0) {
            return []
        }

        const result = await this.db.query<{ sender_id: string }>(
            'SELECT sender_id FROM opt_outs WHERE sender_id = ANY($1::text[])',
            [senderIds]
        )
        return result.rows.map((row) => row.sender_id)
    }
}

export const optOutRepository = new OptOutRepository()
