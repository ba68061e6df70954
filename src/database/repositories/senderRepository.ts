import { pool } from '~/config/database'
import type { Queryable } from '../types'
import type { Sender } from '../schemas/sender'

export class SenderRepository {
    constructor(private readonly db: Queryable = pool) {}

    /**
     * Create the sender or refresh its push name; a missing name keeps the stored one
     */
    async upsert(senderId: string, pushName?: string | null): Promise<void> {
        await this.db.query(
            `INSERT INTO senders (sender_id, push_name) VALUES ($1, $2)
            ON CONFLICT (sender_id) DO UPDATE SET
                push_name = COALESCE(EXCLUDED.push_name, senders.push_name),
                updated_at = NOW()`,
            [senderId, pushName ?? null]
        )
    }

    async getByIds(senderIds: string[]): Promise<Sender[]> {
        if (senderIds.length === 0) {
            return []
        }

        const result = await this.db.query<Sender>('SELECT * FROM senders WHERE sender_id = ANY($1::text[])', [
            senderIds,
        ])
        return result.rows
    }
}

export const senderRepository = new SenderRepository()
