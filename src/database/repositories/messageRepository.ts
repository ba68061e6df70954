import { pool } from '~/config/database'
import type { Queryable } from '../types'
import type { CreateMessage, KeywordMatch, Message } from '../schemas/message'

export class MessageRepository {
    constructor(private readonly db: Queryable = pool) {}

    /**
     * Same repository bound to another connection (a transaction client)
     */
    withClient(client: Queryable): MessageRepository {
        return new MessageRepository(client)
    }

    /**
     * Insert a message; a repeated message id is ignored
     * @returns true if a new row was written
     */
    async create(data: CreateMessage): Promise<boolean> {
        const result = await this.db.query(
            `INSERT INTO messages (
                message_id, chat_id, sender_id, group_id, timestamp, text, media_url, reply_to_id
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
            ON CONFLICT (message_id) DO NOTHING`,
            [
                data.message_id,
                data.chat_id,
                data.sender_id,
                data.group_id ?? null,
                data.timestamp,
                data.text ?? null,
                data.media_url ?? null,
                data.reply_to_id ?? null,
            ]
        )
        return (result.rowCount ?? 0) > 0
    }

    /**
     * Group messages at or after `since`, oldest first, without the excluded sender's
     */
    async getGroupMessagesSince(groupId: string, since: Date, excludeSenderId: string): Promise<Message[]> {
        const result = await this.db.query<Message>(
            `SELECT * FROM messages
            WHERE group_id = $1 AND timestamp >= $2 AND sender_id <> $3
            ORDER BY timestamp ASC`,
            [groupId, since, excludeSenderId]
        )
        return result.rows
    }

    /**
     * Live count of group messages strictly after `since`
     */
    async countGroupMessagesAfter(groupId: string, since: Date, excludeSenderId: string): Promise<number> {
        const result = await this.db.query<{ count: number }>(
            `SELECT COUNT(*)::int AS count FROM messages
            WHERE group_id = $1 AND timestamp > $2 AND sender_id <> $3`,
            [groupId, since, excludeSenderId]
        )
        return result.rows[0]?.count ?? 0
    }

    /**
     * Group messages strictly after `since`, oldest first
     */
    async getGroupMessagesAfter(groupId: string, since: Date, excludeSenderId: string): Promise<Message[]> {
        const result = await this.db.query<Message>(
            `SELECT * FROM messages
            WHERE group_id = $1 AND timestamp > $2 AND sender_id <> $3
            ORDER BY timestamp ASC`,
            [groupId, since, excludeSenderId]
        )
        return result.rows
    }

    async getChatMessagesSince(chatId: string, since: Date): Promise<Message[]> {
        const result = await this.db.query<Message>(
            'SELECT * FROM messages WHERE chat_id = $1 AND timestamp >= $2 ORDER BY timestamp ASC',
            [chatId, since]
        )
        return result.rows
    }

    /**
     * Last `limit` messages of a chat, oldest first
     */
    async getRecentByChat(chatId: string, limit: number): Promise<Message[]> {
        const result = await this.db.query<Message>(
            'SELECT * FROM messages WHERE chat_id = $1 ORDER BY timestamp DESC LIMIT $2',
            [chatId, limit]
        )
        return result.rows.reverse()
    }

    /**
     * Fill the topic link of messages that have none yet
     */
    async linkToTopic(messageIds: string[], topicId: string): Promise<number> {
        if (messageIds.length === 0) {
            return 0
        }

        const result = await this.db.query(
            `UPDATE messages SET kb_topic_id = $1
            WHERE message_id = ANY($2::text[]) AND kb_topic_id IS NULL`,
            [topicId, messageIds]
        )
        return result.rowCount ?? 0
    }

    /**
     * Full-text match over message text, best rank first.
     * A null scope searches every chat.
     */
    async keywordSearch(query: string, groupIds: string[] | null, limit: number = 20): Promise<KeywordMatch[]> {
        const params: unknown[] = [query]
        let sql = `
            SELECT message_id,
                ts_rank(to_tsvector('simple', COALESCE(text, '')), plainto_tsquery('simple', $1)) AS rank
            FROM messages
            WHERE text IS NOT NULL
                AND to_tsvector('simple', COALESCE(text, '')) @@ plainto_tsquery('simple', $1)
        `

        if (groupIds) {
            params.push(groupIds)
            sql += ` AND group_id = ANY($${params.length}::text[])`
        }

        params.push(limit)
        sql += ` ORDER BY rank DESC LIMIT $${params.length}`

        const result = await this.db.query<KeywordMatch>(sql, params)
        return result.rows
    }
}

export const messageRepository = new MessageRepository()
