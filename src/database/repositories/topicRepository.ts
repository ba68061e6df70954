import { pool, toVectorLiteral } from '~/config/database'
import type { Queryable } from '../types'
import type { KBTopic, TopicDistance, TopicMessageLink, UpsertKBTopic } from '../schemas/kbTopic'
import type { Message } from '../schemas/message'

type TopicRow = KBTopic & { distance: number }
type LinkedMessageRow = Message & { link_topic_id: string }

export interface LinkedMessage {
    topicId: string
    message: Message
}

const TOPIC_COLUMNS = 'id, group_id, start_time, speakers, subject, summary, created_at'

export class TopicRepository {
    constructor(private readonly db: Queryable = pool) {}

    withClient(client: Queryable): TopicRepository {
        return new TopicRepository(client)
    }

    /**
     * Insert or replace a topic by id
     */
    async upsert(topic: UpsertKBTopic): Promise<void> {
        await this.db.query(
            `INSERT INTO kb_topics (id, group_id, start_time, speakers, subject, summary, embedding)
            VALUES ($1, $2, $3, $4, $5, $6, $7::vector)
            ON CONFLICT (id) DO UPDATE SET
                speakers = EXCLUDED.speakers,
                subject = EXCLUDED.subject,
                summary = EXCLUDED.summary,
                embedding = EXCLUDED.embedding,
                updated_at = NOW()`,
            [
                topic.id,
                topic.group_id,
                topic.start_time,
                topic.speakers,
                topic.subject,
                topic.summary,
                toVectorLiteral(topic.embedding),
            ]
        )
    }

    /**
     * Link messages to a topic; existing links are kept
     */
    async linkMessages(topicId: string, messageIds: string[]): Promise<void> {
        if (messageIds.length === 0) {
            return
        }

        await this.db.query(
            `INSERT INTO kb_topic_messages (kb_topic_id, message_id)
            SELECT $1, unnest($2::text[])
            ON CONFLICT DO NOTHING`,
            [topicId, messageIds]
        )
    }

    async getByIds(ids: string[]): Promise<KBTopic[]> {
        if (ids.length === 0) {
            return []
        }

        const result = await this.db.query<KBTopic>(
            `SELECT ${TOPIC_COLUMNS} FROM kb_topics WHERE id = ANY($1::text[])`,
            [ids]
        )
        return result.rows
    }

    /**
     * Nearest topics by cosine distance. A null scope searches every group.
     */
    async vectorSearch(embedding: number[], groupIds: string[] | null, limit: number): Promise<TopicDistance[]> {
        const params: unknown[] = [toVectorLiteral(embedding)]
        let sql = `SELECT ${TOPIC_COLUMNS}, embedding <=> $1::vector AS distance FROM kb_topics`

        if (groupIds) {
            params.push(groupIds)
            sql += ` WHERE group_id = ANY($${params.length}::text[])`
        }

        params.push(limit)
        sql += ` ORDER BY embedding <=> $1::vector LIMIT $${params.length}`

        const result = await this.db.query<TopicRow>(sql, params)
        return result.rows.map(({ distance, ...topic }) => ({ topic, distance: Number(distance) }))
    }

    /**
     * Topic links of the given messages
     */
    async getTopicIdsForMessages(messageIds: string[]): Promise<TopicMessageLink[]> {
        if (messageIds.length === 0) {
            return []
        }

        const result = await this.db.query<TopicMessageLink>(
            'SELECT kb_topic_id, message_id FROM kb_topic_messages WHERE message_id = ANY($1::text[])',
            [messageIds]
        )
        return result.rows
    }

    /**
     * Up to `perTopic` linked messages of each topic, oldest first
     */
    async getMessagesForTopics(topicIds: string[], perTopic: number): Promise<LinkedMessage[]> {
        if (topicIds.length === 0) {
            return []
        }

        const result = await this.db.query<LinkedMessageRow>(
            `SELECT * FROM (
                SELECT ktm.kb_topic_id AS link_topic_id, m.*,
                    ROW_NUMBER() OVER (PARTITION BY ktm.kb_topic_id ORDER BY m.timestamp ASC) AS position
                FROM kb_topic_messages ktm
                JOIN messages m ON m.message_id = ktm.message_id
                WHERE ktm.kb_topic_id = ANY($1::text[])
            ) ranked
            WHERE position <= $2
            ORDER BY link_topic_id, timestamp ASC`,
            [topicIds, perTopic]
        )

        return result.rows.map((row) => ({
            topicId: row.link_topic_id,
            message: {
                message_id: row.message_id,
                chat_id: row.chat_id,
                sender_id: row.sender_id,
                group_id: row.group_id,
                timestamp: row.timestamp,
                text: row.text,
                media_url: row.media_url,
                reply_to_id: row.reply_to_id,
                kb_topic_id: row.kb_topic_id,
            },
        }))
    }
}

export const topicRepository = new TopicRepository()
