/**
 * A stored chat message. Everything but kb_topic_id is immutable once written.
 */
export interface Message {
    message_id: string
    chat_id: string
    sender_id: string
    /** Set when chat_id is a group */
    group_id: string | null
    timestamp: Date
    text: string | null
    media_url: string | null
    reply_to_id: string | null
    /** Topic the message was absorbed into, filled once by ingestion */
    kb_topic_id: string | null
    created_at?: Date
}

export interface CreateMessage {
    message_id: string
    chat_id: string
    sender_id: string
    group_id?: string | null
    timestamp: Date
    text?: string | null
    media_url?: string | null
    reply_to_id?: string | null
}

/**
 * The fields conversation processing reads from a message
 */
export type ConversationMessage = Pick<Message, 'message_id' | 'sender_id' | 'timestamp' | 'text'>

/**
 * A keyword-leg hit with its full-text rank
 */
export interface KeywordMatch {
    message_id: string
    rank: number
}
