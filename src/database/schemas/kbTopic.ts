/**
 * Knowledge base topic: one synthesized summary of a conversation chunk
 */
export interface KBTopic {
    /** sha256 of `${group_id}_${start_time ISO}_${subject}` */
    id: string
    group_id: string
    start_time: Date
    /** Comma-joined participant ids referenced by the summary */
    speakers: string
    subject: string
    summary: string
    created_at?: Date
}

export interface UpsertKBTopic extends KBTopic {
    embedding: number[]
}

export interface TopicDistance {
    topic: KBTopic
    /** Cosine distance, lower is closer */
    distance: number
}

export interface TopicMessageLink {
    kb_topic_id: string
    message_id: string
}
