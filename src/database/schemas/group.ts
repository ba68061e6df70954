export interface Group {
    group_id: string
    group_name: string | null
    /** Group description as set in the chat */
    group_topic: string | null
    owner_id: string | null
    /** The bot only responds in managed groups */
    managed: boolean
    notify_on_spam: boolean
    /** Message count that triggers an automatic summary; null disables it */
    auto_summary_threshold: number | null
    last_ingest: Date
    last_summary_sync: Date
    community_keys: string[]
    created_at?: Date
    updated_at?: Date
}

export interface UpsertGroup {
    group_id: string
    group_name?: string | null
    group_topic?: string | null
    owner_id?: string | null
    managed?: boolean
    notify_on_spam?: boolean
    auto_summary_threshold?: number | null
    community_keys?: string[]
}
