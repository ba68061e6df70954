export interface Sender {
    sender_id: string
    push_name: string | null
    created_at?: Date
    updated_at?: Date
}
