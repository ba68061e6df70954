import { pool } from '~/config/database'
import type { Queryable } from '../types'
import type { Group, UpsertGroup } from '../schemas/group'

export class GroupRepository {
    constructor(private readonly db: Queryable = pool) {}

    withClient(client: Queryable): GroupRepository {
        return new GroupRepository(client)
    }

    async getById(groupId: string): Promise<Group | null> {
        const result = await this.db.query<Group>('SELECT * FROM groups WHERE group_id = $1', [groupId])
        return result.rows[0] ?? null
    }

    /**
     * Case-insensitive lookup by display name
     */
    async getByName(groupName: string): Promise<Group | null> {
        const result = await this.db.query<Group>(
            'SELECT * FROM groups WHERE LOWER(group_name) = LOWER($1) ORDER BY managed DESC LIMIT 1',
            [groupName.trim()]
        )
        return result.rows[0] ?? null
    }

    async getManagedGroups(): Promise<Group[]> {
        const result = await this.db.query<Group>('SELECT * FROM groups WHERE managed = TRUE ORDER BY group_id')
        return result.rows
    }

    /**
     * Other groups sharing at least one community key
     */
    async getCommunityGroups(group: Pick<Group, 'group_id' | 'community_keys'>): Promise<Group[]> {
        if (group.community_keys.length === 0) {
            return []
        }

        const result = await this.db.query<Group>(
            `SELECT * FROM groups
            WHERE community_keys && $1::text[] AND group_id <> $2
            ORDER BY group_id`,
            [group.community_keys, group.group_id]
        )
        return result.rows
    }

    /**
     * Create or update a group. Unset fields keep their stored value.
     */
    async upsert(data: UpsertGroup): Promise<Group> {
        const result = await this.db.query<Group>(
            `INSERT INTO groups (
                group_id, group_name, group_topic, owner_id, managed, notify_on_spam,
                auto_summary_threshold, community_keys
            ) VALUES ($1, $2, $3, $4, COALESCE($5, FALSE), COALESCE($6, FALSE), $7, COALESCE($8, '{}'::text[]))
            ON CONFLICT (group_id) DO UPDATE SET
                group_name = COALESCE(EXCLUDED.group_name, groups.group_name),
                group_topic = COALESCE(EXCLUDED.group_topic, groups.group_topic),
                owner_id = COALESCE(EXCLUDED.owner_id, groups.owner_id),
                managed = COALESCE($5, groups.managed),
                notify_on_spam = COALESCE($6, groups.notify_on_spam),
                auto_summary_threshold = CASE WHEN $9 THEN EXCLUDED.auto_summary_threshold ELSE groups.auto_summary_threshold END,
                community_keys = COALESCE($8, groups.community_keys),
                updated_at = NOW()
            RETURNING *`,
            [
                data.group_id,
                data.group_name ?? null,
                data.group_topic ?? null,
                data.owner_id ?? null,
                data.managed ?? null,
                data.notify_on_spam ?? null,
                data.auto_summary_threshold ?? null,
                data.community_keys ?? null,
                data.auto_summary_threshold !== undefined,
            ]
        )
        return result.rows[0]
    }

    async updateLastIngest(groupId: string, at: Date): Promise<void> {
        await this.db.query('UPDATE groups SET last_ingest = $2, updated_at = NOW() WHERE group_id = $1', [
            groupId,
            at,
        ])
    }

    async updateLastSummarySync(groupId: string, at: Date): Promise<void> {
        await this.db.query('UPDATE groups SET last_summary_sync = $2, updated_at = NOW() WHERE group_id = $1', [
            groupId,
            at,
        ])
    }
}

export const groupRepository = new GroupRepository()
