#!/usr/bin/env tsx
/**
 * Database Schema Validation Script
 * Compares the live tables with the columns the repositories read and write
 */

import 'dotenv/config'
import { pool } from '../src/config/database'

interface ColumnInfo {
    column_name: string
    data_type: string
    is_nullable: string
}

const EXPECTED_SCHEMAS: Record<string, string[]> = {
    senders: ['sender_id', 'push_name', 'created_at', 'updated_at'],
    groups: [
        'group_id',
        'group_name',
        'group_topic',
        'owner_id',
        'managed',
        'notify_on_spam',
        'auto_summary_threshold',
        'last_ingest',
        'last_summary_sync',
        'community_keys',
        'created_at',
        'updated_at',
    ],
    messages: [
        'message_id',
        'chat_id',
        'sender_id',
        'group_id',
        'timestamp',
        'text',
        'media_url',
        'reply_to_id',
        'kb_topic_id',
        'created_at',
    ],
    kb_topics: ['id', 'group_id', 'start_time', 'speakers', 'subject', 'summary', 'embedding', 'created_at', 'updated_at'],
    kb_topic_messages: ['kb_topic_id', 'message_id'],
    opt_outs: ['sender_id', 'created_at'],
}

async function getTableColumns(tableName: string): Promise<ColumnInfo[]> {
    const result = await pool.query<ColumnInfo>(
        `SELECT column_name, data_type, is_nullable
         FROM information_schema.columns
         WHERE table_schema = 'public' AND table_name = $1
         ORDER BY ordinal_position`,
        [tableName]
    )
    return result.rows
}

async function validateSchema(): Promise<boolean> {
    console.log('🔍 Validating database schema...\n')

    let hasErrors = false

    for (const [tableName, expectedColumns] of Object.entries(EXPECTED_SCHEMAS)) {
        try {
            const actualColumnNames = (await getTableColumns(tableName)).map((c) => c.column_name)

            if (actualColumnNames.length === 0) {
                console.error(`❌ Table "${tableName}" does not exist`)
                hasErrors = true
                continue
            }

            const missingColumns = expectedColumns.filter((col) => !actualColumnNames.includes(col))
            if (missingColumns.length > 0) {
                console.error(`❌ Table "${tableName}" is missing columns: ${missingColumns.join(', ')}`)
                hasErrors = true
            }

            const extraColumns = actualColumnNames.filter((col) => !expectedColumns.includes(col))
            if (extraColumns.length > 0) {
                console.warn(`⚠️  Table "${tableName}" has extra columns: ${extraColumns.join(', ')}`)
            }

            if (missingColumns.length === 0 && extraColumns.length === 0) {
                console.log(`✅ Table "${tableName}" schema is valid (${actualColumnNames.length} columns)`)
            }
        } catch (error) {
            console.error(`❌ Error checking table "${tableName}":`, error)
            hasErrors = true
        }
    }

    console.log('\n' + '='.repeat(50))
    if (hasErrors) {
        console.error('❌ Schema validation FAILED - run the migrations or fix the errors above')
    } else {
        console.log('✅ All table schemas are valid!')
    }
    return !hasErrors
}

async function main() {
    try {
        if (!(await validateSchema())) {
            process.exitCode = 1
        }
    } finally {
        await pool.end()
    }
}

main().catch((error) => {
    console.error('Fatal error:', error)
    process.exitCode = 1
})
