#!/usr/bin/env tsx
/**
 * Apply pending database migrations
 */

import 'dotenv/config'
import { closeConnection } from '../src/config/database'
import { runMigrations } from '../src/database/migrations/runMigrations'

async function main() {
    try {
        await runMigrations()
    } finally {
        await closeConnection()
    }
}

main().catch((error) => {
    console.error('❌ Migration failed:', error)
    process.exit(1)
})
