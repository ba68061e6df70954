import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import { pool } from '~/config/database'
import { loggers } from '~/core/utils/logger'
import type { Queryable } from '../types'

const migrationsDir = dirname(fileURLToPath(import.meta.url))

const logger = loggers.database

export const MIGRATIONS = ['001_init.sql']

/**
 * Check if migration has already been applied
 */
async function isMigrationApplied(db: Queryable, migrationName: string): Promise<boolean> {
    const table = await db.query<{ exists: string | null }>(`SELECT to_regclass('migrations') AS exists`)
    if (!table.rows[0]?.exists) {
        // First run: the migrations table is created by 001_init.sql
        return false
    }

    const result = await db.query('SELECT 1 FROM migrations WHERE name = $1', [migrationName])
    return result.rows.length > 0
}

async function recordMigration(db: Queryable, migrationName: string): Promise<void> {
    await db.query('INSERT INTO migrations (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [migrationName])
}

/**
 * Run all database migrations
 */
export async function runMigrations(db: Queryable = pool): Promise<void> {
    logger.info('Running database migrations...')

    try {
        for (const migration of MIGRATIONS) {
            if (await isMigrationApplied(db, migration)) {
                logger.info({ migration }, 'Skipping migration (already applied)')
                continue
            }

            logger.info({ migration }, 'Running migration')
            const migrationSQL = readFileSync(join(migrationsDir, migration), 'utf-8')
            await db.query(migrationSQL)

            await recordMigration(db, migration)
            logger.info({ migration }, 'Migration completed')
        }

        logger.info('All migrations completed successfully')
    } catch (error) {
        logger.error({ err: error }, 'Migration failed')
        throw error
    }
}
