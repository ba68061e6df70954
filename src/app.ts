import 'dotenv/config'
import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import { env } from '~/config/env'
import { closeConnection, registerVectorType, testConnection } from '~/config/database'
import { runMigrations } from '~/database/migrations/runMigrations'
import { loggers } from '~/core/utils/logger'
import { createServices, type Services } from '~/core/createServices'

const packageJson: unknown = JSON.parse(readFileSync(join(dirname(fileURLToPath(import.meta.url)), '../package.json'), 'utf-8'))
export const APP_VERSION =
    typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        ? String(packageJson.version)
        : 'unknown'

let services: Services | null = null

async function main(): Promise<void> {
    loggers.app.info({ version: APP_VERSION, env: env.NODE_ENV }, 'Starting knowledge bot')

    const connected = await testConnection()
    if (!connected) {
        throw new Error('Database connection failed')
    }

    await runMigrations()

    if (!(await registerVectorType())) {
        throw new Error('pgvector extension is missing')
    }

    services = createServices()
    services.worker.start()

    loggers.app.info(
        { provider: env.AI_PROVIDER, workerEnabled: env.WORKER_ENABLED },
        'Knowledge bot is running; inbound messages go to services.processor.handle()'
    )
}

async function shutdown(signal: string): Promise<void> {
    loggers.app.info({ signal }, 'Shutting down gracefully...')

    if (services) {
        services.worker.stop()
        await services.summaryQueue.drain()
    }

    await closeConnection()
    process.exit(0)
}

process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
        loggers.app.error({ err: error }, 'Shutdown failed')
        process.exit(1)
    })
})

process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
        loggers.app.error({ err: error }, 'Shutdown failed')
        process.exit(1)
    })
})

main().catch((error) => {
    loggers.app.fatal({ err: error }, 'Fatal error during startup')
    process.exit(1)
})
