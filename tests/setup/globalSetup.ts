/**
 * Global setup for Vitest
 * Placeholder environment so config modules load without a real .env
 */
import { config } from 'dotenv'

config()

process.env.NODE_ENV = 'test'
process.env.POSTGRES_DB_HOST ??= 'localhost'
process.env.POSTGRES_DB_USER ??= 'test'
process.env.POSTGRES_DB_NAME ??= 'test'
process.env.OPENAI_API_KEY ??= 'test-secret'
process.env.BOT_JID = '972500000000@s.whatsapp.net'
