import { z } from 'zod'

const booleanFlag = (fallback: 'true' | 'false') =>
    z
        .string()
        .optional()
        .default(fallback)
        .transform((val) => val === 'true')

const commaList = z
    .string()
    .optional()
    .default('')
    .transform((val) =>
        val
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0)
    )

const envSchema = z.object({
    // Database
    POSTGRES_DB_HOST: z.string(),
    POSTGRES_DB_USER: z.string(),
    POSTGRES_DB_NAME: z.string(),
    POSTGRES_DB_PASSWORD: z.string().default(''),
    POSTGRES_DB_PORT: z.string().default('5432').transform(Number),
    POSTGRES_POOL_MAX: z.string().default('10').transform(Number),
    POSTGRES_STATEMENT_TIMEOUT_MS: z.string().default('30000').transform(Number),

    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // Models
    AI_PROVIDER: z.enum(['openai', 'google']).default('openai'),
    OPENAI_API_KEY: z.string().optional(),
    GOOGLE_GENERATIVE_AI_API_KEY: z.string().optional(),
    GENERATION_MODEL: z.string().default('gpt-4o-mini'),
    EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: z.string().default('1024').transform(Number),
    EMBEDDING_BATCH_SIZE: z.string().default('128').transform(Number),

    // Chat identity (the bot's own participant id, e.g. 972500000000@s.whatsapp.net)
    BOT_JID: z.string().min(1, 'Bot participant id is required'),

    // Direct messages
    DM_AUTOREPLY_ENABLED: booleanFlag('false'),
    DM_AUTOREPLY_MESSAGE: z.string().default('Hello, I am not designed to answer to personal messages.'),

    // /kb_qa command access
    QA_TESTERS: commaList,
    QA_TEST_GROUPS: commaList,

    // Rate limiting
    RATE_LIMIT_USER_MESSAGES: z.string().default('10').transform(Number),
    RATE_LIMIT_USER_WINDOW_SECONDS: z.string().default('60').transform(Number),
    RATE_LIMIT_GROUP_MESSAGES: z.string().default('30').transform(Number),
    RATE_LIMIT_GROUP_WINDOW_SECONDS: z.string().default('60').transform(Number),
    DEDUP_TTL_SECONDS: z.string().default('240').transform(Number),

    // Background worker
    WORKER_ENABLED: booleanFlag('true'),
    INGEST_INTERVAL_MS: z.string().default(String(24 * 60 * 60 * 1000)).transform(Number),
    SUMMARY_SYNC_INTERVAL_MS: z.string().default(String(24 * 60 * 60 * 1000)).transform(Number),
})

export type Env = z.infer<typeof envSchema>

// Validate and export environment variables
const parsed = envSchema.safeParse(process.env)

if (!parsed.success) {
    console.error('❌ Invalid environment variables:')
    console.error(parsed.error.flatten().fieldErrors)
    throw new Error('Invalid environment variables')
}

export const env = parsed.data
