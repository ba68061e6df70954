/**
 * Generation Service
 *
 * Every text and structured model call goes through here. Calls retry on
 * transient failures with randomized exponential backoff, then surface as
 * GenerationServiceError.
 */

import { generateObject, generateText, NoObjectGeneratedError, type LanguageModel } from 'ai'
import { z } from 'zod'
import { ServiceError } from '~/core/errors/ServiceError'
import { createFlowLogger } from '~/core/utils/logger'
import {
    GENERATION_RETRY,
    TOPIC_GENERATION_RETRY,
    isRetryableError,
    withRetry,
    type RetryOptions,
} from '~/core/utils/retry'
import { ROUTER_SYSTEM_PROMPT, SPAM_SYSTEM_PROMPT, TOPIC_SYSTEM_PROMPT } from '../prompts'
import { resolveLanguageModel } from './models'

const logger = createFlowLogger('generation-service')

export class GenerationServiceError extends ServiceError {
    constructor(message: string, code: string, cause?: unknown, retryable: boolean = false) {
        super('GenerationService', message, code, cause, retryable)
    }
}

export const topicDraftSchema = z.object({
    subject: z.string().describe('The subject of the topic'),
    summary: z
        .string()
        .describe(
            'A concise summary of the topic discussed. Credit notable insights to the speaker by tagging them (e.g, @user_1)'
        ),
})

export type TopicDraft = z.infer<typeof topicDraftSchema>

export const ROUTES = ['HEY', 'SUMMARIZE', 'ASK_QUESTION', 'IGNORE'] as const

export type Route = (typeof ROUTES)[number]

export const spamScoreSchema = z.object({
    score: z.number().int().min(1).max(5).describe('1 is legitimate, 5 is spam'),
    explanation: z.string().max(100).describe('Why this score, in at most 7 words'),
})

export type SpamScore = z.infer<typeof spamScoreSchema>

export interface TextRequest {
    system: string
    prompt: string
}

export interface GenerationServiceOptions {
    model?: LanguageModel
    retry?: RetryOptions
    topicRetry?: RetryOptions
}

export class GenerationService {
    private readonly model: LanguageModel
    private readonly retry: RetryOptions
    private readonly topicRetry: RetryOptions

    constructor(options: GenerationServiceOptions = {}) {
        this.model = options.model ?? resolveLanguageModel()
        this.retry = options.retry ?? GENERATION_RETRY
        this.topicRetry = options.topicRetry ?? TOPIC_GENERATION_RETRY
    }

    /**
     * Extract exactly one {subject, summary} from a pseudonymized conversation
     */
    async extractTopic(conversation: string): Promise<TopicDraft> {
        return this.run('extractTopic', this.topicRetry, async () => {
            const { object } = await generateObject({
                model: this.model,
                schema: topicDraftSchema,
                system: TOPIC_SYSTEM_PROMPT,
                prompt: conversation,
                maxOutputTokens: 10000,
                maxRetries: 0,
            })
            return object
        })
    }

    /**
     * Classify a bot-addressed message
     */
    async classifyRoute(text: string): Promise<Route> {
        return this.run('classifyRoute', this.retry, async () => {
            const { object } = await generateObject({
                model: this.model,
                output: 'enum',
                enum: [...ROUTES],
                system: ROUTER_SYSTEM_PROMPT,
                prompt: text,
                maxRetries: 0,
            })
            return object
        })
    }

    async scoreSpam(prompt: string): Promise<SpamScore> {
        return this.run('scoreSpam', this.retry, async () => {
            const { object } = await generateObject({
                model: this.model,
                schema: spamScoreSchema,
                system: SPAM_SYSTEM_PROMPT,
                prompt,
                maxRetries: 0,
            })
            return object
        })
    }

    /**
     * Free-text completion
     */
    async generateText(request: TextRequest): Promise<string> {
        return this.run('generateText', this.retry, async () => {
            const { text } = await generateText({
                model: this.model,
                system: request.system,
                prompt: request.prompt,
                maxRetries: 0,
            })
            return text
        })
    }

    private async run<T>(operation: string, retry: RetryOptions, call: () => Promise<T>): Promise<T> {
        const startTime = Date.now()

        try {
            const result = await withRetry(call, { ...retry, retryIf: isRetryableError, operation })
            logger.debug({ operation, durationMs: Date.now() - startTime }, 'Generation completed')
            return result
        } catch (error) {
            logger.error({ err: error, operation }, 'Generation failed')

            if (NoObjectGeneratedError.isInstance(error)) {
                throw new GenerationServiceError('Model returned no usable object', 'NO_OBJECT', error, false)
            }

            throw new GenerationServiceError(
                error instanceof Error ? error.message : 'Generation failed',
                'GENERATION_FAILED',
                error,
                isRetryableError(error)
            )
        }
    }
}
