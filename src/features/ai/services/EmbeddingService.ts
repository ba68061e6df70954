/**
 * Embedding Service
 *
 * Batched text embeddings of a fixed length.
 */

import { embedMany, type EmbeddingModel } from 'ai'
import { env } from '~/config/env'
import { ServiceError } from '~/core/errors/ServiceError'
import { createFlowLogger } from '~/core/utils/logger'
import { GENERATION_RETRY, isRetryableError, withRetry, type RetryOptions } from '~/core/utils/retry'
import { embeddingProviderOptions, resolveEmbeddingModel, type ProviderName } from './models'

const logger = createFlowLogger('embedding-service')

export class EmbeddingServiceError extends ServiceError {
    constructor(message: string, code: string, cause?: unknown, retryable: boolean = false) {
        super('EmbeddingService', message, code, cause, retryable)
    }
}

export interface EmbeddingServiceOptions {
    provider?: ProviderName
    model?: EmbeddingModel<string>
    dimensions?: number
    batchSize?: number
    retry?: RetryOptions
}

export class EmbeddingService {
    private readonly provider: ProviderName
    private readonly model: EmbeddingModel<string>
    readonly dimensions: number
    private readonly batchSize: number
    private readonly retry: RetryOptions

    constructor(options: EmbeddingServiceOptions = {}) {
        this.provider = options.provider ?? env.AI_PROVIDER
        this.model = options.model ?? resolveEmbeddingModel(this.provider)
        this.dimensions = options.dimensions ?? env.EMBEDDING_DIMENSIONS
        this.batchSize = Math.max(1, options.batchSize ?? env.EMBEDDING_BATCH_SIZE)
        this.retry = options.retry ?? GENERATION_RETRY
    }

    /**
     * Embed texts in batches, keeping input order
     */
    async embedTexts(texts: string[]): Promise<number[][]> {
        const vectors: number[][] = []

        for (let start = 0; start < texts.length; start += this.batchSize) {
            const batch = texts.slice(start, start + this.batchSize)
            const embeddings = await this.embedBatch(batch)
            vectors.push(...embeddings)
        }

        return vectors
    }

    async embedText(text: string): Promise<number[]> {
        const [vector] = await this.embedTexts([text])
        if (!vector) {
            throw new EmbeddingServiceError('Embedding provider returned no vector', 'EMPTY_RESULT')
        }
        return vector
    }

    private async embedBatch(values: string[]): Promise<number[][]> {
        let embeddings: number[][]

        try {
            embeddings = await withRetry(
                async () => {
                    const result = await embedMany({
                        model: this.model,
                        values,
                        providerOptions: embeddingProviderOptions(this.provider, this.dimensions),
                        maxRetries: 0,
                    })
                    return result.embeddings
                },
                { ...this.retry, retryIf: isRetryableError, operation: 'embedMany' }
            )
        } catch (error) {
            logger.error({ err: error, batchSize: values.length }, 'Embedding request failed')
            throw new EmbeddingServiceError('Embedding request failed', 'EMBEDDING_FAILED', error, isRetryableError(error))
        }

        if (embeddings.length !== values.length) {
            throw new EmbeddingServiceError(
                `Expected ${values.length} embeddings, got ${embeddings.length}`,
                'COUNT_MISMATCH'
            )
        }

        const wrongSize = embeddings.find((vector) => vector.length !== this.dimensions)
        if (wrongSize) {
            throw new EmbeddingServiceError(
                `Expected ${this.dimensions} dimensions, got ${wrongSize.length}`,
                'DIMENSION_MISMATCH'
            )
        }

        logger.debug({ count: embeddings.length }, 'Embedded batch')
        return embeddings
    }
}
