/**
 * Model resolution for the configured provider
 */

import type { EmbeddingModel, LanguageModel } from 'ai'
import { openai } from '@ai-sdk/openai'
import { google } from '@ai-sdk/google'
import { env } from '~/config/env'

export type ProviderName = 'openai' | 'google'

export function resolveLanguageModel(provider: ProviderName = env.AI_PROVIDER, modelId: string = env.GENERATION_MODEL): LanguageModel {
    return provider === 'google' ? google(modelId) : openai(modelId)
}

export function resolveEmbeddingModel(
    provider: ProviderName = env.AI_PROVIDER,
    modelId: string = env.EMBEDDING_MODEL
): EmbeddingModel<string> {
    return provider === 'google' ? google.textEmbeddingModel(modelId) : openai.textEmbeddingModel(modelId)
}

/**
 * Provider options asking for vectors of the given length
 */
export function embeddingProviderOptions(provider: ProviderName, dimensions: number): Record<string, Record<string, number>> {
    return provider === 'google'
        ? { google: { outputDimensionality: dimensions } }
        : { openai: { dimensions } }
}
