/**
 * Composition root: builds every service once and injects its collaborators
 */

import { env } from '~/config/env'
import { LoggingOutboundGateway, type OutboundGateway } from '~/core/gateway/OutboundGateway'
import { TtlDedupCache } from '~/core/utils/dedupCache'
import { SlidingWindowRateLimiter } from '~/core/utils/rateLimiter'
import { GenerationService } from '~/features/ai/services/GenerationService'
import { EmbeddingService } from '~/features/ai/services/EmbeddingService'
import { TopicStore } from '~/features/knowledge/services/TopicStore'
import { TopicSynthesizer } from '~/features/knowledge/services/TopicSynthesizer'
import { TopicIngestionService } from '~/features/knowledge/services/TopicIngestionService'
import { HybridRetriever } from '~/features/knowledge/services/HybridRetriever'
import { KnowledgeBaseAnswerService } from '~/features/knowledge/services/KnowledgeBaseAnswerService'
import { KnowledgeBaseQaCommand } from '~/features/knowledge/services/KnowledgeBaseQaCommand'
import { BackgroundWorkerService } from '~/features/knowledge/services/BackgroundWorkerService'
import { GroupSummaryService } from '~/features/summary/services/GroupSummaryService'
import { SummaryTaskQueue } from '~/features/summary/services/SummaryTaskQueue'
import { OptOutService } from '~/features/privacy/services/OptOutService'
import { GroupLinkSpamService } from '~/features/moderation/services/GroupLinkSpamService'
import { MessageRouter } from '~/features/routing/services/MessageRouter'
import { MessageProcessingService } from '~/features/messages/services/MessageProcessingService'

export interface ServiceOverrides {
    gateway?: OutboundGateway
    generator?: GenerationService
    embedder?: EmbeddingService
}

export function createServices(overrides: ServiceOverrides = {}) {
    const gateway = overrides.gateway ?? new LoggingOutboundGateway()
    const generator = overrides.generator ?? new GenerationService()
    const embedder = overrides.embedder ?? new EmbeddingService()

    const optOut = new OptOutService()
    const retriever = new HybridRetriever()

    const synthesizer = new TopicSynthesizer({ generator, embedder, store: new TopicStore() })
    const ingestion = new TopicIngestionService({ synthesizer })

    const summaries = new GroupSummaryService({ generator, gateway, optOut })
    const summaryQueue = new SummaryTaskQueue((groupId) => summaries.summarizeAndSendToGroup(groupId))

    const answers = new KnowledgeBaseAnswerService({ generator, embedder, retriever, gateway, optOut })
    const kbQa = new KnowledgeBaseQaCommand({ answers, gateway })
    const router = new MessageRouter({ generator, gateway, summaries, answers })
    const spam = new GroupLinkSpamService({ generator, gateway })

    const processor = new MessageProcessingService({
        dedup: new TtlDedupCache({ ttlMs: env.DEDUP_TTL_SECONDS * 1000 }),
        userLimiter: new SlidingWindowRateLimiter({
            maxRequests: env.RATE_LIMIT_USER_MESSAGES,
            windowMs: env.RATE_LIMIT_USER_WINDOW_SECONDS * 1000,
        }),
        groupLimiter: new SlidingWindowRateLimiter({
            maxRequests: env.RATE_LIMIT_GROUP_MESSAGES,
            windowMs: env.RATE_LIMIT_GROUP_WINDOW_SECONDS * 1000,
        }),
        summaryQueue,
        router,
        optOut,
        spam,
        kbQa,
        gateway,
    })

    const worker = new BackgroundWorkerService(ingestion, summaries)

    return {
        gateway,
        generator,
        embedder,
        optOut,
        retriever,
        synthesizer,
        ingestion,
        summaries,
        summaryQueue,
        answers,
        kbQa,
        router,
        spam,
        processor,
        worker,
    }
}

export type Services = ReturnType<typeof createServices>
