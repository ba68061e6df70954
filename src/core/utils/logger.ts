/**
 * Structured Logger using Pino
 *
 * - JSON output in production
 * - Pretty-printed output in development
 * - Silent under tests unless LOG_LEVEL asks otherwise
 */

import pino from 'pino'
import { env } from '~/config/env'

const isProduction = env.NODE_ENV === 'production'
const isTest = env.NODE_ENV === 'test'

const defaultLevel = isProduction ? 'info' : isTest ? 'silent' : 'debug'

export const logger = pino({
    level: env.LOG_LEVEL ?? defaultLevel,
    formatters: {
        level: (label) => {
            return { level: label }
        },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport:
        isProduction || isTest
            ? undefined
            : {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'SYS:HH:MM:ss',
                      ignore: 'pid,hostname',
                      singleLine: false,
                  },
              },
})

/**
 * Create a child logger with context
 */
export const createContextLogger = (context: Record<string, unknown>) => {
    return logger.child(context)
}

/**
 * Logger for specific modules
 */
export const loggers = {
    app: createContextLogger({ module: 'app' }),
    database: createContextLogger({ module: 'database' }),
    service: createContextLogger({ module: 'service' }),
    ai: createContextLogger({ module: 'ai' }),
    gateway: createContextLogger({ module: 'gateway' }),
}

const flowLoggerCache = new Map<string, pino.Logger>()

/**
 * Create logger for a specific component (memoized)
 */
export const createFlowLogger = (flowName: string): pino.Logger => {
    const cached = flowLoggerCache.get(flowName)
    if (cached) {
        return cached
    }

    const flowLogger = createContextLogger({ module: 'flow', flow: flowName })
    flowLoggerCache.set(flowName, flowLogger)
    return flowLogger
}

/**
 * Log performance metrics
 */
export const logPerformance = (operation: string, durationMs: number, metadata?: Record<string, unknown>) => {
    logger.info({
        type: 'performance',
        operation,
        durationMs,
        ...metadata,
    })
}

export default logger
