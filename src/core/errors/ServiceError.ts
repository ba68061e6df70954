/**
 * Base Service Error Class
 *
 * Standardized error structure shared by every service.
 *
 * Usage:
 * ```typescript
 * export class TopicSynthesisError extends ServiceError {
 *     constructor(message: string, code: string, cause?: unknown, retryable: boolean = false) {
 *         super('TopicSynthesis', message, code, cause, retryable)
 *     }
 * }
 * ```
 */
export class ServiceError extends Error {
    /**
     * @param serviceName - Name of the service (e.g., 'TopicSynthesis', 'Embedding')
     * @param message - Human-readable error message
     * @param code - Machine-readable error code (e.g., 'EMPTY_RESULT', 'GROUP_OWNER_MISSING')
     * @param cause - Original error that caused this error
     * @param retryable - Whether this error can be retried
     */
    constructor(
        public readonly serviceName: string,
        message: string,
        public readonly code: string,
        public readonly cause?: unknown,
        public readonly retryable: boolean = false
    ) {
        super(message)
        this.name = `${serviceName}Error`

        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor)
        }
    }

    static retryable(serviceName: string, message: string, code: string, cause?: unknown): ServiceError {
        return new ServiceError(serviceName, message, code, cause, true)
    }

    static fatal(serviceName: string, message: string, code: string, cause?: unknown): ServiceError {
        return new ServiceError(serviceName, message, code, cause, false)
    }
}
