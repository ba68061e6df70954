/**
 * Outbound delivery to the chat network
 */

import { loggers } from '~/core/utils/logger'

export interface OutboundGateway {
    /**
     * Deliver `text` to a chat (group or participant id)
     */
    send(recipient: string, text: string): Promise<void>
}

/**
 * Gateway that only logs what would be sent. Used when no delivery client is wired in.
 */
export class LoggingOutboundGateway implements OutboundGateway {
    async send(recipient: string, text: string): Promise<void> {
        loggers.gateway.info({ recipient, length: text.length, preview: text.slice(0, 80) }, 'Outbound message')
    }
}
