import type { OutboundGateway } from '~/core/gateway/OutboundGateway'

export interface SentMessage {
    recipient: string
    text: string
}

/**
 * Outbound gateway that keeps what would have been sent
 */
export class RecordingGateway implements OutboundGateway {
    readonly sent: SentMessage[] = []

    async send(recipient: string, text: string): Promise<void> {
        this.sent.push({ recipient, text })
    }
}
