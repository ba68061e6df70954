/**
 * Opt-out handling: direct-message commands and the display map that keeps
 * opted-out participants from being tagged.
 */

import { createFlowLogger } from '~/core/utils/logger'
import { jidUser, normalizeJid } from '~/core/utils/jid'
import { optOutRepository, type OptOutRepository } from '~/database/repositories/optOutRepository'
import { senderRepository, type SenderRepository } from '~/database/repositories/senderRepository'
import { untaggableNumber, type OptOutDisplayMap } from '../utils/displayName'

const logger = createFlowLogger('opt-out')

export type OptOutCommand = 'opt-out' | 'opt-in' | 'status'

export const OPT_OUT_REPLIES = {
    optedOut: 'You have been opted out. You will no longer be tagged in summaries and answers.',
    alreadyOptedOut: 'You are already opted out.',
    optedIn: 'You have been opted in. You will now be tagged in summaries and answers.',
    alreadyOptedIn: 'You are already opted in.',
    statusOut: 'You are currently opted out.',
    statusIn: 'You are currently opted in.',
} as const

export interface OptOutServiceDeps {
    optOuts?: Pick<OptOutRepository, 'isOptedOut' | 'create' | 'delete' | 'filterOptedOut'>
    senders?: Pick<SenderRepository, 'getByIds'>
}

export class OptOutService {
    private readonly optOuts: NonNullable<OptOutServiceDeps['optOuts']>
    private readonly senders: NonNullable<OptOutServiceDeps['senders']>

    constructor(deps: OptOutServiceDeps = {}) {
        this.optOuts = deps.optOuts ?? optOutRepository
        this.senders = deps.senders ?? senderRepository
    }

    parseCommand(text: string): OptOutCommand | null {
        const command = text.trim().toLowerCase()
        return command === 'opt-out' || command === 'opt-in' || command === 'status' ? command : null
    }

    /**
     * Apply a command for the sender and return the reply text
     */
    async handleCommand(senderId: string, command: OptOutCommand): Promise<string> {
        switch (command) {
            case 'opt-out': {
                const created = await this.optOuts.create(senderId)
                logger.info({ senderId, created }, 'Opt-out requested')
                return created ? OPT_OUT_REPLIES.optedOut : OPT_OUT_REPLIES.alreadyOptedOut
            }
            case 'opt-in': {
                const deleted = await this.optOuts.delete(senderId)
                logger.info({ senderId, deleted }, 'Opt-in requested')
                return deleted ? OPT_OUT_REPLIES.optedIn : OPT_OUT_REPLIES.alreadyOptedIn
            }
            case 'status':
                return (await this.optOuts.isOptedOut(senderId)) ? OPT_OUT_REPLIES.statusOut : OPT_OUT_REPLIES.statusIn
        }
    }

    /**
     * user part -> display text for those of `senderIds` who opted out
     */
    async getOptOutMap(senderIds: string[]): Promise<OptOutDisplayMap> {
        const ids = [...new Set(senderIds.map(normalizeJid))]
        const optedOut = await this.optOuts.filterOptedOut(ids)
        if (optedOut.length === 0) {
            return new Map()
        }

        const names = new Map((await this.senders.getByIds(optedOut)).map((sender) => [sender.sender_id, sender.push_name]))

        return new Map(
            optedOut.map((senderId) => {
                const user = jidUser(senderId)
                return [user, names.get(senderId) || untaggableNumber(user)]
            })
        )
    }
}
