#!/usr/bin/env tsx
/**
 * One topic-ingestion pass over every managed group
 *
 * Usage: tsx scripts/ingest-topics.ts [--group <group id>]
 */

import 'dotenv/config'
import { closeConnection } from '../src/config/database'
import { createServices } from '../src/core/createServices'
import { groupRepository } from '../src/database/repositories/groupRepository'

function readGroupArg(argv: string[]): string | null {
    const index = argv.indexOf('--group')
    return index === -1 ? null : (argv[index + 1] ?? null)
}

async function main() {
    const { ingestion } = createServices()
    const groupId = readGroupArg(process.argv.slice(2))

    if (groupId) {
        const group = await groupRepository.getById(groupId)
        if (!group) {
            throw new Error(`Group not found: ${groupId}`)
        }
        const result = await ingestion.ingestGroup(group)
        console.log(`✅ ${result.groupId}: ${result.topics} topics from ${result.chunks} chunks (${result.skipped} skipped)`)
        return
    }

    const report = await ingestion.ingestAllGroups()
    for (const result of report.results) {
        console.log(`✅ ${result.groupId}: ${result.topics} topics from ${result.chunks} chunks (${result.skipped} skipped)`)
    }
    for (const failure of report.failures) {
        console.error(`❌ ${failure.groupId}:`, failure.error)
    }

    if (report.failures.length > 0) {
        process.exitCode = 1
    }
}

main()
    .catch((error) => {
        console.error('❌ Ingestion failed:', error)
        process.exitCode = 1
    })
    .finally(() => closeConnection())
