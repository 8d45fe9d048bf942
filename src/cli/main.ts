#!/usr/bin/env node

import { confirm } from '@inquirer/prompts'
import { ConfigLoader } from '../core/config'
import { extractErrorDetails, isCloudForgeError } from '../core/errors/taxonomy'
import { tencentProviderFactory } from '../providers/tencent'
import { getLogger } from '../log/utils'
import { buildProgram } from './program'

const logger = getLogger('main')

async function main(): Promise<void> {
    const program = buildProgram({
        loadConfig: () => ConfigLoader.load(),
        providerFactory: () => tencentProviderFactory(),
        confirm: (message) => confirm({ message, default: false })
    })
    await program.parseAsync(process.argv)
}

main().catch((error: unknown) => {
    const details = extractErrorDetails(error)
    logger.debug('Command failed', { error: String(error) })
    console.error(`❌ ${details.code ? `[${details.code}] ` : ''}${details.message}`)
    if (isCloudForgeError(error)) {
        for (const suggestion of error.getDetails().suggestions ?? []) {
            console.error(`  - ${suggestion}`)
        }
        if (typeof error.context.sessionDir === 'string') {
            console.error(`Session files: ${error.context.sessionDir}`)
        }
    }
    process.exitCode = 1
})
