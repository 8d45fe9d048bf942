import { getLogger, Logger } from '../log/utils'
import { Compensator, teardownSucceeded, type TeardownReport } from './compensator'
import type { CloudProviderFactory } from './provider'
import type { SessionHandle, SessionStore } from './session'
import { hasCloudResources, type ProvisionedResources } from './state/resources'

export type CleanupMode = 'cloud-only' | 'local-only' | 'both'

export interface CleanupOptions {
    mode: CleanupMode
    /** Keep stage files when deleting local data; only the key pair is removed */
    keepLogs: boolean
}

export interface CleanupResult {
    sessionId: string
    resources: ProvisionedResources
    /** undefined when cloud teardown was not requested or nothing was recorded */
    teardown?: TeardownReport
    localDeleted: boolean
}

export interface SessionCleanerArgs {
    sessionStore: SessionStore
    providerFactory: CloudProviderFactory
    defaultRegion: string
    detachGracePeriodMs?: number
}

/**
 * Cleans up a session from a separate process, using only what its stage files
 * recorded. Safe to run again on a session that was partially cleaned.
 */
export class SessionCleaner {

    private readonly logger: Logger
    private readonly args: SessionCleanerArgs

    constructor(args: SessionCleanerArgs) {
        this.logger = getLogger(SessionCleaner.name)
        this.args = args
    }

    /**
     * Load a session and the resources its stage files recorded.
     */
    async inspect(sessionId: string): Promise<{ handle: SessionHandle, resources: ProvisionedResources }> {
        const handle = await this.args.sessionStore.openSession(sessionId)
        const resources = await this.args.sessionStore.readResources(handle, this.args.defaultRegion)
        return { handle, resources }
    }

    async cleanup(sessionId: string, options: CleanupOptions): Promise<CleanupResult> {
        const { handle, resources } = await this.inspect(sessionId)
        this.logger.info(`Cleaning up session ${handle.id} (mode ${options.mode})`)

        let teardown: TeardownReport | undefined
        if (options.mode !== 'local-only') {
            if (hasCloudResources(resources)) {
                const compensator = new Compensator({
                    provider: this.args.providerFactory(resources.region),
                    detachGracePeriodMs: this.args.detachGracePeriodMs
                })
                teardown = await compensator.teardown(resources)
            } else {
                this.logger.info(`Session ${handle.id} recorded no cloud resources`)
            }
        }

        let localDeleted = false
        if (options.mode === 'both' && teardown && !teardownSucceeded(teardown)) {
            // stage files are the only record of what is left in the cloud
            this.logger.warn(`Keeping local data of session ${handle.id}: some cloud resources could not be deleted`)
        } else if (options.mode !== 'cloud-only') {
            await this.args.sessionStore.deleteSession(handle, { keepLogs: options.keepLogs })
            localDeleted = true
        }

        return { sessionId: handle.id, resources, teardown, localDeleted }
    }
}
