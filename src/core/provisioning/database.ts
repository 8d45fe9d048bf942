import * as crypto from 'crypto'
import { getLogger, Logger } from '../../log/utils'
import { DATABASE_PORT, DATABASE_ROOT_USERNAME, type DatabaseEngineVersion } from '../const'
import { DATABASE_STATUS_RUNNING, type CloudProvider } from '../provider'
import type { PollingConfig } from '../config/interface'
import type { ResourceLedger } from '../state/resources'
import { createInFirstAvailableZone } from './zones'
import { pollUntil } from './polling'

export const ROOT_PASSWORD_PREFIX = 'CloudForge@'
export const ROOT_PASSWORD_RANDOM_LENGTH = 15
export const ROOT_PASSWORD_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789@#$%'

/**
 * Root password for a new database. The provider requires it at creation time.
 */
export function generateRootPassword(): string {
    let suffix = ''
    for (let i = 0; i < ROOT_PASSWORD_RANDOM_LENGTH; i++) {
        suffix += ROOT_PASSWORD_ALPHABET[crypto.randomInt(ROOT_PASSWORD_ALPHABET.length)]
    }
    return ROOT_PASSWORD_PREFIX + suffix
}

export interface CreateDatabaseInstanceRequest {
    memoryTierMb: number
    storageGb: number
    engineVersion: DatabaseEngineVersion
    rulesetId: string
    zones: readonly string[]
    subnets: Readonly<Record<string, string>>
}

export interface DatabaseInstance {
    instanceId: string
    zone: string
    password: string
}

export interface DatabaseEndpoint {
    host: string
    port: number
}

export interface DatabaseProvisionerArgs {
    provider: CloudProvider
    ledger: ResourceLedger
    namePrefix: string
    polling: PollingConfig
    signal?: AbortSignal
    /** Overridable for tests */
    passwordGenerator?: () => string
}

export class DatabaseProvisioner {

    private readonly logger: Logger
    private readonly args: DatabaseProvisionerArgs

    constructor(args: DatabaseProvisionerArgs) {
        this.logger = getLogger(DatabaseProvisioner.name)
        this.args = args
    }

    async createDbInstance(request: CreateDatabaseInstanceRequest): Promise<DatabaseInstance> {
        const { provider, ledger, namePrefix } = this.args
        const networkId = ledger.snapshot().networkId
        if (networkId === undefined) {
            throw new Error('Database instance requested before the network was created')
        }

        // same password whichever zone accepts the instance
        const password = (this.args.passwordGenerator ?? generateRootPassword)()

        this.logger.info(`Creating database instance (${request.memoryTierMb} MB, ${request.storageGb} GB, engine ${request.engineVersion})`)

        const created = await createInFirstAvailableZone({
            resource: 'database',
            zones: request.zones,
            subnets: request.subnets,
            logger: this.logger,
            create: async (zone, subnetId) => {
                const instanceId = await provider.createDatabase({
                    name: `${namePrefix}-db`,
                    zone,
                    memoryMb: request.memoryTierMb,
                    storageGb: request.storageGb,
                    engineVersion: request.engineVersion,
                    networkId,
                    subnetId,
                    firewallRulesetIds: [request.rulesetId],
                    port: DATABASE_PORT,
                    rootPassword: password,
                })
                ledger.recordDatabaseInstance(instanceId, zone, request.memoryTierMb)
                ledger.updateDatabase({ username: DATABASE_ROOT_USERNAME, password })
                return instanceId
            }
        })

        return { instanceId: created.value, zone: created.zone, password }
    }

    async waitUntilReady(instanceId: string, maxWaitMs: number = this.args.polling.maxWaitMs): Promise<DatabaseEndpoint> {
        const { provider, ledger, polling, signal } = this.args
        this.logger.info(`Waiting for database instance ${instanceId} to be running`)

        const endpoint = await pollUntil<DatabaseEndpoint>({
            resource: 'database',
            resourceId: instanceId,
            expectedState: 'running',
            polling: { ...polling, maxWaitMs },
            signal,
            check: async () => {
                const status = await provider.describeDatabase(instanceId)
                this.logger.debug(`Database ${instanceId} status: ${status?.statusCode ?? 'unknown'}`)
                if (status?.statusCode !== DATABASE_STATUS_RUNNING || status.host === undefined) {
                    return undefined
                }
                return { host: status.host, port: status.port ?? DATABASE_PORT }
            }
        })

        ledger.updateDatabase(endpoint)
        this.logger.info(`Database ${instanceId} ready at ${endpoint.host}:${endpoint.port}`)
        return endpoint
    }
}
