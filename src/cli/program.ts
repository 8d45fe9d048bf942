import * as fs from 'fs'
import { Command, InvalidArgumentError } from '@commander-js/extra-typings'
import { getLogger } from '../log/utils'
import { CLOUDFORGE_VERSION, DEFAULT_REGION } from '../core/const'
import type { CoreConfig } from '../core/config'
import type { CloudProviderFactory } from '../core/provider'
import { Orchestrator, type ProvisionResult } from '../core/orchestrator'
import { SessionCleaner, type CleanupMode, type CleanupResult } from '../core/cleanup'
import { SessionStore } from '../core/session'
import { parseResourceSpec, type ResourceSpec } from '../core/spec/resource-spec'
import { hasCloudResources, type ProvisionedResources } from '../core/state/resources'

const logger = getLogger('cli')

export const DEFAULT_CLI_COMPUTE = { cpuCores: 2, memoryGb: 4, diskGb: 50 } as const
export const DEFAULT_CLI_DATABASE = { cpuCores: 1, memoryMb: 1000, storageGb: 25, engineVersion: '8.0' } as const

export interface ProvisionCliArgs {
    region?: string
    cpu?: number
    memory?: number
    disk?: number
    gpu?: string
    /** false when --no-compute is given */
    compute?: boolean
    database?: boolean
    dbCpu?: number
    dbMemory?: number
    dbStorage?: number
    dbVersion?: string
}

export interface CleanupCliArgs {
    localOnly?: boolean
    cloudOnly?: boolean
}

/**
 * Build a ResourceSpec from provision flags. A database is requested by --database
 * or by any --db-* flag.
 */
export function buildResourceSpecFromArgs(args: ProvisionCliArgs): ResourceSpec {
    const wantsDatabase = args.database === true
        || args.dbCpu !== undefined
        || args.dbMemory !== undefined
        || args.dbStorage !== undefined
        || args.dbVersion !== undefined

    // engine version and other values are validated by parseResourceSpec
    const input = {
        region: args.region ?? DEFAULT_REGION,
        compute: args.compute === false ? null : {
            cpuCores: args.cpu ?? DEFAULT_CLI_COMPUTE.cpuCores,
            memoryGb: args.memory ?? DEFAULT_CLI_COMPUTE.memoryGb,
            diskGb: args.disk ?? DEFAULT_CLI_COMPUTE.diskGb,
            gpuClass: args.gpu,
        },
        database: !wantsDatabase ? null : {
            cpuCores: args.dbCpu ?? DEFAULT_CLI_DATABASE.cpuCores,
            memoryMb: args.dbMemory ?? DEFAULT_CLI_DATABASE.memoryMb,
            storageGb: args.dbStorage ?? DEFAULT_CLI_DATABASE.storageGb,
            engineVersion: args.dbVersion ?? DEFAULT_CLI_DATABASE.engineVersion,
        },
    }
    return parseResourceSpec(input)
}

export function cleanupModeFromArgs(args: CleanupCliArgs): CleanupMode {
    if (args.localOnly && args.cloudOnly) {
        throw new InvalidArgumentError('--local-only and --cloud-only cannot be used together')
    }
    if (args.localOnly) return 'local-only'
    if (args.cloudOnly) return 'cloud-only'
    return 'both'
}

export function parsePositiveNumber(value: string): number {
    const parsed = Number(value)
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError(`Expected a positive number, got '${value}'`)
    }
    return parsed
}

export function parsePositiveInt(value: string): number {
    const parsed = parsePositiveNumber(value)
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`)
    }
    return parsed
}

export function formatResources(resources: ProvisionedResources): string[] {
    const lines = [`  Region: ${resources.region}`]
    if (resources.networkId) lines.push(`  Network: ${resources.networkId}`)
    for (const [zone, subnetId] of Object.entries(resources.subnets)) {
        lines.push(`  Subnet (${zone}): ${subnetId}`)
    }
    for (const rulesetId of resources.firewallRulesetIds) {
        lines.push(`  Security group: ${rulesetId}`)
    }
    if (resources.compute) {
        const c = resources.compute
        lines.push(`  Compute: ${c.instanceId} (${c.instanceClass ?? 'unknown class'}, ${c.zone})`)
        if (c.publicAddress) lines.push(`  Public IP: ${c.publicAddress}`)
        if (c.privateAddress) lines.push(`  Private IP: ${c.privateAddress}`)
    }
    if (resources.database) {
        const d = resources.database
        lines.push(`  Database: ${d.instanceId} (${d.zone})`)
        if (d.host) lines.push(`  Database endpoint: ${d.host}:${d.port ?? ''}`)
        if (d.username) lines.push(`  Database user: ${d.username}`)
    }
    return lines
}

function formatSpec(spec: ResourceSpec): string[] {
    const lines = [`  Region: ${spec.region}`]
    lines.push(spec.compute
        ? `  Compute: ${spec.compute.cpuCores} CPU, ${spec.compute.memoryGb} GB RAM, ${spec.compute.diskGb} GB disk, GPU ${spec.compute.gpuClass ?? 'none'}`
        : '  Compute: none')
    lines.push(spec.database
        ? `  Database: MySQL ${spec.database.engineVersion}, ${spec.database.cpuCores} CPU, ${spec.database.memoryMb} MB RAM, ${spec.database.storageGb} GB storage`
        : '  Database: none')
    return lines
}

function printProvisionResult(result: ProvisionResult): void {
    console.info(`✅ Session ${result.sessionId} provisioned (${result.sessionDir})`)
    for (const line of formatResources(result.resources)) {
        console.info(line)
    }
    if (result.resources.database?.password) {
        console.info(`  Database password: ${result.resources.database.password}`)
    }
    if (result.remoteAccess) {
        const { privateKeyPath, loginAccount, publicAddress } = result.remoteAccess
        console.info('')
        console.info(`Connect with: ssh -i ${privateKeyPath} ${loginAccount}@${publicAddress}`)
    }
}

function printCleanupResult(result: CleanupResult): void {
    if (result.teardown) {
        for (const step of result.teardown.steps) {
            const suffix = step.error ? `: ${step.error}` : ''
            console.info(`  ${step.resource} ${step.id}: ${step.outcome}${suffix}`)
        }
    }
    console.info(result.localDeleted
        ? `Local data of session ${result.sessionId} deleted`
        : `Local data of session ${result.sessionId} kept`)
}

export interface CliDependencies {
    loadConfig: () => CoreConfig
    /** Called only by commands that reach the cloud, so listing needs no credentials */
    providerFactory: () => CloudProviderFactory
    confirm: (message: string) => Promise<boolean>
}

export function buildProgram(deps: CliDependencies): Command {
    const program = new Command()
        .name('cloudforge')
        .description('Provision session-scoped compute and database resources, and clean them up')
        .version(CLOUDFORGE_VERSION)

    program.command('provision')
        .description('Provision a network, a compute node and optionally a database')
        .option('--spec <file>', 'JSON resource specification file (other resource flags are ignored)')
        .option('--region <region>', 'Region to provision in', DEFAULT_REGION)
        .option('--cpu <cores>', 'Compute CPU cores', parsePositiveInt)
        .option('--memory <gb>', 'Compute memory in GB', parsePositiveNumber)
        .option('--disk <gb>', 'Compute system disk size in GB', parsePositiveInt)
        .option('--gpu <class>', 'GPU class (T4, V100, A10, A100)')
        .option('--no-compute', 'Do not provision a compute node')
        .option('--database', 'Provision a MySQL database')
        .option('--db-cpu <cores>', 'Database CPU cores', parsePositiveInt)
        .option('--db-memory <mb>', 'Database memory in MB', parsePositiveInt)
        .option('--db-storage <gb>', 'Database storage in GB', parsePositiveInt)
        .option('--db-version <version>', 'MySQL engine version (5.6, 5.7, 8.0)')
        .option('--yes', 'Do not prompt for approval, automatically approve and continue')
        .action(async (opts) => {
            const config = deps.loadConfig()
            const spec = opts.spec ? await readSpecFile(opts.spec) : buildResourceSpecFromArgs(opts)

            console.info('Resources to provision:')
            for (const line of formatSpec(spec)) {
                console.info(line)
            }

            if (!opts.yes && !(await deps.confirm('Provision these resources? They are billed while they exist.'))) {
                console.info('Provisioning cancelled')
                return
            }

            const controller = new AbortController()
            const onInterrupt = () => {
                console.warn('Interrupted, rolling back provisioned resources...')
                controller.abort(new Error('Provisioning interrupted by user'))
            }
            process.once('SIGINT', onInterrupt)

            try {
                const orchestrator = new Orchestrator({
                    spec,
                    config,
                    provider: deps.providerFactory()(spec.region),
                    sessionStore: new SessionStore({ rootDir: config.sessionRootDir }),
                    signal: controller.signal
                })
                printProvisionResult(await orchestrator.run())
            } finally {
                process.removeListener('SIGINT', onInterrupt)
            }
        })

    program.command('sessions')
        .description('List sessions and the resources they recorded')
        .action(async () => {
            const config = deps.loadConfig()
            const store = new SessionStore({ rootDir: config.sessionRootDir })
            const sessions = await store.loadSessions()
            if (sessions.length === 0) {
                console.info(`No session found in ${config.sessionRootDir}`)
                return
            }
            for (const handle of sessions) {
                const resources = await store.readResources(handle, DEFAULT_REGION)
                const status = hasCloudResources(resources) ? 'resources recorded' : 'no cloud resources'
                console.info(`${handle.id} (${handle.stageFiles.length} stage file(s), ${status})`)
                for (const line of formatResources(resources)) {
                    console.info(line)
                }
            }
        })

    program.command('cleanup')
        .description('Delete the cloud resources and local files of a session')
        .argument('<sessionId>', 'Session ID, with or without the session_ prefix')
        .option('--local-only', 'Only delete local session files')
        .option('--cloud-only', 'Only delete cloud resources, keep local files')
        .option('--keep-logs', 'Keep stage files when deleting local data (the key pair is still deleted)')
        .option('--yes', 'Do not prompt for approval, automatically approve and continue')
        .action(async (sessionId, opts) => {
            const config = deps.loadConfig()
            const mode = cleanupModeFromArgs(opts)
            const store = new SessionStore({ rootDir: config.sessionRootDir })

            const cleaner = new SessionCleaner({
                sessionStore: store,
                // credentials are only needed when cloud resources are torn down
                providerFactory: (region) => deps.providerFactory()(region),
                defaultRegion: DEFAULT_REGION,
                detachGracePeriodMs: config.cleanup.detachGracePeriodMs
            })

            const { handle, resources } = await cleaner.inspect(sessionId)
            console.info(`Session ${handle.id}:`)
            for (const line of formatResources(resources)) {
                console.info(line)
            }

            if (!opts.yes && !(await deps.confirm(`Clean up session ${handle.id} (${mode})?`))) {
                console.info('Cleanup cancelled')
                return
            }

            const result = await cleaner.cleanup(handle.id, { mode, keepLogs: opts.keepLogs ?? false })
            printCleanupResult(result)
            if (result.teardown?.steps.some(s => s.outcome === 'failed')) {
                logger.warn(`Some resources of session ${handle.id} could not be deleted, run cleanup again later`)
                process.exitCode = 1
            }
        })

    return program
}

async function readSpecFile(file: string): Promise<ResourceSpec> {
    const raw: unknown = JSON.parse(await fs.promises.readFile(file, 'utf-8'))
    return parseResourceSpec(raw)
}
