import { emptyResources, ProvisionedResources } from '../state/resources'
import type { ResourceSpec } from '../spec/resource-spec'

/**
 * Stage names, in the order they are written. The numeric prefix keeps files
 * sorted in a directory listing and is part of the on-disk contract.
 */
export const SESSION_STAGES = {
    SPECIFICATION: '00_specification',
    NETWORK: '01_network',
    COMPUTE: '02_compute',
    DATABASE: '03_database',
    ERROR: '99_error',
} as const

export type SessionStage = typeof SESSION_STAGES[keyof typeof SESSION_STAGES]

export const STAGE_FILE_PATTERN = /^(\d{2})_([a-z0-9_]+)_info\.txt$/

export function stageFileName(stage: SessionStage): string {
    return `${stage}_info.txt`
}

export const SNAPSHOT_KEYS = {
    STAGE: 'Stage',
    TIMESTAMP: 'Timestamp',
    REGION: 'Region',
    NETWORK_ID: 'Network ID',
    SUBNETS: 'Subnets',
    SECURITY_GROUP: 'Security Group',
    INSTANCE_ID: 'Instance ID',
    INSTANCE_ZONE: 'Instance Zone',
    INSTANCE_TYPE: 'Instance Type',
    PUBLIC_IP: 'Public IP',
    PRIVATE_IP: 'Private IP',
    SSH_KEY: 'SSH Key',
    LOGIN_USER: 'Login User',
    SSH_COMMAND: 'SSH Command',
    DATABASE_INSTANCE_ID: 'Database Instance ID',
    DATABASE_ZONE: 'Database Zone',
    DATABASE_MEMORY_MB: 'Database Memory MB',
    DATABASE_HOST: 'Database Host',
    DATABASE_PORT: 'Database Port',
    DATABASE_USERNAME: 'Database Username',
    DATABASE_PASSWORD: 'Database Password',
    ERROR: 'Error',
    ERROR_CODE: 'Error Code',
} as const

export type SnapshotField =
    | { key: string, value: string | number }
    | { key: string, entries: Record<string, string> }

/**
 * Structured content of a stage file. Rendered as `Key: value` lines, map
 * fields as a `Key:` header followed by indented `  name: value` lines.
 */
export interface StageSnapshot {
    fields: SnapshotField[]
}

const SEPARATOR = '='.repeat(70)

function pad(n: number): string {
    return n.toString().padStart(2, '0')
}

export function formatTimestamp(date: Date): string {
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
}

function singleLine(value: string | number): string {
    return String(value).replace(/\s*\r?\n\s*/g, ' ').trim()
}

export function renderSnapshot(stage: string, snapshot: StageSnapshot, at: Date): string {
    const lines = [
        `${SNAPSHOT_KEYS.STAGE}: ${stage}`,
        `${SNAPSHOT_KEYS.TIMESTAMP}: ${formatTimestamp(at)}`,
        SEPARATOR,
    ]
    for (const field of snapshot.fields) {
        if ('entries' in field) {
            lines.push(`${field.key}:`)
            for (const [name, value] of Object.entries(field.entries)) {
                lines.push(`  ${name}: ${singleLine(value)}`)
            }
        } else {
            lines.push(`${field.key}: ${singleLine(field.value)}`)
        }
    }
    return lines.join('\n') + '\n'
}

//
// Snapshot builders
//

export function specificationSnapshot(spec: ResourceSpec): StageSnapshot {
    const fields: SnapshotField[] = [{ key: SNAPSHOT_KEYS.REGION, value: spec.region }]

    if (spec.compute) {
        fields.push({ key: 'Compute', entries: {
            'CPU Cores': String(spec.compute.cpuCores),
            'Memory GB': String(spec.compute.memoryGb),
            'Disk GB': String(spec.compute.diskGb),
            'GPU': spec.compute.gpuClass ?? 'none',
        }})
    } else {
        fields.push({ key: 'Compute', value: 'not provisioned' })
    }

    if (spec.database) {
        fields.push({ key: 'Database', entries: {
            'CPU Cores': String(spec.database.cpuCores),
            'Memory MB': String(spec.database.memoryMb),
            'Storage GB': String(spec.database.storageGb),
            'Engine Version': spec.database.engineVersion,
        }})
    } else {
        fields.push({ key: 'Database', value: 'not provisioned' })
    }

    return { fields }
}

function networkFields(resources: ProvisionedResources): SnapshotField[] {
    const fields: SnapshotField[] = [{ key: SNAPSHOT_KEYS.REGION, value: resources.region }]
    if (resources.networkId !== undefined) {
        fields.push({ key: SNAPSHOT_KEYS.NETWORK_ID, value: resources.networkId })
    }
    fields.push({ key: SNAPSHOT_KEYS.SUBNETS, entries: resources.subnets })
    return fields
}

function computeFields(resources: ProvisionedResources): SnapshotField[] {
    const compute = resources.compute
    if (!compute) {
        return []
    }
    const fields: SnapshotField[] = [
        { key: SNAPSHOT_KEYS.INSTANCE_ID, value: compute.instanceId },
        { key: SNAPSHOT_KEYS.INSTANCE_ZONE, value: compute.zone },
    ]
    if (compute.instanceClass) fields.push({ key: SNAPSHOT_KEYS.INSTANCE_TYPE, value: compute.instanceClass })
    if (compute.publicAddress) fields.push({ key: SNAPSHOT_KEYS.PUBLIC_IP, value: compute.publicAddress })
    if (compute.privateAddress) fields.push({ key: SNAPSHOT_KEYS.PRIVATE_IP, value: compute.privateAddress })
    if (compute.privateKeyPath) fields.push({ key: SNAPSHOT_KEYS.SSH_KEY, value: compute.privateKeyPath })
    if (compute.loginAccount) fields.push({ key: SNAPSHOT_KEYS.LOGIN_USER, value: compute.loginAccount })
    if (compute.privateKeyPath && compute.loginAccount && compute.publicAddress) {
        fields.push({
            key: SNAPSHOT_KEYS.SSH_COMMAND,
            value: `ssh -i ${compute.privateKeyPath} ${compute.loginAccount}@${compute.publicAddress}`
        })
    }
    return fields
}

function databaseFields(resources: ProvisionedResources): SnapshotField[] {
    const database = resources.database
    if (!database) {
        return []
    }
    const fields: SnapshotField[] = [
        { key: SNAPSHOT_KEYS.DATABASE_INSTANCE_ID, value: database.instanceId },
        { key: SNAPSHOT_KEYS.DATABASE_ZONE, value: database.zone },
    ]
    if (database.memoryTierMb !== undefined) fields.push({ key: SNAPSHOT_KEYS.DATABASE_MEMORY_MB, value: database.memoryTierMb })
    if (database.host) fields.push({ key: SNAPSHOT_KEYS.DATABASE_HOST, value: database.host })
    if (database.port !== undefined) fields.push({ key: SNAPSHOT_KEYS.DATABASE_PORT, value: database.port })
    if (database.username) fields.push({ key: SNAPSHOT_KEYS.DATABASE_USERNAME, value: database.username })
    if (database.password) fields.push({ key: SNAPSHOT_KEYS.DATABASE_PASSWORD, value: database.password })
    return fields
}

function rulesetFields(rulesetIds: string[]): SnapshotField[] {
    return rulesetIds.map(id => ({ key: SNAPSHOT_KEYS.SECURITY_GROUP, value: id }))
}

export function networkSnapshot(resources: ProvisionedResources): StageSnapshot {
    return { fields: networkFields(resources) }
}

export function computeSnapshot(resources: ProvisionedResources, rulesetId: string): StageSnapshot {
    return { fields: [...computeFields(resources), ...rulesetFields([rulesetId])] }
}

export function databaseSnapshot(resources: ProvisionedResources, rulesetId: string): StageSnapshot {
    return { fields: [...databaseFields(resources), ...rulesetFields([rulesetId])] }
}

/**
 * Everything recorded so far, plus the failure. Written when a run fails so the
 * cleanup tool sees resources whose stage never completed.
 */
export function errorSnapshot(error: Error & { code?: unknown }, resources: ProvisionedResources): StageSnapshot {
    const fields: SnapshotField[] = [{ key: SNAPSHOT_KEYS.ERROR, value: `${error.name}: ${error.message}` }]
    if (typeof error.code === 'string') {
        fields.push({ key: SNAPSHOT_KEYS.ERROR_CODE, value: error.code })
    }
    return {
        fields: [
            ...fields,
            ...networkFields(resources),
            ...rulesetFields(resources.firewallRulesetIds),
            ...computeFields(resources),
            ...databaseFields(resources),
        ]
    }
}

//
// Parsing
//

export interface ParsedSnapshot {
    stage?: string
    /** Top-level `Key: value` lines, in order. Keys may repeat. */
    values: Array<[string, string]>
    /** `Key:` blocks of indented entries */
    blocks: Record<string, Record<string, string>>
}

export function parseSnapshot(text: string): ParsedSnapshot {
    const parsed: ParsedSnapshot = { values: [], blocks: {} }
    let currentBlock: Record<string, string> | undefined

    for (const line of text.split(/\r?\n/)) {
        const indented = /^\s+(\S[^:]*):\s*(.*)$/.exec(line)
        if (indented && currentBlock) {
            currentBlock[indented[1].trim()] = indented[2].trim()
            continue
        }

        const topLevel = /^(\S[^:]*):\s*(.*)$/.exec(line)
        if (!topLevel) {
            currentBlock = undefined
            continue
        }

        const key = topLevel[1].trim()
        const value = topLevel[2].trim()
        if (value === '') {
            currentBlock = parsed.blocks[key] ?? {}
            parsed.blocks[key] = currentBlock
        } else {
            currentBlock = undefined
            if (key === SNAPSHOT_KEYS.STAGE) {
                parsed.stage = value
            }
            parsed.values.push([key, value])
        }
    }

    return parsed
}

function toInt(value: string): number | undefined {
    const parsed = Number.parseInt(value, 10)
    return Number.isNaN(parsed) ? undefined : parsed
}

/**
 * Rebuild a resource record from stage files, oldest first. Later files only
 * add information; an ID seen in any file is kept.
 */
export function recoverResources(snapshots: ParsedSnapshot[], defaultRegion: string): ProvisionedResources {
    const resources = emptyResources(defaultRegion)
    let regionSeen = false

    for (const snapshot of snapshots) {
        for (const [zone, subnetId] of Object.entries(snapshot.blocks[SNAPSHOT_KEYS.SUBNETS] ?? {})) {
            resources.subnets[zone] = subnetId
        }

        for (const [key, value] of snapshot.values) {
            switch (key) {
                case SNAPSHOT_KEYS.REGION:
                    if (!regionSeen) {
                        resources.region = value
                        regionSeen = true
                    }
                    break
                case SNAPSHOT_KEYS.NETWORK_ID:
                    resources.networkId = value
                    break
                case SNAPSHOT_KEYS.SECURITY_GROUP:
                    if (!resources.firewallRulesetIds.includes(value)) {
                        resources.firewallRulesetIds.push(value)
                    }
                    break
                case SNAPSHOT_KEYS.INSTANCE_ID:
                    resources.compute = { ...resources.compute, instanceId: value, zone: resources.compute?.zone ?? '' }
                    break
                case SNAPSHOT_KEYS.INSTANCE_ZONE:
                    resources.compute = { instanceId: resources.compute?.instanceId ?? '', ...resources.compute, zone: value }
                    break
                case SNAPSHOT_KEYS.INSTANCE_TYPE:
                    if (resources.compute) resources.compute.instanceClass = value
                    break
                case SNAPSHOT_KEYS.PUBLIC_IP:
                    if (resources.compute) resources.compute.publicAddress = value
                    break
                case SNAPSHOT_KEYS.PRIVATE_IP:
                    if (resources.compute) resources.compute.privateAddress = value
                    break
                case SNAPSHOT_KEYS.SSH_KEY:
                    if (resources.compute) resources.compute.privateKeyPath = value
                    break
                case SNAPSHOT_KEYS.LOGIN_USER:
                    if (resources.compute) resources.compute.loginAccount = value
                    break
                case SNAPSHOT_KEYS.DATABASE_INSTANCE_ID:
                    resources.database = { ...resources.database, instanceId: value, zone: resources.database?.zone ?? '' }
                    break
                case SNAPSHOT_KEYS.DATABASE_ZONE:
                    resources.database = { instanceId: resources.database?.instanceId ?? '', ...resources.database, zone: value }
                    break
                case SNAPSHOT_KEYS.DATABASE_MEMORY_MB:
                    if (resources.database) resources.database.memoryTierMb = toInt(value)
                    break
                case SNAPSHOT_KEYS.DATABASE_HOST:
                    if (resources.database) resources.database.host = value
                    break
                case SNAPSHOT_KEYS.DATABASE_PORT:
                    if (resources.database) resources.database.port = toInt(value)
                    break
                case SNAPSHOT_KEYS.DATABASE_USERNAME:
                    if (resources.database) resources.database.username = value
                    break
                case SNAPSHOT_KEYS.DATABASE_PASSWORD:
                    if (resources.database) resources.database.password = value
                    break
            }
        }
    }

    // a zone line without an ID line never happens in files we write
    if (resources.compute && resources.compute.instanceId === '') {
        resources.compute = undefined
    }
    if (resources.database && resources.database.instanceId === '') {
        resources.database = undefined
    }

    return resources
}
