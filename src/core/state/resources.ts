import lodash from 'lodash'

export interface ProvisionedCompute {
    instanceId: string
    zone: string
    instanceClass?: string
    publicAddress?: string
    privateAddress?: string
    privateKeyPath?: string
    loginAccount?: string
}

export interface ProvisionedDatabase {
    instanceId: string
    zone: string
    memoryTierMb?: number
    host?: string
    port?: number
    username?: string
    password?: string
}

/**
 * Every cloud resource confirmed created during a session.
 */
export interface ProvisionedResources {
    region: string
    networkId?: string
    /** zone -> subnet ID */
    subnets: Record<string, string>
    firewallRulesetIds: string[]
    compute?: ProvisionedCompute
    database?: ProvisionedDatabase
}

export function emptyResources(region: string): ProvisionedResources {
    return { region, subnets: {}, firewallRulesetIds: [] }
}

export function hasCloudResources(resources: ProvisionedResources): boolean {
    return resources.networkId !== undefined
        || !lodash.isEmpty(resources.subnets)
        || resources.firewallRulesetIds.length > 0
        || resources.compute !== undefined
        || resources.database !== undefined
}

/**
 * Append-only record of resources owned by one orchestrator run.
 *
 * Provisioners record an ID as soon as the provider confirms its creation so that
 * compensation sees it even if a later step of the same stage fails. Entries are
 * never removed; details (addresses, credentials) are only ever added.
 */
export class ResourceLedger {

    private readonly resources: ProvisionedResources

    constructor(region: string) {
        this.resources = emptyResources(region)
    }

    get region(): string {
        return this.resources.region
    }

    recordNetwork(networkId: string): void {
        if (this.resources.networkId !== undefined && this.resources.networkId !== networkId) {
            throw new Error(`Network already recorded as ${this.resources.networkId}, refusing to record ${networkId}`)
        }
        this.resources.networkId = networkId
    }

    recordSubnet(zone: string, subnetId: string): void {
        const existing = this.resources.subnets[zone]
        if (existing !== undefined && existing !== subnetId) {
            throw new Error(`Subnet for zone ${zone} already recorded as ${existing}, refusing to record ${subnetId}`)
        }
        this.resources.subnets[zone] = subnetId
    }

    recordFirewallRuleset(rulesetId: string): void {
        if (!this.resources.firewallRulesetIds.includes(rulesetId)) {
            this.resources.firewallRulesetIds.push(rulesetId)
        }
    }

    recordComputeInstance(instanceId: string, zone: string, instanceClass: string): void {
        if (this.resources.compute !== undefined) {
            throw new Error(`Compute instance already recorded as ${this.resources.compute.instanceId}`)
        }
        this.resources.compute = { instanceId, zone, instanceClass }
    }

    updateCompute(details: Partial<Omit<ProvisionedCompute, 'instanceId' | 'zone'>>): void {
        if (this.resources.compute === undefined) {
            throw new Error('No compute instance recorded')
        }
        Object.assign(this.resources.compute, lodash.omitBy(details, lodash.isUndefined))
    }

    recordDatabaseInstance(instanceId: string, zone: string, memoryTierMb: number): void {
        if (this.resources.database !== undefined) {
            throw new Error(`Database instance already recorded as ${this.resources.database.instanceId}`)
        }
        this.resources.database = { instanceId, zone, memoryTierMb }
    }

    updateDatabase(details: Partial<Omit<ProvisionedDatabase, 'instanceId' | 'zone'>>): void {
        if (this.resources.database === undefined) {
            throw new Error('No database instance recorded')
        }
        Object.assign(this.resources.database, lodash.omitBy(details, lodash.isUndefined))
    }

    /**
     * Deep copy of the current record; later recordings do not affect it.
     */
    snapshot(): ProvisionedResources {
        return lodash.cloneDeep(this.resources)
    }
}
