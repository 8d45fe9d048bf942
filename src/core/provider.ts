/**
 * Provider-neutral view of the cloud API used by the provisioning core.
 *
 * Implementations are bound to one region. Every failure they raise is a
 * ProviderCallError whose `kind` has already been classified, so the core can
 * decide on zone fallback or "already deleted" without looking at provider
 * messages.
 */

import type { DatabaseEngineVersion } from './const'

export interface FirewallRule {
    direction: 'ingress' | 'egress'
    protocol: 'ALL' | 'TCP' | 'UDP'
    /** 'ALL', a single port or a range such as '8000-9000' */
    port: string
    cidrBlock: string
    description: string
}

export interface CreateInstanceRequest {
    name: string
    zone: string
    instanceClass: string
    imageId: string
    diskGb: number
    networkId: string
    subnetId: string
    firewallRulesetIds: string[]
    /** base64 encoded boot script */
    userData: string
}

export interface InstanceStatus {
    state: string
    publicAddresses: string[]
    privateAddresses: string[]
}

export interface CreateDatabaseRequest {
    name: string
    zone: string
    memoryMb: number
    storageGb: number
    engineVersion: DatabaseEngineVersion
    networkId: string
    subnetId: string
    firewallRulesetIds: string[]
    port: number
    rootPassword: string
}

export interface DatabaseStatus {
    /** provider status code, 1 meaning running */
    statusCode: number
    host?: string
    port?: number
}

export const INSTANCE_STATE_RUNNING = 'RUNNING'
export const DATABASE_STATUS_RUNNING = 1

export interface CloudProvider {
    readonly region: string

    /** Ordered candidate zones of the region */
    listZones(): string[]

    createNetwork(name: string, cidrBlock: string): Promise<string>
    createSubnet(networkId: string, name: string, cidrBlock: string, zone: string): Promise<string>

    createFirewallRuleset(name: string, description: string): Promise<string>
    addFirewallRules(rulesetId: string, rules: FirewallRule[]): Promise<void>

    createInstance(request: CreateInstanceRequest): Promise<string>
    /** undefined when the provider does not list the instance (yet) */
    describeInstance(instanceId: string): Promise<InstanceStatus | undefined>

    createDatabase(request: CreateDatabaseRequest): Promise<string>
    describeDatabase(instanceId: string): Promise<DatabaseStatus | undefined>

    terminateInstance(instanceId: string): Promise<void>
    /** Soft delete: the provider keeps the database for a grace window */
    isolateDatabase(instanceId: string): Promise<void>
    deleteFirewallRuleset(rulesetId: string): Promise<void>
    deleteSubnet(subnetId: string): Promise<void>
    deleteNetwork(networkId: string): Promise<void>
}

/**
 * Builds a provider bound to a region. Used by the cleanup tool, which only
 * learns the region after reading a session.
 */
export type CloudProviderFactory = (region: string) => CloudProvider
