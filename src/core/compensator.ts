import { getLogger, Logger } from '../log/utils'
import { isProviderCallError } from './errors/provisioning'
import { toError } from './errors/taxonomy'
import type { CloudProvider } from './provider'
import type { ProvisionedResources } from './state/resources'
import { sleep } from './provisioning/polling'

export type TeardownResourceKind = 'compute' | 'database' | 'firewall-ruleset' | 'subnet' | 'network'

export type TeardownOutcome = 'deleted' | 'absent' | 'failed'

export interface TeardownStep {
    resource: TeardownResourceKind
    id: string
    outcome: TeardownOutcome
    error?: string
}

export interface TeardownReport {
    steps: TeardownStep[]
}

export function teardownSucceeded(report: TeardownReport): boolean {
    return report.steps.every(s => s.outcome !== 'failed')
}

export interface CompensatorArgs {
    provider: CloudProvider
    /**
     * Pause after deleting instances so the provider releases their network
     * interfaces before subnets and rulesets are deleted. 0 to skip.
     */
    detachGracePeriodMs?: number
}

/**
 * Best-effort teardown of a resource record.
 *
 * Order is fixed: compute, database (isolated, the provider's soft delete),
 * firewall rulesets, subnets, network. A failed step is logged and the next one
 * is still attempted. A resource the provider no longer knows counts as absent,
 * so running teardown twice is harmless.
 */
export class Compensator {

    private readonly logger: Logger
    private readonly provider: CloudProvider
    private readonly detachGracePeriodMs: number

    constructor(args: CompensatorArgs) {
        this.logger = getLogger(Compensator.name)
        this.provider = args.provider
        this.detachGracePeriodMs = args.detachGracePeriodMs ?? 0
    }

    async teardown(resources: ProvisionedResources): Promise<TeardownReport> {
        const steps: TeardownStep[] = []
        this.logger.info(`Tearing down resources in region ${resources.region}`)

        if (resources.compute) {
            const instanceId = resources.compute.instanceId
            steps.push(await this.step('compute', instanceId, () => this.provider.terminateInstance(instanceId)))
        }

        if (resources.database) {
            const instanceId = resources.database.instanceId
            steps.push(await this.step('database', instanceId, () => this.provider.isolateDatabase(instanceId)))
        }

        if ((resources.compute || resources.database) && this.detachGracePeriodMs > 0) {
            this.logger.info(`Waiting ${this.detachGracePeriodMs} ms for instances to release network resources`)
            await sleep(this.detachGracePeriodMs)
        }

        for (const rulesetId of resources.firewallRulesetIds) {
            steps.push(await this.step('firewall-ruleset', rulesetId, () => this.provider.deleteFirewallRuleset(rulesetId)))
        }

        for (const subnetId of Object.values(resources.subnets)) {
            steps.push(await this.step('subnet', subnetId, () => this.provider.deleteSubnet(subnetId)))
        }

        if (resources.networkId !== undefined) {
            const networkId = resources.networkId
            steps.push(await this.step('network', networkId, () => this.provider.deleteNetwork(networkId)))
        }

        const failed = steps.filter(s => s.outcome === 'failed').length
        if (failed > 0) {
            this.logger.warn(`Teardown finished with ${failed} failed step(s), manual cleanup may be required`)
        } else {
            this.logger.info(`Teardown finished (${steps.length} step(s))`)
        }

        return { steps }
    }

    private async step(resource: TeardownResourceKind, id: string, remove: () => Promise<void>): Promise<TeardownStep> {
        try {
            await remove()
            this.logger.info(`Deleted ${resource} ${id}`)
            return { resource, id, outcome: 'deleted' }
        } catch (error) {
            if (isProviderCallError(error) && error.kind === 'not-found') {
                this.logger.info(`${resource} ${id} already gone`)
                return { resource, id, outcome: 'absent' }
            }
            const message = toError(error).message
            this.logger.error(`Failed to delete ${resource} ${id}: ${message}`)
            return { resource, id, outcome: 'failed', error: message }
        }
    }
}
