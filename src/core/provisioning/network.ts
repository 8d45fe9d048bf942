import { getLogger, Logger } from '../../log/utils'
import { DATABASE_PORT, NETWORK_CIDR_BLOCK } from '../const'
import { NetworkProvisioningFailedError } from '../errors/provisioning'
import { toError } from '../errors/taxonomy'
import type { CloudProvider, FirewallRule } from '../provider'
import type { ResourceLedger } from '../state/resources'

export type FirewallPurpose = 'compute' | 'database'

export interface NetworkResult {
    networkId: string
    /** zone -> subnet ID, only zones where a subnet was created */
    subnets: Record<string, string>
}

const ANYWHERE = '0.0.0.0/0'

const FIREWALL_RULES: Record<FirewallPurpose, FirewallRule[][]> = {
    // ingress and egress are attached in separate calls
    compute: [
        [{ direction: 'ingress', protocol: 'ALL', port: 'ALL', cidrBlock: ANYWHERE, description: 'Allow all inbound' }],
        [{ direction: 'egress', protocol: 'ALL', port: 'ALL', cidrBlock: ANYWHERE, description: 'Allow all outbound' }],
    ],
    database: [
        [{ direction: 'ingress', protocol: 'TCP', port: String(DATABASE_PORT), cidrBlock: ANYWHERE, description: 'Allow database port' }],
    ],
}

/**
 * Subnet address block for the zone at `index` in the candidate list: 10.0.<index+1>.0/24
 */
export function subnetCidrBlock(index: number, networkCidr: string = NETWORK_CIDR_BLOCK): string {
    const [a, b] = networkCidr.split('/')[0].split('.')
    return `${a}.${b}.${index + 1}.0/24`
}

export interface NetworkProvisionerArgs {
    provider: CloudProvider
    ledger: ResourceLedger
    namePrefix: string
}

export class NetworkProvisioner {

    private readonly logger: Logger
    private readonly args: NetworkProvisionerArgs

    constructor(args: NetworkProvisionerArgs) {
        this.logger = getLogger(NetworkProvisioner.name)
        this.args = args
    }

    /**
     * Create the session network and one subnet per candidate zone.
     *
     * A zone whose subnet fails is skipped; it only fails when no zone got a subnet.
     */
    async createNetwork(): Promise<NetworkResult> {
        const { provider, ledger, namePrefix } = this.args

        this.logger.info(`Creating network in region ${provider.region}`)
        const networkId = await provider.createNetwork(`${namePrefix}-vpc`, NETWORK_CIDR_BLOCK)
        ledger.recordNetwork(networkId)
        this.logger.info(`Network created: ${networkId}`)

        const zones = provider.listZones()
        const subnets: Record<string, string> = {}

        for (const [index, zone] of zones.entries()) {
            const cidrBlock = subnetCidrBlock(index)
            try {
                const subnetId = await provider.createSubnet(networkId, `${namePrefix}-subnet-${zone}`, cidrBlock, zone)
                ledger.recordSubnet(zone, subnetId)
                subnets[zone] = subnetId
                this.logger.info(`Subnet ${subnetId} created in zone ${zone} (${cidrBlock})`)
            } catch (error) {
                this.logger.warn(`Could not create subnet in zone ${zone}, skipping zone: ${toError(error).message}`)
            }
        }

        if (Object.keys(subnets).length === 0) {
            throw new NetworkProvisioningFailedError({ networkId, zones })
        }

        return { networkId, subnets }
    }

    /**
     * Create a firewall ruleset for the given purpose. The ruleset ID is recorded
     * before rules are attached so it is torn down even if attaching fails.
     */
    async createFirewallRuleset(purpose: FirewallPurpose): Promise<string> {
        const { provider, ledger, namePrefix } = this.args

        const rulesetId = await provider.createFirewallRuleset(`${namePrefix}-${purpose}-sg`, `${namePrefix} ${purpose} access`)
        ledger.recordFirewallRuleset(rulesetId)

        for (const rules of FIREWALL_RULES[purpose]) {
            await provider.addFirewallRules(rulesetId, rules)
        }

        this.logger.info(`Firewall ruleset ${rulesetId} created for ${purpose}`)
        return rulesetId
    }
}
