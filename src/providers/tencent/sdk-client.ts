import * as tencentcloud from 'tencentcloud-sdk-nodejs'
import { getLogger, Logger } from '../../log/utils'
import { ProviderCallError } from '../../core/errors/provisioning'
import type { ApiCredentials } from '../../core/credentials'
import type {
    CloudProvider,
    CreateDatabaseRequest,
    CreateInstanceRequest,
    DatabaseStatus,
    FirewallRule,
    InstanceStatus
} from '../../core/provider'
import { listRegionZones, TENCENT_CDB, TENCENT_CVM, TENCENT_ENDPOINTS } from './constants'
import { toProviderCallError } from './error-mapping'

const CvmSdkClient = tencentcloud.cvm.v20170312.Client
const VpcSdkClient = tencentcloud.vpc.v20170312.Client
const CdbSdkClient = tencentcloud.cdb.v20170320.Client

export type CvmClient = Pick<InstanceType<typeof CvmSdkClient>, 'RunInstances' | 'DescribeInstances' | 'TerminateInstances'>

export type VpcClient = Pick<InstanceType<typeof VpcSdkClient>,
    | 'CreateVpc'
    | 'CreateSubnet'
    | 'CreateSecurityGroup'
    | 'CreateSecurityGroupPolicies'
    | 'DeleteSecurityGroup'
    | 'DeleteSubnet'
    | 'DeleteVpc'
>

export type CdbClient = Pick<InstanceType<typeof CdbSdkClient>, 'CreateDBInstanceHour' | 'DescribeDBInstances' | 'IsolateDBInstance'>

export interface TencentClients {
    cvm: CvmClient
    vpc: VpcClient
    cdb: CdbClient
}

export interface TencentCloudProviderArgs {
    region: string
    credentials: ApiCredentials
    /** Pre-built SDK clients, mocked for unit tests */
    clients?: Partial<TencentClients>
}

function sdkClientConfig(region: string, credentials: ApiCredentials, endpoint: string) {
    return {
        credential: { secretId: credentials.secretId, secretKey: credentials.secretKey },
        region,
        profile: { httpProfile: { endpoint } }
    }
}

/**
 * CloudProvider backed by the Tencent Cloud CVM, VPC and CDB APIs.
 */
export class TencentCloudProvider implements CloudProvider {

    readonly region: string
    private readonly logger: Logger
    private readonly cvm: CvmClient
    private readonly vpc: VpcClient
    private readonly cdb: CdbClient

    constructor(args: TencentCloudProviderArgs) {
        this.logger = getLogger(TencentCloudProvider.name)
        this.region = args.region
        this.cvm = args.clients?.cvm ?? new CvmSdkClient(sdkClientConfig(args.region, args.credentials, TENCENT_ENDPOINTS.CVM))
        this.vpc = args.clients?.vpc ?? new VpcSdkClient(sdkClientConfig(args.region, args.credentials, TENCENT_ENDPOINTS.VPC))
        this.cdb = args.clients?.cdb ?? new CdbSdkClient(sdkClientConfig(args.region, args.credentials, TENCENT_ENDPOINTS.CDB))
    }

    listZones(): string[] {
        return listRegionZones(this.region)
    }

    async createNetwork(name: string, cidrBlock: string): Promise<string> {
        const response = await this.call('CreateVpc', () => this.vpc.CreateVpc({ VpcName: name, CidrBlock: cidrBlock }))
        return this.requireId('CreateVpc', response.Vpc?.VpcId)
    }

    async createSubnet(networkId: string, name: string, cidrBlock: string, zone: string): Promise<string> {
        const response = await this.call('CreateSubnet', () => this.vpc.CreateSubnet({
            VpcId: networkId,
            SubnetName: name,
            CidrBlock: cidrBlock,
            Zone: zone
        }))
        return this.requireId('CreateSubnet', response.Subnet?.SubnetId)
    }

    async createFirewallRuleset(name: string, description: string): Promise<string> {
        const response = await this.call('CreateSecurityGroup', () => this.vpc.CreateSecurityGroup({
            GroupName: name,
            GroupDescription: description
        }))
        return this.requireId('CreateSecurityGroup', response.SecurityGroup?.SecurityGroupId)
    }

    async addFirewallRules(rulesetId: string, rules: FirewallRule[]): Promise<void> {
        const toPolicy = (rule: FirewallRule) => ({
            Protocol: rule.protocol,
            Port: rule.port,
            CidrBlock: rule.cidrBlock,
            Action: 'ACCEPT',
            PolicyDescription: rule.description
        })
        const ingress = rules.filter(r => r.direction === 'ingress').map(toPolicy)
        const egress = rules.filter(r => r.direction === 'egress').map(toPolicy)

        await this.call('CreateSecurityGroupPolicies', () => this.vpc.CreateSecurityGroupPolicies({
            SecurityGroupId: rulesetId,
            SecurityGroupPolicySet: {
                ...(ingress.length > 0 ? { Ingress: ingress } : {}),
                ...(egress.length > 0 ? { Egress: egress } : {})
            }
        }))
    }

    async createInstance(request: CreateInstanceRequest): Promise<string> {
        const response = await this.call('RunInstances', () => this.cvm.RunInstances({
            InstanceChargeType: TENCENT_CVM.CHARGE_TYPE,
            Placement: { Zone: request.zone },
            InstanceType: request.instanceClass,
            ImageId: request.imageId,
            SystemDisk: { DiskType: TENCENT_CVM.SYSTEM_DISK_TYPE, DiskSize: request.diskGb },
            InternetAccessible: {
                InternetChargeType: TENCENT_CVM.INTERNET_CHARGE_TYPE,
                InternetMaxBandwidthOut: TENCENT_CVM.MAX_BANDWIDTH_OUT_MBPS,
                PublicIpAssigned: true
            },
            VirtualPrivateCloud: { VpcId: request.networkId, SubnetId: request.subnetId },
            InstanceName: request.name,
            UserData: request.userData,
            SecurityGroupIds: request.firewallRulesetIds,
            InstanceCount: 1
        }))
        return this.requireId('RunInstances', response.InstanceIdSet?.[0])
    }

    async describeInstance(instanceId: string): Promise<InstanceStatus | undefined> {
        const response = await this.call('DescribeInstances', () => this.cvm.DescribeInstances({ InstanceIds: [instanceId] }))
        const instance = response.InstanceSet?.[0]
        if (!instance) {
            return undefined
        }
        return {
            state: instance.InstanceState ?? 'UNKNOWN',
            publicAddresses: instance.PublicIpAddresses ?? [],
            privateAddresses: instance.PrivateIpAddresses ?? []
        }
    }

    async createDatabase(request: CreateDatabaseRequest): Promise<string> {
        const response = await this.call('CreateDBInstanceHour', () => this.cdb.CreateDBInstanceHour({
            Memory: request.memoryMb,
            Volume: request.storageGb,
            GoodsNum: 1,
            Zone: request.zone,
            UniqVpcId: request.networkId,
            UniqSubnetId: request.subnetId,
            ProjectId: TENCENT_CDB.PROJECT_ID,
            InstanceRole: TENCENT_CDB.INSTANCE_ROLE,
            EngineVersion: request.engineVersion,
            InstanceName: request.name,
            SecurityGroup: request.firewallRulesetIds,
            ProtectMode: TENCENT_CDB.PROTECT_MODE,
            DeployMode: TENCENT_CDB.DEPLOY_MODE,
            MasterRegion: this.region,
            Port: request.port,
            Password: request.rootPassword
        }))
        return this.requireId('CreateDBInstanceHour', response.InstanceIds?.[0])
    }

    async describeDatabase(instanceId: string): Promise<DatabaseStatus | undefined> {
        const response = await this.call('DescribeDBInstances', () => this.cdb.DescribeDBInstances({ InstanceIds: [instanceId] }))
        const item = response.Items?.[0]
        if (!response.TotalCount || !item) {
            return undefined
        }
        return {
            statusCode: item.Status ?? -1,
            host: item.Vip || undefined,
            port: item.Vport || undefined
        }
    }

    async terminateInstance(instanceId: string): Promise<void> {
        await this.call('TerminateInstances', () => this.cvm.TerminateInstances({ InstanceIds: [instanceId] }))
    }

    async isolateDatabase(instanceId: string): Promise<void> {
        await this.call('IsolateDBInstance', () => this.cdb.IsolateDBInstance({ InstanceId: instanceId }))
    }

    async deleteFirewallRuleset(rulesetId: string): Promise<void> {
        await this.call('DeleteSecurityGroup', () => this.vpc.DeleteSecurityGroup({ SecurityGroupId: rulesetId }))
    }

    async deleteSubnet(subnetId: string): Promise<void> {
        await this.call('DeleteSubnet', () => this.vpc.DeleteSubnet({ SubnetId: subnetId }))
    }

    async deleteNetwork(networkId: string): Promise<void> {
        await this.call('DeleteVpc', () => this.vpc.DeleteVpc({ VpcId: networkId }))
    }

    private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        this.logger.debug(`Calling ${operation} in ${this.region}`)
        try {
            return await fn()
        } catch (error) {
            const mapped = toProviderCallError(operation, error)
            this.logger.debug(`${operation} failed: ${mapped.kind} (${mapped.providerCode})`)
            throw mapped
        }
    }

    private requireId(operation: string, id: string | undefined): string {
        if (!id) {
            throw new ProviderCallError('other', {
                operation,
                providerCode: 'EmptyResponse',
                providerMessage: `${operation} returned no resource ID`
            })
        }
        return id
    }
}
