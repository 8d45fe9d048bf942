import * as assert from 'assert'
import * as sinon from 'sinon'
import { TencentCloudProvider, type TencentClients } from '../../../../src/providers/tencent/sdk-client'
import { listRegionZones } from '../../../../src/providers/tencent/constants'
import { ProviderCallError } from '../../../../src/core/errors/provisioning'

class FakeSdkException extends Error {
    constructor(readonly code: string, message: string) {
        super(message)
    }
}

describe('TencentCloudProvider', () => {
    const sandbox = sinon.createSandbox()
    let clients: {
        cvm: Record<'RunInstances' | 'DescribeInstances' | 'TerminateInstances', sinon.SinonStub>
        vpc: Record<'CreateVpc' | 'CreateSubnet' | 'CreateSecurityGroup' | 'CreateSecurityGroupPolicies' | 'DeleteSecurityGroup' | 'DeleteSubnet' | 'DeleteVpc', sinon.SinonStub>
        cdb: Record<'CreateDBInstanceHour' | 'DescribeDBInstances' | 'IsolateDBInstance', sinon.SinonStub>
    }
    let provider: TencentCloudProvider

    beforeEach(() => {
        clients = {
            cvm: {
                RunInstances: sandbox.stub().resolves({ InstanceIdSet: ['ins-abc'] }),
                DescribeInstances: sandbox.stub().resolves({ InstanceSet: [] }),
                TerminateInstances: sandbox.stub().resolves({}),
            },
            vpc: {
                CreateVpc: sandbox.stub().resolves({ Vpc: { VpcId: 'vpc-abc' } }),
                CreateSubnet: sandbox.stub().resolves({ Subnet: { SubnetId: 'subnet-abc' } }),
                CreateSecurityGroup: sandbox.stub().resolves({ SecurityGroup: { SecurityGroupId: 'sg-abc' } }),
                CreateSecurityGroupPolicies: sandbox.stub().resolves({}),
                DeleteSecurityGroup: sandbox.stub().resolves({}),
                DeleteSubnet: sandbox.stub().resolves({}),
                DeleteVpc: sandbox.stub().resolves({}),
            },
            cdb: {
                CreateDBInstanceHour: sandbox.stub().resolves({ InstanceIds: ['cdb-abc'] }),
                DescribeDBInstances: sandbox.stub().resolves({ TotalCount: 0, Items: [] }),
                IsolateDBInstance: sandbox.stub().resolves({}),
            },
        }
        const typedClients: TencentClients = clients
        provider = new TencentCloudProvider({
            region: 'ap-guangzhou',
            credentials: { secretId: 'test-id', secretKey: 'test-secret' },
            clients: typedClients
        })
    })

    afterEach(() => {
        sandbox.restore()
    })

    it('should list known zones in order and derive zones for other regions', () => {
        assert.deepStrictEqual(provider.listZones(), ['ap-guangzhou-3', 'ap-guangzhou-4', 'ap-guangzhou-6', 'ap-guangzhou-7'])
        assert.deepStrictEqual(listRegionZones('eu-frankfurt'), ['eu-frankfurt-1', 'eu-frankfurt-2', 'eu-frankfurt-3'])
    })

    it('should create a VPC and a subnet', async () => {
        assert.strictEqual(await provider.createNetwork('cf-vpc', '10.0.0.0/16'), 'vpc-abc')
        assert.strictEqual(await provider.createSubnet('vpc-abc', 'cf-subnet', '10.0.1.0/24', 'ap-guangzhou-3'), 'subnet-abc')

        sinon.assert.calledOnceWithExactly(clients.vpc.CreateVpc, { VpcName: 'cf-vpc', CidrBlock: '10.0.0.0/16' })
        sinon.assert.calledOnceWithExactly(clients.vpc.CreateSubnet, {
            VpcId: 'vpc-abc',
            SubnetName: 'cf-subnet',
            CidrBlock: '10.0.1.0/24',
            Zone: 'ap-guangzhou-3'
        })
    })

    it('should send ingress and egress rules as security group policies', async () => {
        await provider.addFirewallRules('sg-abc', [
            { direction: 'ingress', protocol: 'TCP', port: '3306', cidrBlock: '0.0.0.0/0', description: 'db' }
        ])

        sinon.assert.calledOnceWithExactly(clients.vpc.CreateSecurityGroupPolicies, {
            SecurityGroupId: 'sg-abc',
            SecurityGroupPolicySet: {
                Ingress: [{ Protocol: 'TCP', Port: '3306', CidrBlock: '0.0.0.0/0', Action: 'ACCEPT', PolicyDescription: 'db' }]
            }
        })
    })

    it('should launch a pay-as-you-go instance in the requested zone', async () => {
        const id = await provider.createInstance({
            name: 'cf-instance',
            zone: 'ap-guangzhou-4',
            instanceClass: 'S5.MEDIUM4',
            imageId: 'img-test',
            diskGb: 50,
            networkId: 'vpc-abc',
            subnetId: 'subnet-abc',
            firewallRulesetIds: ['sg-abc'],
            userData: 'IyEvYmluL2Jhc2gK'
        })

        assert.strictEqual(id, 'ins-abc')
        sinon.assert.calledOnceWithExactly(clients.cvm.RunInstances, {
            InstanceChargeType: 'POSTPAID_BY_HOUR',
            Placement: { Zone: 'ap-guangzhou-4' },
            InstanceType: 'S5.MEDIUM4',
            ImageId: 'img-test',
            SystemDisk: { DiskType: 'CLOUD_PREMIUM', DiskSize: 50 },
            InternetAccessible: {
                InternetChargeType: 'TRAFFIC_POSTPAID_BY_HOUR',
                InternetMaxBandwidthOut: 100,
                PublicIpAssigned: true
            },
            VirtualPrivateCloud: { VpcId: 'vpc-abc', SubnetId: 'subnet-abc' },
            InstanceName: 'cf-instance',
            UserData: 'IyEvYmluL2Jhc2gK',
            SecurityGroupIds: ['sg-abc'],
            InstanceCount: 1
        })
    })

    it('should classify a sold out zone as capacity exhausted', async () => {
        clients.cvm.RunInstances.rejects(new FakeSdkException('ResourceInsufficient.SpecifiedInstanceType', 'no stock'))

        await assert.rejects(provider.createInstance({
            name: 'cf-instance',
            zone: 'ap-guangzhou-3',
            instanceClass: 'S5.MEDIUM4',
            imageId: 'img-test',
            diskGb: 50,
            networkId: 'vpc-abc',
            subnetId: 'subnet-abc',
            firewallRulesetIds: [],
            userData: ''
        }), (error: unknown) => error instanceof ProviderCallError && error.kind === 'capacity-exhausted')
    })

    it('should fail when the API returns no ID', async () => {
        clients.cvm.RunInstances.resolves({ InstanceIdSet: [] })

        await assert.rejects(provider.createInstance({
            name: 'n', zone: 'z', instanceClass: 'c', imageId: 'i', diskGb: 20,
            networkId: 'v', subnetId: 's', firewallRulesetIds: [], userData: ''
        }), /RunInstances returned no resource ID/)
    })

    it('should describe instances', async () => {
        assert.strictEqual(await provider.describeInstance('ins-abc'), undefined)

        clients.cvm.DescribeInstances.resolves({ InstanceSet: [{
            InstanceState: 'RUNNING',
            PublicIpAddresses: ['203.0.113.2'],
            PrivateIpAddresses: ['10.0.1.2']
        }] })

        assert.deepStrictEqual(await provider.describeInstance('ins-abc'), {
            state: 'RUNNING',
            publicAddresses: ['203.0.113.2'],
            privateAddresses: ['10.0.1.2']
        })
        sinon.assert.calledWith(clients.cvm.DescribeInstances, { InstanceIds: ['ins-abc'] })
    })

    it('should create an hourly MySQL instance with the root password', async () => {
        const id = await provider.createDatabase({
            name: 'cf-db',
            zone: 'ap-guangzhou-3',
            memoryMb: 1000,
            storageGb: 25,
            engineVersion: '8.0',
            networkId: 'vpc-abc',
            subnetId: 'subnet-abc',
            firewallRulesetIds: ['sg-db'],
            port: 3306,
            rootPassword: 'test-password'
        })

        assert.strictEqual(id, 'cdb-abc')
        sinon.assert.calledOnceWithExactly(clients.cdb.CreateDBInstanceHour, {
            Memory: 1000,
            Volume: 25,
            GoodsNum: 1,
            Zone: 'ap-guangzhou-3',
            UniqVpcId: 'vpc-abc',
            UniqSubnetId: 'subnet-abc',
            ProjectId: 0,
            InstanceRole: 'master',
            EngineVersion: '8.0',
            InstanceName: 'cf-db',
            SecurityGroup: ['sg-db'],
            ProtectMode: 0,
            DeployMode: 0,
            MasterRegion: 'ap-guangzhou',
            Port: 3306,
            Password: 'test-password'
        })
    })

    it('should describe databases by status code', async () => {
        assert.strictEqual(await provider.describeDatabase('cdb-abc'), undefined)

        clients.cdb.DescribeDBInstances.resolves({ TotalCount: 1, Items: [{ Status: 1, Vip: '10.0.1.9', Vport: 3306 }] })
        assert.deepStrictEqual(await provider.describeDatabase('cdb-abc'), { statusCode: 1, host: '10.0.1.9', port: 3306 })

        clients.cdb.DescribeDBInstances.resolves({ TotalCount: 1, Items: [{ Status: 0, Vip: '', Vport: 0 }] })
        assert.deepStrictEqual(await provider.describeDatabase('cdb-abc'), { statusCode: 0, host: undefined, port: undefined })
    })

    it('should map a missing resource on delete to not-found', async () => {
        clients.vpc.DeleteVpc.rejects(new FakeSdkException('ResourceNotFound', 'vpc not found'))

        await assert.rejects(provider.deleteNetwork('vpc-abc'),
            (error: unknown) => error instanceof ProviderCallError && error.kind === 'not-found')
    })

    it('should isolate databases and terminate instances', async () => {
        await provider.isolateDatabase('cdb-abc')
        await provider.terminateInstance('ins-abc')
        await provider.deleteFirewallRuleset('sg-abc')
        await provider.deleteSubnet('subnet-abc')

        sinon.assert.calledOnceWithExactly(clients.cdb.IsolateDBInstance, { InstanceId: 'cdb-abc' })
        sinon.assert.calledOnceWithExactly(clients.cvm.TerminateInstances, { InstanceIds: ['ins-abc'] })
        sinon.assert.calledOnceWithExactly(clients.vpc.DeleteSecurityGroup, { SecurityGroupId: 'sg-abc' })
        sinon.assert.calledOnceWithExactly(clients.vpc.DeleteSubnet, { SubnetId: 'subnet-abc' })
    })
})
