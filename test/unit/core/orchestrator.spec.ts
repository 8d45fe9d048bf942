import * as assert from 'assert'
import * as fs from 'fs'
import * as path from 'path'
import { expect } from 'chai'
import { Orchestrator, OrchestratorState } from '../../../src/core/orchestrator'
import { SessionStore } from '../../../src/core/session'
import { parseResourceSpec, type ResourceSpecInput } from '../../../src/core/spec/resource-spec'
import { NoZoneAvailableError, ProviderCallError, ProvisioningTimeoutError } from '../../../src/core/errors/provisioning'
import type { CoreConfig } from '../../../src/core/config'
import {
    createTempDir,
    FakeCloudProvider,
    getUnitTestCoreConfig,
    removeTempDir,
    TEST_PASSWORD,
    TEST_PUBLIC_KEY
} from '../../utils/cloudforge-test-helpers'

const COMPUTE_ONLY: ResourceSpecInput = {
    region: 'r1',
    compute: { cpuCores: 2, memoryGb: 4, diskGb: 50 },
    database: null
}

const COMPUTE_AND_DATABASE: ResourceSpecInput = {
    region: 'r1',
    compute: { cpuCores: 2, memoryGb: 4, diskGb: 50 },
    database: { cpuCores: 1, memoryMb: 1000, storageGb: 25, engineVersion: '5.7' }
}

describe('Orchestrator', () => {
    let rootDir: string
    let config: CoreConfig
    let provider: FakeCloudProvider

    beforeEach(async () => {
        rootDir = await createTempDir()
        config = getUnitTestCoreConfig(rootDir)
        provider = new FakeCloudProvider('r1', ['r1-a', 'r1-b'])
    })

    afterEach(async () => {
        await removeTempDir(rootDir)
    })

    function newOrchestrator(spec: ResourceSpecInput, signal?: AbortSignal): Orchestrator {
        return new Orchestrator({
            spec: parseResourceSpec(spec),
            config,
            provider,
            sessionStore: new SessionStore({ rootDir }),
            signal,
            keyPairGenerator: async (destDir) => ({ privateKeyPath: path.join(destDir, 'ssh_key'), publicKey: TEST_PUBLIC_KEY }),
            passwordGenerator: () => TEST_PASSWORD
        })
    }

    async function onlySessionDir(): Promise<string> {
        const entries = await fs.promises.readdir(rootDir)
        assert.strictEqual(entries.length, 1)
        return path.join(rootDir, entries[0])
    }

    it('should fall back to the second zone when the first has no capacity', async () => {
        provider.instanceFailures.set('r1-a', 'capacity-exhausted')
        const orchestrator = newOrchestrator(COMPUTE_ONLY)

        const result = await orchestrator.run()

        assert.strictEqual(result.state, OrchestratorState.DONE)
        assert.strictEqual(result.resources.compute?.zone, 'r1-b')
        assert.strictEqual(result.resources.database, undefined)
        assert.deepStrictEqual(orchestrator.transitions.map(t => t.to), [
            OrchestratorState.NETWORK_READY,
            OrchestratorState.COMPUTE_READY,
            OrchestratorState.DONE
        ])
        assert.deepStrictEqual(result.remoteAccess, {
            publicAddress: '203.0.113.10',
            privateKeyPath: path.join(result.sessionDir, 'ssh_key'),
            loginAccount: 'ubuntu'
        })
    })

    it('should write one stage file per completed stage and a summary', async () => {
        const result = await newOrchestrator(COMPUTE_ONLY).run()

        const files = (await fs.promises.readdir(result.sessionDir)).sort()
        assert.deepStrictEqual(files, [
            '00_specification_info.txt',
            '01_network_info.txt',
            '02_compute_info.txt',
            'resources.json'
        ])
        const summary: unknown = JSON.parse(await fs.promises.readFile(path.join(result.sessionDir, 'resources.json'), 'utf-8'))
        assert.deepStrictEqual(summary, result.resources)

        const compute = await fs.promises.readFile(path.join(result.sessionDir, '02_compute_info.txt'), 'utf-8')
        const lines = compute.split('\n')
        expect(lines).to.include('Instance ID: ins-5')
        expect(lines).to.include('Instance Zone: r1-a')
        expect(lines).to.include('Security Group: sg-4')
    })

    it('should fail with NoZoneAvailable and tear down only the network when every zone is exhausted', async () => {
        provider.instanceFailures.set('r1-a', 'capacity-exhausted')
        provider.instanceFailures.set('r1-b', 'capacity-exhausted')
        const orchestrator = newOrchestrator(COMPUTE_ONLY)

        await assert.rejects(orchestrator.run(), NoZoneAvailableError)

        assert.deepStrictEqual(orchestrator.transitions.map(t => t.to), [
            OrchestratorState.NETWORK_READY,
            OrchestratorState.FAILED,
            OrchestratorState.CLEANED_UP
        ])
        assert.strictEqual(orchestrator.resources.compute, undefined)
        assert.strictEqual(provider.callsTo('terminateInstance').length, 0)
        assert.deepStrictEqual(provider.callsTo('deleteSubnet').map(c => c.args[0]), ['subnet-2', 'subnet-3'])
        assert.deepStrictEqual(provider.callsTo('deleteNetwork').map(c => c.args[0]), ['vpc-1'])
        assert.strictEqual(provider.live.size, 0)
        assert.ok(orchestrator.teardownReport?.steps.every(s => s.outcome === 'deleted'))
    })

    it('should record the failure with every known resource in an error stage file', async () => {
        provider.instanceFailures.set('r1-a', 'capacity-exhausted')
        provider.instanceFailures.set('r1-b', 'capacity-exhausted')

        try {
            await newOrchestrator(COMPUTE_ONLY).run()
            assert.fail('should have thrown')
        } catch (error) {
            const sessionDir = await onlySessionDir()
            expect(error).to.be.instanceOf(NoZoneAvailableError)
            if (error instanceof NoZoneAvailableError) {
                expect(error.context.sessionDir).to.equal(sessionDir)
            }
            const lines = (await fs.promises.readFile(path.join(sessionDir, '99_error_info.txt'), 'utf-8')).split('\n')
            expect(lines).to.include('Error Code: INFRA_002')
            expect(lines).to.include('Network ID: vpc-1')
            expect(lines).to.include('  r1-a: subnet-2')
            expect(lines).to.include('  r1-b: subnet-3')
        }
    })

    it('should tear down an instance that never became ready', async () => {
        provider.instanceStatuses = [{ state: 'PENDING', publicAddresses: [], privateAddresses: [] }]
        const orchestrator = newOrchestrator(COMPUTE_ONLY)

        await assert.rejects(orchestrator.run(), ProvisioningTimeoutError)

        assert.deepStrictEqual(provider.callsTo('terminateInstance').map(c => c.args[0]), ['ins-5'])
        assert.strictEqual(provider.live.size, 0)
        assert.strictEqual(orchestrator.state, OrchestratorState.CLEANED_UP)
    })

    it('should provision compute then database', async () => {
        const orchestrator = newOrchestrator(COMPUTE_AND_DATABASE)

        const result = await orchestrator.run()

        assert.deepStrictEqual(orchestrator.transitions.map(t => t.to), [
            OrchestratorState.NETWORK_READY,
            OrchestratorState.COMPUTE_READY,
            OrchestratorState.DATABASE_READY,
            OrchestratorState.DONE
        ])
        assert.deepStrictEqual(result.resources.database, {
            instanceId: 'cdb-7',
            zone: 'r1-a',
            memoryTierMb: 1000,
            host: '10.0.2.20',
            port: 3306,
            username: 'root',
            password: TEST_PASSWORD
        })
        assert.deepStrictEqual(result.resources.firewallRulesetIds, ['sg-4', 'sg-6'])
        assert.ok(fs.existsSync(path.join(result.sessionDir, '03_database_info.txt')))
    })

    it('should terminate the compute instance when the database stage fails', async () => {
        provider.databaseFailures.set('r1-a', 'other')
        const orchestrator = newOrchestrator(COMPUTE_AND_DATABASE)

        await assert.rejects(orchestrator.run(), ProviderCallError)

        assert.deepStrictEqual(orchestrator.transitions.map(t => t.to), [
            OrchestratorState.NETWORK_READY,
            OrchestratorState.COMPUTE_READY,
            OrchestratorState.FAILED,
            OrchestratorState.CLEANED_UP
        ])
        assert.strictEqual(orchestrator.resources.database, undefined)
        assert.deepStrictEqual(provider.callsTo('terminateInstance').map(c => c.args[0]), ['ins-5'])
        assert.strictEqual(provider.callsTo('isolateDatabase').length, 0)
        assert.deepStrictEqual(provider.callsTo('deleteFirewallRuleset').map(c => c.args[0]), ['sg-4', 'sg-6'])
        assert.strictEqual(provider.live.size, 0)
    })

    it('should provision a database without compute', async () => {
        const result = await newOrchestrator({ ...COMPUTE_AND_DATABASE, compute: null }).run()

        assert.strictEqual(result.resources.compute, undefined)
        assert.strictEqual(result.remoteAccess, undefined)
        assert.strictEqual(result.resources.database?.instanceId, 'cdb-5')
    })

    it('should roll back when cancelled', async () => {
        const controller = new AbortController()
        controller.abort(new Error('cancelled by test'))
        const orchestrator = newOrchestrator(COMPUTE_ONLY, controller.signal)

        await assert.rejects(orchestrator.run(), /cancelled by test/)

        assert.strictEqual(orchestrator.state, OrchestratorState.CLEANED_UP)
        assert.deepStrictEqual(provider.operations(), [])
    })

    it('should refuse to run twice', async () => {
        const orchestrator = newOrchestrator(COMPUTE_ONLY)
        await orchestrator.run()
        await assert.rejects(orchestrator.run(), /already ran/)
    })
})
