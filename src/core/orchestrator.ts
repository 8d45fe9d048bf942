import { getLogger, Logger } from '../log/utils'
import type { CoreConfig } from './config/interface'
import { generateKeyPair, type GeneratedKeyPair } from './credentials'
import { Compensator, type TeardownReport } from './compensator'
import { isCloudForgeError, toError } from './errors/taxonomy'
import type { CloudProvider } from './provider'
import { ComputeProvisioner } from './provisioning/compute'
import { DatabaseProvisioner } from './provisioning/database'
import { NetworkProvisioner } from './provisioning/network'
import { mapDbClass, mapResourceClass } from './provisioning/resource-classes'
import {
    computeSnapshot,
    databaseSnapshot,
    errorSnapshot,
    networkSnapshot,
    SESSION_STAGES,
    specificationSnapshot,
    type Session,
    type SessionStore
} from './session'
import type { ResourceSpec } from './spec/resource-spec'
import { ProvisionedResources, ResourceLedger } from './state/resources'

export enum OrchestratorState {
    INIT = 'INIT',
    NETWORK_READY = 'NETWORK_READY',
    COMPUTE_READY = 'COMPUTE_READY',
    DATABASE_READY = 'DATABASE_READY',
    DONE = 'DONE',
    FAILED = 'FAILED',
    CLEANED_UP = 'CLEANED_UP',
}

const ALLOWED_TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
    [OrchestratorState.INIT]: [OrchestratorState.NETWORK_READY, OrchestratorState.FAILED],
    [OrchestratorState.NETWORK_READY]: [OrchestratorState.COMPUTE_READY, OrchestratorState.DATABASE_READY, OrchestratorState.DONE, OrchestratorState.FAILED],
    [OrchestratorState.COMPUTE_READY]: [OrchestratorState.DATABASE_READY, OrchestratorState.DONE, OrchestratorState.FAILED],
    [OrchestratorState.DATABASE_READY]: [OrchestratorState.DONE, OrchestratorState.FAILED],
    [OrchestratorState.DONE]: [],
    [OrchestratorState.FAILED]: [OrchestratorState.CLEANED_UP],
    [OrchestratorState.CLEANED_UP]: [],
}

export interface StateTransition {
    from: OrchestratorState
    to: OrchestratorState
    at: Date
}

export interface RemoteAccess {
    publicAddress: string
    privateKeyPath: string
    loginAccount: string
}

export interface ProvisionResult {
    sessionId: string
    sessionDir: string
    state: OrchestratorState
    resources: ProvisionedResources
    remoteAccess?: RemoteAccess
}

export interface OrchestratorArgs {
    spec: ResourceSpec
    config: CoreConfig
    provider: CloudProvider
    sessionStore: SessionStore
    signal?: AbortSignal
    /** Key pair generation, overridable for tests */
    keyPairGenerator?: (destDir: string) => Promise<GeneratedKeyPair>
    passwordGenerator?: () => string
}

/**
 * Drives one provisioning run: network, then compute and database when requested.
 *
 * Each completed stage is written to the session directory. On any failure the
 * run is rolled back through the Compensator using everything recorded in the
 * ledger, then the original error is rethrown.
 */
export class Orchestrator {

    private readonly logger: Logger
    private readonly args: OrchestratorArgs
    private readonly ledger: ResourceLedger
    private currentState: OrchestratorState = OrchestratorState.INIT
    private readonly history: StateTransition[] = []
    private lastTeardown?: TeardownReport

    constructor(args: OrchestratorArgs) {
        this.logger = getLogger(Orchestrator.name)
        this.args = args
        this.ledger = new ResourceLedger(args.spec.region)
    }

    get state(): OrchestratorState {
        return this.currentState
    }

    get transitions(): readonly StateTransition[] {
        return this.history
    }

    get teardownReport(): TeardownReport | undefined {
        return this.lastTeardown
    }

    get resources(): ProvisionedResources {
        return this.ledger.snapshot()
    }

    async run(): Promise<ProvisionResult> {
        if (this.currentState !== OrchestratorState.INIT) {
            throw new Error(`Orchestrator already ran (state ${this.currentState})`)
        }

        const { spec, sessionStore } = this.args
        const session = await sessionStore.createSession()
        this.logger.info(`Provisioning session ${session.id} in region ${spec.region}`)
        await sessionStore.recordStage(session, SESSION_STAGES.SPECIFICATION, specificationSnapshot(spec))

        try {
            const remoteAccess = await this.provision(session)
            this.transition(OrchestratorState.DONE)

            const resources = this.ledger.snapshot()
            await sessionStore.writeSummary(session, resources)
            this.logger.info(`Session ${session.id} provisioned`)

            return {
                sessionId: session.id,
                sessionDir: session.dir,
                state: this.currentState,
                resources,
                remoteAccess
            }
        } catch (error) {
            await this.rollback(session, error)
            if (isCloudForgeError(error)) {
                error.context.sessionDir = session.dir
            }
            throw error
        }
    }

    private async provision(session: Session): Promise<RemoteAccess | undefined> {
        const { spec, config, provider, sessionStore, signal } = this.args
        const ledger = this.ledger

        signal?.throwIfAborted()

        // Network
        const networkProvisioner = new NetworkProvisioner({ provider, ledger, namePrefix: config.namePrefix })
        const network = await networkProvisioner.createNetwork()
        const zones = provider.listZones().filter(z => network.subnets[z] !== undefined)
        await sessionStore.recordStage(session, SESSION_STAGES.NETWORK, networkSnapshot(ledger.snapshot()))
        this.transition(OrchestratorState.NETWORK_READY)

        // Compute
        let remoteAccess: RemoteAccess | undefined
        if (spec.compute) {
            signal?.throwIfAborted()
            const keyPair = await (this.args.keyPairGenerator ?? generateKeyPair)(session.dir)
            const { instanceClass, gpuEnabled } = mapResourceClass(spec.compute.cpuCores, spec.compute.memoryGb, spec.compute.gpuClass)
            const rulesetId = await networkProvisioner.createFirewallRuleset('compute')

            const computeProvisioner = new ComputeProvisioner({
                provider,
                ledger,
                namePrefix: config.namePrefix,
                imageId: config.imageId,
                loginAccount: config.loginAccount,
                polling: config.compute,
                signal
            })
            const instance = await computeProvisioner.createInstance({
                instanceClass,
                publicKey: keyPair.publicKey,
                rulesetId,
                gpuEnabled,
                diskGb: spec.compute.diskGb,
                zones,
                subnets: network.subnets
            })
            ledger.updateCompute({ privateKeyPath: keyPair.privateKeyPath, loginAccount: config.loginAccount })

            const addresses = await computeProvisioner.waitUntilRunning(instance.instanceId)
            await sessionStore.recordStage(session, SESSION_STAGES.COMPUTE, computeSnapshot(ledger.snapshot(), rulesetId))
            this.transition(OrchestratorState.COMPUTE_READY)

            remoteAccess = {
                publicAddress: addresses.publicAddress,
                privateKeyPath: keyPair.privateKeyPath,
                loginAccount: config.loginAccount
            }
        }

        // Database
        if (spec.database) {
            signal?.throwIfAborted()
            const memoryTierMb = mapDbClass(spec.database.cpuCores, spec.database.memoryMb)
            const rulesetId = await networkProvisioner.createFirewallRuleset('database')

            const databaseProvisioner = new DatabaseProvisioner({
                provider,
                ledger,
                namePrefix: config.namePrefix,
                polling: config.database,
                signal,
                passwordGenerator: this.args.passwordGenerator
            })
            const instance = await databaseProvisioner.createDbInstance({
                memoryTierMb,
                storageGb: spec.database.storageGb,
                engineVersion: spec.database.engineVersion,
                rulesetId,
                zones,
                subnets: network.subnets
            })
            await databaseProvisioner.waitUntilReady(instance.instanceId)
            await sessionStore.recordStage(session, SESSION_STAGES.DATABASE, databaseSnapshot(ledger.snapshot(), rulesetId))
            this.transition(OrchestratorState.DATABASE_READY)
        }

        return remoteAccess
    }

    private async rollback(session: Session, cause: unknown): Promise<void> {
        const { config, provider, sessionStore } = this.args
        const error = toError(cause)
        this.logger.error(`Provisioning of session ${session.id} failed: ${error.message}`)
        this.transition(OrchestratorState.FAILED)

        const resources = this.ledger.snapshot()
        await sessionStore.recordStage(session, SESSION_STAGES.ERROR, errorSnapshot(error, resources))

        // no abort signal here: teardown must run to completion after a cancel
        const compensator = new Compensator({ provider, detachGracePeriodMs: config.cleanup.detachGracePeriodMs })
        this.lastTeardown = await compensator.teardown(resources)
        this.transition(OrchestratorState.CLEANED_UP)

        await sessionStore.writeSummary(session, resources)
    }

    private transition(to: OrchestratorState): void {
        const from = this.currentState
        if (!ALLOWED_TRANSITIONS[from].includes(to)) {
            throw new Error(`Invalid state transition ${from} -> ${to}`)
        }
        this.history.push({ from, to, at: new Date() })
        this.currentState = to
        this.logger.info(`State ${from} -> ${to}`)
    }
}
