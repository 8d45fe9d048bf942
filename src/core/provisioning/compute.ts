import { getLogger, Logger } from '../../log/utils'
import { INSTANCE_STATE_RUNNING, type CloudProvider } from '../provider'
import type { PollingConfig } from '../config/interface'
import type { ResourceLedger } from '../state/resources'
import { createInFirstAvailableZone } from './zones'
import { pollUntil } from './polling'

export const GPU_DRIVER_VERSIONS = {
    driver: '535.161.07',
    cuda: '12.4.0',
    cudnn: '8.9.7',
} as const

const GPU_AUTO_INSTALL_URL = 'https://mirrors.tencentyun.com/install/GPU/auto_install.sh'

/**
 * Boot script run once by cloud-init, base64 encoded as the provider expects.
 *
 * Installs `publicKey` for `loginAccount`, grants it passwordless sudo and, on
 * GPU instances, starts the driver installer in the background.
 */
export function buildUserData(publicKey: string, gpuEnabled: boolean, loginAccount: string): string {
    const home = `/home/${loginAccount}`
    const lines = [
        '#!/bin/bash',
        `mkdir -p ${home}/.ssh`,
        `echo '${publicKey.trim()}' >> ${home}/.ssh/authorized_keys`,
        `chmod 700 ${home}/.ssh`,
        `chmod 600 ${home}/.ssh/authorized_keys`,
        `chown -R ${loginAccount}:${loginAccount} ${home}/.ssh`,
        `echo '${loginAccount} ALL=(ALL) NOPASSWD:ALL' > /etc/sudoers.d/${loginAccount}`,
        `chmod 440 /etc/sudoers.d/${loginAccount}`,
    ]

    if (gpuEnabled) {
        lines.push(
            'cat > /tmp/user_define_install_info.ini <<EOF',
            `DRIVER_VERSION=${GPU_DRIVER_VERSIONS.driver}`,
            `CUDA_VERSION=${GPU_DRIVER_VERSIONS.cuda}`,
            `CUDNN_VERSION=${GPU_DRIVER_VERSIONS.cudnn}`,
            'EOF',
            `wget -q -O /tmp/auto_install.sh ${GPU_AUTO_INSTALL_URL}`,
            'chmod +x /tmp/auto_install.sh',
            'nohup /tmp/auto_install.sh > /var/log/gpu_auto_install.log 2>&1 &',
        )
    }

    return Buffer.from(lines.join('\n') + '\n', 'utf-8').toString('base64')
}

export interface CreateComputeRequest {
    instanceClass: string
    publicKey: string
    rulesetId: string
    gpuEnabled: boolean
    diskGb: number
    /** candidate zones in preference order */
    zones: readonly string[]
    subnets: Readonly<Record<string, string>>
}

export interface ComputeInstance {
    instanceId: string
    zone: string
}

export interface ComputeAddresses {
    publicAddress: string
    privateAddress?: string
}

export interface ComputeProvisionerArgs {
    provider: CloudProvider
    ledger: ResourceLedger
    namePrefix: string
    imageId: string
    loginAccount: string
    polling: PollingConfig
    signal?: AbortSignal
}

export class ComputeProvisioner {

    private readonly logger: Logger
    private readonly args: ComputeProvisionerArgs

    constructor(args: ComputeProvisionerArgs) {
        this.logger = getLogger(ComputeProvisioner.name)
        this.args = args
    }

    async createInstance(request: CreateComputeRequest): Promise<ComputeInstance> {
        const { provider, ledger, namePrefix, imageId, loginAccount } = this.args
        const userData = buildUserData(request.publicKey, request.gpuEnabled, loginAccount)
        const networkId = ledger.snapshot().networkId
        if (networkId === undefined) {
            throw new Error('Compute instance requested before the network was created')
        }

        this.logger.info(`Creating compute instance ${request.instanceClass} (GPU: ${request.gpuEnabled})`)

        const created = await createInFirstAvailableZone({
            resource: 'compute',
            zones: request.zones,
            subnets: request.subnets,
            logger: this.logger,
            create: async (zone, subnetId) => {
                const instanceId = await provider.createInstance({
                    name: `${namePrefix}-instance`,
                    zone,
                    instanceClass: request.instanceClass,
                    imageId,
                    diskGb: request.diskGb,
                    networkId,
                    subnetId,
                    firewallRulesetIds: [request.rulesetId],
                    userData,
                })
                ledger.recordComputeInstance(instanceId, zone, request.instanceClass)
                return instanceId
            }
        })

        return { instanceId: created.value, zone: created.zone }
    }

    /**
     * Wait until the instance is running and has a public address.
     */
    async waitUntilRunning(instanceId: string, maxWaitMs: number = this.args.polling.maxWaitMs): Promise<ComputeAddresses> {
        const { provider, ledger, polling, signal } = this.args
        this.logger.info(`Waiting for compute instance ${instanceId} to be running`)

        const addresses = await pollUntil<ComputeAddresses>({
            resource: 'compute',
            resourceId: instanceId,
            expectedState: INSTANCE_STATE_RUNNING,
            polling: { ...polling, maxWaitMs },
            signal,
            check: async () => {
                const status = await provider.describeInstance(instanceId)
                this.logger.debug(`Instance ${instanceId} state: ${status?.state ?? 'unknown'}`)
                const publicAddress = status?.publicAddresses[0]
                if (status?.state !== INSTANCE_STATE_RUNNING || publicAddress === undefined) {
                    return undefined
                }
                return { publicAddress, privateAddress: status.privateAddresses[0] }
            }
        })

        ledger.updateCompute(addresses)
        this.logger.info(`Compute instance ${instanceId} running at ${addresses.publicAddress}`)
        return addresses
    }
}
