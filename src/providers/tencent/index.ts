import { resolveApiCredentials, type ApiCredentials } from '../../core/credentials'
import type { CloudProviderFactory } from '../../core/provider'
import { TencentCloudProvider } from './sdk-client'

export { TencentCloudProvider, type TencentCloudProviderArgs, type TencentClients } from './sdk-client'
export { classifyTencentError, toProviderCallError } from './error-mapping'
export { listRegionZones, TENCENT_REGION_ZONES } from './constants'

/**
 * Provider factory using environment credentials, resolved once.
 */
export function tencentProviderFactory(credentials: ApiCredentials = resolveApiCredentials()): CloudProviderFactory {
    return (region: string) => new TencentCloudProvider({ region, credentials })
}
