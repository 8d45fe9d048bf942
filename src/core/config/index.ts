/**
 * Core configuration module
 *
 * @description Session location, polling bounds and naming used by the provisioning core,
 * loaded from defaults and environment.
 */

export { CoreConfigSchema } from './interface'
export type { CoreConfig, PollingConfig } from './interface'
export { ConfigLoader, DEFAULT_CORE_CONFIG } from './default'
