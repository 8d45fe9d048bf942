export const TENCENT_ENDPOINTS = {
    CVM: 'cvm.tencentcloudapi.com',
    VPC: 'vpc.tencentcloudapi.com',
    CDB: 'cdb.tencentcloudapi.com',
} as const

/**
 * Zones known to offer the instance families we use, in preference order
 */
export const TENCENT_REGION_ZONES: Readonly<Record<string, readonly string[]>> = {
    'ap-guangzhou': ['ap-guangzhou-3', 'ap-guangzhou-4', 'ap-guangzhou-6', 'ap-guangzhou-7'],
    'ap-shanghai': ['ap-shanghai-2', 'ap-shanghai-3', 'ap-shanghai-4', 'ap-shanghai-5'],
    'ap-beijing': ['ap-beijing-3', 'ap-beijing-4', 'ap-beijing-5', 'ap-beijing-6', 'ap-beijing-7'],
    'ap-chengdu': ['ap-chengdu-1', 'ap-chengdu-2'],
    'ap-nanjing': ['ap-nanjing-1', 'ap-nanjing-2', 'ap-nanjing-3'],
    'ap-hongkong': ['ap-hongkong-2', 'ap-hongkong-3'],
    'ap-singapore': ['ap-singapore-1', 'ap-singapore-2', 'ap-singapore-3'],
}

const FALLBACK_ZONE_COUNT = 3

export function listRegionZones(region: string): string[] {
    const zones = TENCENT_REGION_ZONES[region]
    if (zones) {
        return [...zones]
    }
    return Array.from({ length: FALLBACK_ZONE_COUNT }, (_, i) => `${region}-${i + 1}`)
}

export const TENCENT_CVM = {
    CHARGE_TYPE: 'POSTPAID_BY_HOUR',
    SYSTEM_DISK_TYPE: 'CLOUD_PREMIUM',
    INTERNET_CHARGE_TYPE: 'TRAFFIC_POSTPAID_BY_HOUR',
    MAX_BANDWIDTH_OUT_MBPS: 100,
} as const

export const TENCENT_CDB = {
    INSTANCE_ROLE: 'master',
    PROJECT_ID: 0,
    PROTECT_MODE: 0,
    DEPLOY_MODE: 0,
} as const
