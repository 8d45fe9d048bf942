import * as os from 'os'
import * as path from 'path'
import lodash from 'lodash'
import type { PartialDeep } from 'type-fest'
import { CoreConfig, CoreConfigSchema } from './interface'
import {
    CLOUDFORGE_HOME_DIRNAME,
    CLOUDFORGE_SESSION_DIRNAME,
    DEFAULT_IMAGE_ID,
    DEFAULT_LOGIN_ACCOUNT,
    DEFAULT_NAME_PREFIX
} from '../const'
import { InvalidConfigurationError } from '../errors/provisioning'

export const DEFAULT_CORE_CONFIG: CoreConfig = {
    sessionRootDir: path.join(os.homedir(), CLOUDFORGE_HOME_DIRNAME, CLOUDFORGE_SESSION_DIRNAME),
    loginAccount: DEFAULT_LOGIN_ACCOUNT,
    imageId: DEFAULT_IMAGE_ID,
    namePrefix: DEFAULT_NAME_PREFIX,
    compute: {
        pollIntervalMs: 10_000,
        maxWaitMs: 300_000,
    },
    database: {
        pollIntervalMs: 10_000,
        maxWaitMs: 600_000,
    },
    cleanup: {
        detachGracePeriodMs: 30_000,
    },
}

function parseIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name]
    if (raw === undefined || raw === '') {
        return undefined
    }
    return Number(raw)
}

/**
 * Builds core configuration from defaults, environment variables and explicit overrides
 * (highest precedence last).
 */
export class ConfigLoader {

    static fromEnv(env: NodeJS.ProcessEnv): PartialDeep<CoreConfig> {
        return {
            sessionRootDir: env.CLOUDFORGE_SESSION_DIR || undefined,
            loginAccount: env.CLOUDFORGE_LOGIN_ACCOUNT || undefined,
            imageId: env.CLOUDFORGE_IMAGE_ID || undefined,
            compute: {
                pollIntervalMs: parseIntEnv(env, 'CLOUDFORGE_COMPUTE_POLL_INTERVAL_MS'),
                maxWaitMs: parseIntEnv(env, 'CLOUDFORGE_COMPUTE_MAX_WAIT_MS'),
            },
            database: {
                pollIntervalMs: parseIntEnv(env, 'CLOUDFORGE_DATABASE_POLL_INTERVAL_MS'),
                maxWaitMs: parseIntEnv(env, 'CLOUDFORGE_DATABASE_MAX_WAIT_MS'),
            },
            cleanup: {
                detachGracePeriodMs: parseIntEnv(env, 'CLOUDFORGE_DETACH_GRACE_PERIOD_MS'),
            },
        }
    }

    static load(env: NodeJS.ProcessEnv = process.env, overrides: PartialDeep<CoreConfig> = {}): CoreConfig {
        // lodash merge skips undefined source values, keeping defaults
        const merged: unknown = lodash.merge({}, DEFAULT_CORE_CONFIG, ConfigLoader.fromEnv(env), overrides)

        const result = CoreConfigSchema.safeParse(merged)
        if (!result.success) {
            throw new InvalidConfigurationError(
                result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
                result.error
            )
        }
        return result.data
    }
}
