import { isProviderCallError, NoZoneAvailableError, ZonalResourceKind } from '../errors/provisioning'
import type { Logger } from '../../log/utils'

/**
 * Outcome of one creation attempt in one zone.
 */
export type ZoneAttempt<T> =
    | { kind: 'created', value: T }
    | { kind: 'retryable', reason: string }
    | { kind: 'fatal', error: unknown }

/**
 * Turn a creation call into a ZoneAttempt. Only capacity and invalid-zone
 * failures are retryable; anything else is a misconfiguration that another zone
 * will not fix.
 */
export async function attemptInZone<T>(create: () => Promise<T>): Promise<ZoneAttempt<T>> {
    try {
        return { kind: 'created', value: await create() }
    } catch (error) {
        if (isProviderCallError(error) && (error.kind === 'capacity-exhausted' || error.kind === 'invalid-zone')) {
            return { kind: 'retryable', reason: `${error.kind}: ${error.providerCode}` }
        }
        return { kind: 'fatal', error }
    }
}

export interface ZoneCreation<T> {
    zone: string
    value: T
}

/**
 * Try `create` in each zone that has a subnet, in order, until one succeeds.
 *
 * @throws NoZoneAvailableError when every candidate zone was exhausted
 * @throws the original error of the first non-retryable failure
 */
export async function createInFirstAvailableZone<T>(args: {
    resource: ZonalResourceKind
    zones: readonly string[]
    subnets: Readonly<Record<string, string>>
    logger: Logger
    create: (zone: string, subnetId: string) => Promise<T>
}): Promise<ZoneCreation<T>> {
    const tried: string[] = []
    const failures: Record<string, string> = {}

    for (const zone of args.zones) {
        const subnetId = args.subnets[zone]
        if (subnetId === undefined) {
            args.logger.debug(`No subnet in zone ${zone}, skipping it for ${args.resource}`)
            continue
        }

        tried.push(zone)
        const attempt = await attemptInZone(() => args.create(zone, subnetId))

        switch (attempt.kind) {
            case 'created':
                args.logger.info(`${args.resource} instance created in zone ${zone}`)
                return { zone, value: attempt.value }
            case 'retryable':
                failures[zone] = attempt.reason
                args.logger.warn(`Zone ${zone} unavailable for ${args.resource} (${attempt.reason}), trying next zone`)
                break
            case 'fatal':
                throw attempt.error
        }
    }

    throw new NoZoneAvailableError({ resource: args.resource, zones: tried, failures })
}
