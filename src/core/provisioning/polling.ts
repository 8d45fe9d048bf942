import { ProvisioningTimeoutError, ZonalResourceKind } from '../errors/provisioning'
import type { PollingConfig } from '../config/interface'

/**
 * Resolve after `ms`, or reject with the signal's reason as soon as it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal))
            return
        }
        const onAbort = () => {
            clearTimeout(timer)
            reject(abortReason(signal))
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

function abortReason(signal: AbortSignal | undefined): Error {
    const reason: unknown = signal?.reason
    return reason instanceof Error ? reason : new Error('Operation aborted')
}

/**
 * Poll `check` every `pollIntervalMs` until it returns a value.
 *
 * The first check happens immediately. Gives up with ProvisioningTimeoutError
 * once `maxWaitMs` has elapsed: never before, and at most one interval after.
 */
export async function pollUntil<T>(args: {
    resource: ZonalResourceKind
    resourceId: string
    expectedState: string
    polling: PollingConfig
    check: () => Promise<T | undefined>
    signal?: AbortSignal
}): Promise<T> {
    const { pollIntervalMs, maxWaitMs } = args.polling
    const start = Date.now()

    while (true) {
        const result = await args.check()
        if (result !== undefined) {
            return result
        }

        const elapsed = Date.now() - start
        if (elapsed >= maxWaitMs) {
            throw new ProvisioningTimeoutError({
                resource: args.resource,
                resourceId: args.resourceId,
                expectedState: args.expectedState,
                maxWaitMs
            })
        }

        await sleep(Math.min(pollIntervalMs, maxWaitMs - elapsed), args.signal)
    }
}
