import { ProviderCallError, type ProviderFailureKind } from '../../core/errors/provisioning'
import { toError } from '../../core/errors/taxonomy'

const CAPACITY_CODE_PREFIXES = ['ResourceInsufficient', 'ResourcesSoldOut']
const INVALID_ZONE_CODE_PREFIXES = ['InvalidZone']
// CDB reports sold out zones with a generic code and this message
const SOLD_OUT_MESSAGE_MARKER = '售罄'

/**
 * Shape of exceptions thrown by the SDK clients (TencentCloudSDKHttpException)
 */
export interface TencentSdkErrorLike {
    code?: string
    message: string
    requestId?: string
}

export function isTencentSdkError(error: unknown): error is TencentSdkErrorLike & Error {
    return error instanceof Error && 'code' in error && typeof error.code === 'string'
}

/**
 * Classify a provider failure. TradeError and the like are left as 'other': they
 * usually mean an account or billing problem that another zone will not fix.
 */
export function classifyTencentError(code: string, message: string): ProviderFailureKind {
    if (CAPACITY_CODE_PREFIXES.some(p => code.startsWith(p)) || message.includes(SOLD_OUT_MESSAGE_MARKER)) {
        return 'capacity-exhausted'
    }
    if (INVALID_ZONE_CODE_PREFIXES.some(p => code.startsWith(p))) {
        return 'invalid-zone'
    }
    if (code.includes('NotFound')) {
        return 'not-found'
    }
    return 'other'
}

export function toProviderCallError(operation: string, error: unknown): ProviderCallError {
    if (error instanceof ProviderCallError) {
        return error
    }
    if (isTencentSdkError(error)) {
        const providerCode = error.code ?? 'Unknown'
        return new ProviderCallError(classifyTencentError(providerCode, error.message), {
            operation,
            providerCode,
            providerMessage: error.message,
            requestId: error.requestId
        }, error)
    }
    const cause = toError(error)
    return new ProviderCallError('other', { operation, providerCode: 'Unknown', providerMessage: cause.message }, cause)
}
