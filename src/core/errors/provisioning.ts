import {
  ConfigurationError,
  ErrorCategory,
  ErrorCodeRegistry,
  ErrorSeverity,
  InfrastructureError,
  ProviderError,
  SessionError,
  ValidationError
} from './taxonomy';

/**
 * Error codes raised while provisioning or cleaning up a session
 */
export const PROVISIONING_ERROR_CODES = {
  CREDENTIALS_MISSING: ErrorCodeRegistry.register({
    code: 'AUTH_001',
    category: ErrorCategory.AUTHENTICATION,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Cloud API credentials not found in environment (expected {expected})',
    prodMessage: 'Cloud API credentials are missing',
    suggestions: ['Export TENCENTCLOUD_SECRET_ID and TENCENTCLOUD_SECRET_KEY before running']
  }),
  INVALID_RESOURCE_SPEC: ErrorCodeRegistry.register({
    code: 'VAL_001',
    category: ErrorCategory.VALIDATION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Invalid resource specification: {issues}',
    prodMessage: 'The resource specification is invalid'
  }),
  INVALID_CONFIGURATION: ErrorCodeRegistry.register({
    code: 'CFG_001',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Invalid configuration: {issues}',
    prodMessage: 'Configuration is invalid'
  }),
  NETWORK_PROVISIONING_FAILED: ErrorCodeRegistry.register({
    code: 'INFRA_001',
    category: ErrorCategory.INFRASTRUCTURE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'No subnet could be created in network {networkId} for zones {zones}',
    prodMessage: 'Network provisioning failed',
    possibleCauses: ['Every zone of the region rejected subnet creation', 'Subnet quota reached']
  }),
  NO_ZONE_AVAILABLE: ErrorCodeRegistry.register({
    code: 'INFRA_002',
    category: ErrorCategory.INFRASTRUCTURE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'No zone could host the {resource} instance (tried {zones})',
    prodMessage: 'No availability zone has capacity for the requested resource',
    suggestions: ['Retry later or pick another region', 'Request a smaller resource class']
  }),
  PROVISIONING_TIMEOUT: ErrorCodeRegistry.register({
    code: 'INFRA_003',
    category: ErrorCategory.INFRASTRUCTURE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: '{resource} instance {resourceId} did not become {expectedState} within {maxWaitMs} ms',
    prodMessage: 'A resource did not become ready in time'
  }),
  PROVIDER_CALL_FAILED: ErrorCodeRegistry.register({
    code: 'PROV_001',
    category: ErrorCategory.PROVIDER,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Provider call {operation} failed ({providerCode}): {providerMessage}',
    prodMessage: 'A cloud provider request failed'
  }),
  SESSION_NOT_FOUND: ErrorCodeRegistry.register({
    code: 'SESSION_001',
    category: ErrorCategory.SESSION,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Session {sessionId} not found in {rootDir}',
    prodMessage: 'Session not found',
    suggestions: ['List available sessions with `cloudforge sessions`']
  })
} as const;

export class CredentialsMissingError extends ConfigurationError {
  constructor(context: { expected: string[] }) {
    super(PROVISIONING_ERROR_CODES.CREDENTIALS_MISSING, context);
  }
}

export class InvalidResourceSpecError extends ValidationError {
  constructor(issues: string[], originalError?: Error) {
    super(PROVISIONING_ERROR_CODES.INVALID_RESOURCE_SPEC, { issues }, originalError);
  }
}

export class InvalidConfigurationError extends ConfigurationError {
  constructor(issues: string[], originalError?: Error) {
    super(PROVISIONING_ERROR_CODES.INVALID_CONFIGURATION, { issues }, originalError);
  }
}

export class NetworkProvisioningFailedError extends InfrastructureError {
  constructor(context: { networkId: string; zones: string[] }) {
    super(PROVISIONING_ERROR_CODES.NETWORK_PROVISIONING_FAILED, context);
  }
}

export type ZonalResourceKind = 'compute' | 'database'

export class NoZoneAvailableError extends InfrastructureError {
  constructor(context: { resource: ZonalResourceKind; zones: string[]; failures: Record<string, string> }) {
    super(PROVISIONING_ERROR_CODES.NO_ZONE_AVAILABLE, context);
  }
}

export class ProvisioningTimeoutError extends InfrastructureError {
  constructor(context: { resource: ZonalResourceKind; resourceId: string; expectedState: string; maxWaitMs: number }) {
    super(PROVISIONING_ERROR_CODES.PROVISIONING_TIMEOUT, context);
  }
}

/**
 * Provider failure classes. Provider adapters classify every failure into one
 * of these exactly once; the core never inspects provider messages.
 */
export type ProviderFailureKind = 'capacity-exhausted' | 'invalid-zone' | 'not-found' | 'other'

export class ProviderCallError extends ProviderError {
  readonly kind: ProviderFailureKind;
  readonly providerCode: string;

  constructor(
    kind: ProviderFailureKind,
    context: { operation: string; providerCode: string; providerMessage: string; requestId?: string },
    originalError?: Error
  ) {
    super(PROVISIONING_ERROR_CODES.PROVIDER_CALL_FAILED, { ...context, kind }, originalError);
    this.kind = kind;
    this.providerCode = context.providerCode;
  }
}

export function isProviderCallError(error: unknown): error is ProviderCallError {
  return error instanceof ProviderCallError;
}

export class SessionNotFoundError extends SessionError {
  constructor(context: { sessionId: string; rootDir: string }) {
    super(PROVISIONING_ERROR_CODES.SESSION_NOT_FOUND, context);
  }
}
