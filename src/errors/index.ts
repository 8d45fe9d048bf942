/**
 * cloudforge error system module
 */

// Core error taxonomy
export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  CloudForgeError,
  ValidationError,
  ConfigurationError,
  ProviderError,
  InfrastructureError,
  SessionError,
  createError,
  isCloudForgeError,
  extractErrorDetails,
  formatErrorMessage,
  toError,
  type ErrorCode
} from '../core/errors/taxonomy';

// Provisioning errors
export {
  PROVISIONING_ERROR_CODES,
  CredentialsMissingError,
  InvalidResourceSpecError,
  InvalidConfigurationError,
  NetworkProvisioningFailedError,
  NoZoneAvailableError,
  ProvisioningTimeoutError,
  ProviderCallError,
  SessionNotFoundError,
  isProviderCallError,
  type ProviderFailureKind,
  type ZonalResourceKind
} from '../core/errors/provisioning';
