/**
 * cloudforge core module
 */

// Orchestration
export {
  Orchestrator,
  OrchestratorState,
  type OrchestratorArgs,
  type ProvisionResult,
  type RemoteAccess,
  type StateTransition
} from './orchestrator';
export {
  Compensator,
  teardownSucceeded,
  type CompensatorArgs,
  type TeardownReport,
  type TeardownStep,
  type TeardownOutcome
} from './compensator';
export { SessionCleaner, type CleanupMode, type CleanupOptions, type CleanupResult } from './cleanup';

// Provisioners
export { NetworkProvisioner, subnetCidrBlock, type FirewallPurpose } from './provisioning/network';
export { ComputeProvisioner, buildUserData } from './provisioning/compute';
export { DatabaseProvisioner, generateRootPassword } from './provisioning/database';
export { mapResourceClass, mapDbClass, type ComputeClass } from './provisioning/resource-classes';

// Provider interface
export type {
  CloudProvider,
  CloudProviderFactory,
  FirewallRule,
  CreateInstanceRequest,
  CreateDatabaseRequest,
  InstanceStatus,
  DatabaseStatus
} from './provider';

// Configuration
export { CoreConfigSchema, ConfigLoader, DEFAULT_CORE_CONFIG, type CoreConfig, type PollingConfig } from './config';

// Resource specification and state
export {
  parseResourceSpec,
  defaultResourceSpec,
  type ResourceSpec,
  type ResourceSpecInput,
  type ComputeRequest,
  type DatabaseRequest
} from './spec/resource-spec';
export {
  ResourceLedger,
  hasCloudResources,
  type ProvisionedResources,
  type ProvisionedCompute,
  type ProvisionedDatabase
} from './state/resources';

// Sessions and credentials
export { SessionStore, type Session, type SessionHandle } from './session';
export { resolveApiCredentials, generateKeyPair, type ApiCredentials, type GeneratedKeyPair } from './credentials';
