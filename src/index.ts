/**
 * cloudforge - session-scoped provisioning of cloud compute and database resources
 * Main entry point for the package
 */

export * from './core';
export * from './errors';
export { TencentCloudProvider, tencentProviderFactory } from './providers/tencent';
export { getLogger, setLogLevel, type Logger, type LogLevel } from './log/utils';
