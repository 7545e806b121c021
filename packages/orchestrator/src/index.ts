/**
 * ESP Orchestrator
 *
 * Public surface: client, workflow engine, ESP pipeline, reporters and the
 * application that wires them.
 */

export * from './client/index.js';
export * from './workflows/index.js';
export * from './reporting/index.js';
export * from './observability/index.js';
export * from './boundaries/index.js';
export * from './utils/index.js';

export type { EnvSource, MetricsMode, EspDemoConfig } from './config.js';
export { DEFAULT_SETTINGS, EnvConfigError, loadConfigFromEnv, missingCredentials } from './config.js';

export type { EspDemoDependencies } from './app.js';
export { EspDemoApp } from './app.js';
