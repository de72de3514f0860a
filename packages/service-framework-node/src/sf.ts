export * from './diagnostics/diagnostics.js';
export type * from './diagnostics/types.js';
export { createEnvContext, createEnvParser } from './environment/environment.js';
export { LogOutputFormatSchema, LogSeveritySchema } from './environment/types.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  EnvContext,
  EnvParserConfig,
  EnvSource,
} from './environment/types.js';
export { createProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ShutdownCallback,
  ShutdownConfiguration,
  ShutdownReason,
} from './processLifecycle/types.js';
