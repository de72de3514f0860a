import type { DiagnosticContext } from '../diagnostics/types.js';

export type ShutdownCallback = () => Promise<void> | void;

export type ShutdownReason =
  | 'SIGINT'
  | 'SIGTERM'
  | 'unhandledRejection'
  | 'uncaughtException'
  | 'manual';

export interface ShutdownConfiguration {
  callbackTimeout: number;
  totalTimeout: number;
}

export interface ProcessLifecycleConfig {
  diagnosticContext: DiagnosticContext;
  shutdownConfiguration?: ShutdownConfiguration;
}

export interface ProcessLifecycleContext {
  /**
   * Registers signal and error handlers. Returns a function that removes them again,
   * which a one-shot command calls once its work is finished.
   */
  start(): () => void;
  onShutdown(callback: ShutdownCallback): void;
  shutdown(exitCode?: number): Promise<void>;
  isShuttingDown(): boolean;
}
