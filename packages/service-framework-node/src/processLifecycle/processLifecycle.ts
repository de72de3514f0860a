import { stringifyJSONSafe } from '@dirtar/utils';
import type { Logger } from '../diagnostics/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ShutdownCallback,
  ShutdownConfiguration,
  ShutdownReason,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 5000,
  totalTimeout: 15000,
};

// 128 + signal number, the shell convention for a process ended by a signal
const exitCodeByReason: Record<ShutdownReason, number> = {
  SIGINT: 130,
  SIGTERM: 143,
  unhandledRejection: 1,
  uncaughtException: 1,
  manual: 0,
};

export function createProcessLifecycle({
  diagnosticContext,
  shutdownConfiguration,
}: ProcessLifecycleConfig): ProcessLifecycleContext {
  const shutdownConfig = shutdownConfiguration ?? defaultShutdownConfiguration;

  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;

  const executeCallbackWithTimeout = async (
    callback: ShutdownCallback,
    timeout: number,
    logger: Logger,
  ): Promise<void> => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Callback timeout')), timeout);
        }),
      ]);
    } catch (error) {
      logger.error(error, 'Shutdown callback failed or timed out', {
        timeout,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const executeAllCallbacks = async (logger: Logger): Promise<void> => {
    for (const callback of callbacks) {
      await executeCallbackWithTimeout(callback, shutdownConfig.callbackTimeout, logger);
    }
  };

  const stopProcess = async (reason: ShutdownReason): Promise<boolean> => {
    if (shuttingDown) {
      return false;
    }

    shuttingDown = true;

    diagnosticContext.logger.info('Shutdown initiated', { reason });

    const forceExitTimeout = setTimeout(() => {
      diagnosticContext.logger.fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfig.totalTimeout,
      });
      process.exit(1);
    }, shutdownConfig.totalTimeout);

    await executeAllCallbacks(diagnosticContext.logger);

    clearTimeout(forceExitTimeout);

    diagnosticContext.logger.info('Shutdown completed');
    return true;
  };

  const initiateShutdown = async (reason: ShutdownReason, exitCode?: number): Promise<void> => {
    if (await stopProcess(reason)) {
      process.exit(exitCode ?? exitCodeByReason[reason]);
    }
  };

  const handleUnhandledRejection = (reason: unknown): void => {
    diagnosticContext.logger.fatal(new Error('Unhandled promise rejection detected'), {
      reason: stringifyJSONSafe(reason),
      reasonString: String(reason),
    });

    void initiateShutdown('unhandledRejection');
  };

  const handleUncaughtException = (error: Error): void => {
    diagnosticContext.logger.fatal(error, 'Uncaught exception detected');

    void initiateShutdown('uncaughtException');
  };

  const handleWarning = (warning: Error): void => {
    diagnosticContext.logger.warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack,
    });
  };

  const start = (): (() => void) => {
    const sigTermHandler = () => void initiateShutdown('SIGTERM');
    const sigIntHandler = () => void initiateShutdown('SIGINT');

    process.on('SIGTERM', sigTermHandler);
    process.on('SIGINT', sigIntHandler);
    process.on('unhandledRejection', handleUnhandledRejection);
    process.on('uncaughtException', handleUncaughtException);
    process.on('warning', handleWarning);

    diagnosticContext.logger.debug('Process lifecycle signal handlers registered');

    return () => {
      process.removeListener('SIGTERM', sigTermHandler);
      process.removeListener('SIGINT', sigIntHandler);
      process.removeListener('unhandledRejection', handleUnhandledRejection);
      process.removeListener('uncaughtException', handleUncaughtException);
      process.removeListener('warning', handleWarning);
    };
  };

  return {
    start,
    onShutdown(callback: ShutdownCallback): void {
      callbacks.push(callback);
    },
    shutdown(exitCode?: number): Promise<void> {
      return initiateShutdown('manual', exitCode);
    },
    isShuttingDown(): boolean {
      return shuttingDown;
    },
  };
}
