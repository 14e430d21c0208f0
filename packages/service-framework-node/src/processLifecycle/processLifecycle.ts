import { stringifyJSONSafe } from '@fleetctl/utils';
import { createDiagnosticContext } from '../diagnostics/diagnostics.js';
import type { DiagnosticContext } from '../diagnostics/types.js';
import type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './types.js';

const defaultShutdownConfiguration: ShutdownConfiguration = {
  callbackTimeout: 10000,
  totalTimeout: 30000,
};

function createBootstrapDiagnosticContext(): DiagnosticContext {
  return createDiagnosticContext({
    config: {
      PROCESS_NAME: process.env.PROCESS_NAME || 'process-lifecycle',
      LOG_LEVEL: process.env.LOG_LEVEL,
      LOG_FORMAT: process.env.LOG_FORMAT,
    },
    nodeEnv: process.env.NODE_ENV ?? 'development',
  });
}

/**
 * Runs `startFn` inside a process that shuts down on signals, unhandled
 * rejections and uncaught exceptions. Shutdown callbacks run in registration
 * order; each one is bounded by `callbackTimeout` and the whole sequence by
 * `totalTimeout`, after which the process is force-exited.
 */
export async function startProcessLifecycle(
  startFn: ProcessStartFn,
  config: ProcessLifecycleConfig = {},
): Promise<void> {
  const shutdownConfig = config.shutdownConfiguration ?? defaultShutdownConfiguration;
  let diagnosticContext = createBootstrapDiagnosticContext();

  const callbacks: ShutdownCallback[] = [];
  let shuttingDown = false;

  async function executeCallbackWithTimeout(callback: ShutdownCallback): Promise<void> {
    let timer: NodeJS.Timeout | undefined;

    try {
      await Promise.race([
        callback(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error('Callback timeout')),
            shutdownConfig.callbackTimeout,
          );
        }),
      ]);
    } catch (error) {
      diagnosticContext.logger.error(error, 'Shutdown callback failed or timed out', {
        timeout: shutdownConfig.callbackTimeout,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  async function initiateShutdown(reason: string, exitCode: number): Promise<void> {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    diagnosticContext.logger.info('Graceful shutdown initiated', { reason, exitCode });

    const forceExitTimer = setTimeout(() => {
      diagnosticContext.logger.fatal(new Error('Shutdown timeout exceeded, forcing exit'), {
        totalTimeout: shutdownConfig.totalTimeout,
      });
      process.exit(1);
    }, shutdownConfig.totalTimeout);

    for (const callback of callbacks) {
      await executeCallbackWithTimeout(callback);
    }

    clearTimeout(forceExitTimer);
    diagnosticContext.logger.info('Graceful shutdown completed', { reason, exitCode });

    process.exit(exitCode);
  }

  const handleUnhandledRejection = (reason: unknown): void => {
    diagnosticContext.logger.fatal(new Error('Unhandled promise rejection detected'), {
      reason: stringifyJSONSafe(reason),
      reasonString: String(reason),
    });
    void initiateShutdown('unhandledRejection', 1);
  };

  const handleUncaughtException = (error: Error): void => {
    diagnosticContext.logger.fatal(error, 'Uncaught exception detected');
    void initiateShutdown('uncaughtException', 1);
  };

  const handleWarning = (warning: Error): void => {
    diagnosticContext.logger.warn('Process warning emitted', {
      name: warning.name,
      message: warning.message,
      stack: warning.stack,
    });
  };

  for (const signal of ['SIGTERM', 'SIGINT', 'SIGUSR2'] as const) {
    process.on(signal, () => {
      void initiateShutdown(signal, 0);
    });
  }
  process.on('unhandledRejection', handleUnhandledRejection);
  process.on('uncaughtException', handleUncaughtException);
  process.on('warning', handleWarning);

  const context: ProcessLifecycleContext = {
    onShutdown: (callback) => {
      callbacks.push(callback);
    },
    shutdown: (exitCode = 0) => initiateShutdown('manual', exitCode),
    isShuttingDown: () => shuttingDown,
  };

  try {
    const result = await startFn(context);
    diagnosticContext = result.diagnosticContext;
    diagnosticContext.logger.info('Process started', { pid: process.pid });
  } catch (error) {
    diagnosticContext.logger.fatal(error, 'Process failed to start');
    await initiateShutdown('startupFailure', 1);
  }
}
