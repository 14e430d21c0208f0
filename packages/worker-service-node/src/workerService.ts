import type { SF } from '@fleetctl/service-framework-node';
import { createControlListener } from './controlListener.js';
import { createHeartbeatReporter } from './heartbeatReporter.js';
import { createServiceLifecycle } from './lifecycle.js';
import { createWorkerServiceMetrics } from './metrics.js';
import type {
  ControlTransport,
  HeartbeatInfos,
  HeartbeatTransport,
  WorkerBody,
} from './types.js';

export interface WorkerServiceOptions {
  sid: string;
  body: WorkerBody;
  infos?: HeartbeatInfos;
  heartbeatTransport: HeartbeatTransport;
  controlTransport: ControlTransport;
  diagnosticContext: SF.DiagnosticContext;
  metricsContext: SF.MetricsContext;
  discardMalformedControl?: boolean;
}

type WorkerTask = 'boot' | 'control' | 'heartbeat';

type WorkerTaskStatus = 'idle' | 'running' | 'finished' | 'failed';

export function createWorkerService(options: WorkerServiceOptions) {
  const { sid, body, diagnosticContext, metricsContext } = options;
  const logger = diagnosticContext.logger;
  const metrics = createWorkerServiceMetrics(metricsContext);
  const abortController = new AbortController();
  const taskStatus: Record<WorkerTask, WorkerTaskStatus> = {
    boot: 'idle',
    control: 'idle',
    heartbeat: 'idle',
  };

  const lifecycle = createServiceLifecycle({ sid, body, diagnosticContext, metrics });

  const heartbeatReporter = createHeartbeatReporter({
    sid,
    infos: options.infos ?? {},
    transport: options.heartbeatTransport,
    getState: lifecycle.status,
    diagnosticContext,
    metrics,
  });

  const controlListener = createControlListener({
    lifecycle,
    transport: options.controlTransport,
    diagnosticContext,
    metrics,
    discardMalformed: options.discardMalformedControl,
  });

  async function runTask(name: WorkerTask, task: () => Promise<void>): Promise<void> {
    taskStatus[name] = 'running';
    try {
      await task();
      taskStatus[name] = 'finished';
    } catch (error) {
      taskStatus[name] = 'failed';
      logger.fatal(error, `Worker task '${name}' failed`, { sid, task: name });
      throw error;
    }
  }

  /**
   * Launches the boot transition, the control loop and the heartbeat loop
   * side by side. Resolves once all three have ended, which for the loops
   * only happens after `shutdown`. Rejects with the first task failure.
   */
  async function start(): Promise<void> {
    if (taskStatus.control !== 'idle') {
      throw new Error(`Worker service '${sid}' has already been started`);
    }

    const { signal } = abortController;
    logger.info('Starting worker service', { sid });

    await Promise.all([
      runTask('boot', () => lifecycle.start('boot')),
      runTask('control', () => controlListener.run(signal)),
      runTask('heartbeat', () => heartbeatReporter.run(signal)),
    ]);
  }

  /**
   * Lets both loops end quietly once their transports are closed.
   */
  function shutdown(): void {
    abortController.abort();
  }

  function isHealthy(): boolean {
    return (
      taskStatus.boot !== 'failed' &&
      taskStatus.control === 'running' &&
      taskStatus.heartbeat === 'running'
    );
  }

  return {
    sid,
    lifecycle,
    start,
    shutdown,
    isHealthy,
  };
}

export type WorkerService = ReturnType<typeof createWorkerService>;
