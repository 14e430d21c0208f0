import type { SF } from '@fleetctl/service-framework-node';
import { InvalidStateError } from './errors.js';
import type { WorkerServiceMetrics } from './metrics.js';
import { ServiceState, isServiceState, serviceStates } from './serviceState.js';
import type { StateChangedBy, WorkerBody, WorkerBodyContext } from './types.js';

export interface ServiceLifecycleOptions {
  sid: string;
  body: WorkerBody;
  diagnosticContext: SF.DiagnosticContext;
  metrics: WorkerServiceMetrics;
}

async function runPublishAndSubscribe(body: WorkerBody, ctx: WorkerBodyContext): Promise<void> {
  await Promise.all([body.publish(ctx), body.subscribe(ctx)]);
}

/**
 * Owns the single state cell of a worker. Transitions are unchecked apart
 * from the guard in `run`, and `stop` goes to `stopped` without passing
 * through `stopping`.
 *
 * The heartbeat reporter, the control listener and the worker body only
 * interleave at await points, so reads and writes of the cell need no lock.
 */
export function createServiceLifecycle(options: ServiceLifecycleOptions) {
  const { sid, body, diagnosticContext, metrics } = options;
  const logger = diagnosticContext.logger;
  let state: ServiceState = ServiceState.Init;

  const bodyContext: WorkerBodyContext = {
    sid,
    status: () => state,
    isStarted: () => state === ServiceState.Started,
    logger: logger.createChild('body'),
  };

  function recordState(): void {
    for (const candidate of serviceStates) {
      metrics.serviceState.set({ state: candidate }, candidate === state ? 1 : 0);
    }
  }

  recordState();

  function setState(next: string, changedBy: StateChangedBy = 'local'): void {
    if (!isServiceState(next)) {
      const error = new InvalidStateError(next);
      logger.error(error, { sid, changedBy });
      throw error;
    }

    const from = state;
    state = next;
    recordState();
    metrics.stateTransitions.inc({ from, to: next, changed_by: changedBy });
    logger.info(`Set service state to ${next}`, { sid, from, to: next, changedBy });
  }

  function status(): ServiceState {
    return state;
  }

  async function run(changedBy: StateChangedBy = 'local'): Promise<void> {
    if (state === ServiceState.Started) {
      logger.error(`Tried to run service, but state is ${state}`, { sid, changedBy });
      return;
    }

    setState(ServiceState.Started, changedBy);

    if (body.run) {
      await body.run(bodyContext);
    } else {
      await runPublishAndSubscribe(body, bodyContext);
    }
  }

  async function start(changedBy: StateChangedBy = 'local'): Promise<void> {
    setState(ServiceState.Starting, changedBy);
    logger.info('Service starting', { sid });
    await run(changedBy);
  }

  async function stop(changedBy: StateChangedBy = 'local'): Promise<void> {
    setState(ServiceState.Stopped, changedBy);
    logger.info('Service stopped', { sid });
  }

  return {
    sid,
    setState,
    status,
    start,
    stop,
    run,
  };
}

export type ServiceLifecycle = ReturnType<typeof createServiceLifecycle>;
