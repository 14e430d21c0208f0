export { ControlMessageError, InvalidStateError } from './errors.js';
export { createControlListener, parseControlMessage } from './controlListener.js';
export type { ControlListener, ControlOutcome, ParsedControlMessage } from './controlListener.js';
export { workerServiceEnvSchema } from './environment.js';
export type { WorkerServiceEnv } from './environment.js';
export {
  HEARTBEAT_INTERVAL_MS,
  buildHeartbeatRecord,
  createHeartbeatReporter,
} from './heartbeatReporter.js';
export type { HeartbeatReporter } from './heartbeatReporter.js';
export { createServiceLifecycle } from './lifecycle.js';
export type { ServiceLifecycle } from './lifecycle.js';
export { createWorkerServiceMetrics } from './metrics.js';
export type { WorkerServiceMetrics } from './metrics.js';
export { ServiceState, isServiceState, serviceStates } from './serviceState.js';
export type {
  ControlCommand,
  ControlTransport,
  HeartbeatInfos,
  HeartbeatRecord,
  HeartbeatTransport,
  StateChangedBy,
  WorkerBody,
  WorkerBodyContext,
} from './types.js';
export { createWorkerProcess, startWorkerProcess } from './workerProcess.js';
export type { WorkerProcess, WorkerServiceContext } from './workerProcess.js';
export { createWorkerService } from './workerService.js';
export type { WorkerService, WorkerServiceOptions } from './workerService.js';
