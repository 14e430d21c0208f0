import type { SF } from '@fleetctl/service-framework-node';
import type { ServiceState } from './serviceState.js';

export type StateChangedBy = 'boot' | 'control' | 'local';

export type HeartbeatInfos = Record<string, unknown>;

export type HeartbeatRecord = HeartbeatInfos & {
  sid: string;
  type: 'heartbeat';
  state: ServiceState;
};

export interface ControlCommand {
  sid: string;
  // anything but 'start' or 'stop' is ignored
  action: unknown;
}

/**
 * Request/acknowledge channel to the monitor. The reply content is ignored,
 * only its arrival matters.
 */
export interface HeartbeatTransport {
  request(payload: string): Promise<string>;
}

/**
 * Unfiltered broadcast channel from the monitor. Resolves with the next
 * message, filtering by sid happens in the listener.
 */
export interface ControlTransport {
  receive(): Promise<string>;
}

export interface WorkerBodyContext {
  readonly sid: string;
  status(): ServiceState;
  isStarted(): boolean;
  readonly logger: SF.Logger;
}

/**
 * Domain logic of a concrete worker. Invoked each time the lifecycle enters
 * `started`, both at boot and on a remote start. The control listener waits
 * for the body to return, so long running work should be started in the
 * background and keep checking `ctx.isStarted()`.
 */
export interface WorkerBody {
  publish(ctx: WorkerBodyContext): Promise<void>;
  subscribe(ctx: WorkerBodyContext): Promise<void>;
  run?(ctx: WorkerBodyContext): Promise<void>;
}
