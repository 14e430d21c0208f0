import type { SF } from '@fleetctl/service-framework-node';
import { sleep } from '@fleetctl/utils';
import type { WorkerServiceMetrics } from './metrics.js';
import type { ServiceState } from './serviceState.js';
import type { HeartbeatInfos, HeartbeatRecord, HeartbeatTransport } from './types.js';

export const HEARTBEAT_INTERVAL_MS = 10_000;

export interface HeartbeatReporterOptions {
  sid: string;
  infos: HeartbeatInfos;
  transport: HeartbeatTransport;
  getState: () => ServiceState;
  diagnosticContext: SF.DiagnosticContext;
  metrics: WorkerServiceMetrics;
}

export function buildHeartbeatRecord(
  infos: HeartbeatInfos,
  sid: string,
  state: ServiceState,
): HeartbeatRecord {
  return { ...infos, sid, type: 'heartbeat', state };
}

/**
 * Reports the live state to the monitor on a fixed cadence. Each report
 * waits for its acknowledgement before sleeping, so a slow monitor slows
 * the reporter down and a monitor that never replies stops it.
 *
 * Transport failures are not retried: they reject `run` and the monitor
 * sees the silence.
 */
export function createHeartbeatReporter(options: HeartbeatReporterOptions) {
  const { sid, infos, transport, getState, diagnosticContext, metrics } = options;
  const logger = diagnosticContext.logger;

  async function sendHeartbeat(): Promise<HeartbeatRecord> {
    const record = buildHeartbeatRecord(infos, sid, getState());
    const endTimer = metrics.heartbeatRoundTrip.startTimer();

    logger.debug('Sending heartbeat', { sid, state: record.state });
    await transport.request(JSON.stringify(record));

    endTimer();
    metrics.heartbeatsSent.inc();
    logger.debug('Heartbeat acknowledged', { sid, state: record.state });

    return record;
  }

  async function run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      try {
        await sendHeartbeat();
      } catch (error) {
        // the socket is closed on shutdown, which rejects the pending request
        if (signal?.aborted) {
          return;
        }
        throw error;
      }

      await sleep(HEARTBEAT_INTERVAL_MS, signal);
    }
  }

  return {
    sendHeartbeat,
    run,
  };
}

export type HeartbeatReporter = ReturnType<typeof createHeartbeatReporter>;
