import { createMockZmqPublisher } from '@fleetctl/messaging-node/test';
import {
  createMockDiagnosticsContext,
  createMockEnvContext,
  createMockLogger,
  createMockProcessContext,
  createTestMetricsContext,
} from '@fleetctl/service-framework-node/test';
import type { ServiceState, WorkerBodyContext } from '@fleetctl/worker-service-node';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { TickerWorkerEnv } from './environment.js';
import type { TickMessage } from './tickerBody.js';
import { createTickerBody } from './tickerBody.js';

const config: TickerWorkerEnv = {
  PROCESS_NAME: 'ticker-worker',
  NODE_ENV: 'test',
  PORT: 0,
  LOG_LEVEL: 'info',
  LOG_FORMAT: 'json',
  SERVICE_ID: 't1',
  MONITOR_HEARTBEAT_ENDPOINT: 'tcp://monitor:8810',
  MONITOR_CONTROL_ENDPOINT: 'tcp://monitor:8820',
  CONTROL_DISCARD_MALFORMED: false,
  TICK_PUBLISH_ENDPOINT: 'tcp://*:8830',
  TICK_INTERVAL_MS: 1000,
};

const startOfYear = new Date('2026-01-01T00:00:00.000Z').getTime();

function setup() {
  let state: ServiceState = 'started';
  const processContext = createMockProcessContext();
  const metricsContext = createTestMetricsContext('ticker-worker');
  const publisher = createMockZmqPublisher<TickMessage>();
  const body = createTickerBody(
    {
      envContext: createMockEnvContext(config),
      diagnosticContext: createMockDiagnosticsContext(),
      metricsContext,
      processContext,
    },
    publisher,
  );
  const ctx: WorkerBodyContext = {
    sid: 't1',
    status: () => state,
    isStarted: () => state === 'started',
    logger: createMockLogger(),
  };

  return {
    body,
    ctx,
    publisher,
    processContext,
    metricsContext,
    setState: (next: ServiceState) => {
      state = next;
    },
  };
}

describe('createTickerBody', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(startOfYear);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('publishes numbered ticks on every interval while started', async () => {
    const { body, ctx, publisher, metricsContext, setState } = setup();

    await body.publish(ctx);
    expect(publisher.send).toHaveBeenCalledWith({ sid: 't1', seq: 1, timestamp: startOfYear });

    await vi.advanceTimersByTimeAsync(1000);
    expect(publisher.send).toHaveBeenLastCalledWith({
      sid: 't1',
      seq: 2,
      timestamp: startOfYear + 1000,
    });
    expect(await metricsContext.getMetricsAsString()).toContain(
      'ticker_worker_ticks_published_total 2',
    );

    setState('stopped');
    await vi.advanceTimersByTimeAsync(1000);
  });

  it('stops the loop once the worker leaves started', async () => {
    const { body, ctx, publisher, setState } = setup();

    await body.publish(ctx);
    setState('stopped');
    await vi.advanceTimersByTimeAsync(5000);

    expect(publisher.send).toHaveBeenCalledTimes(1);
    expect(ctx.logger.info).toHaveBeenLastCalledWith('Tick loop stopped', {
      sid: 't1',
      state: 'stopped',
      lastSeq: 1,
    });
  });

  it('reuses a running loop on a second publish', async () => {
    const { body, ctx, publisher, setState } = setup();

    await body.publish(ctx);
    await body.publish(ctx);

    expect(publisher.send).toHaveBeenCalledTimes(1);
    expect(ctx.logger.debug).toHaveBeenCalledWith('Tick loop already running', { sid: 't1' });

    setState('stopped');
    await vi.advanceTimersByTimeAsync(1000);
  });

  it('continues the sequence after a restart', async () => {
    const { body, ctx, publisher, setState } = setup();

    await body.publish(ctx);
    setState('stopped');
    await vi.advanceTimersByTimeAsync(1000);

    setState('started');
    await body.publish(ctx);

    expect(publisher.send).toHaveBeenLastCalledWith({
      sid: 't1',
      seq: 2,
      timestamp: startOfYear + 1000,
    });

    setState('stopped');
    await vi.advanceTimersByTimeAsync(1000);
  });

  it('stops publishing while the process shuts down', async () => {
    const { body, ctx, publisher, processContext } = setup();

    await body.publish(ctx);
    await processContext.runShutdownCallbacks();
    await vi.advanceTimersByTimeAsync(3000);

    expect(publisher.send).toHaveBeenCalledTimes(1);
  });

  it('shuts the process down when publishing fails', async () => {
    const { body, ctx, publisher, processContext } = setup();
    const error = new Error('Socket is closed');
    vi.mocked(publisher.send).mockRejectedValueOnce(error);

    await body.publish(ctx);
    await vi.advanceTimersByTimeAsync(0);

    expect(ctx.logger.fatal).toHaveBeenCalledWith(error, 'Tick loop failed', { sid: 't1' });
    expect(processContext.shutdown).toHaveBeenCalledWith(1);
  });

  it('consumes nothing', async () => {
    const { body, ctx } = setup();

    await expect(body.subscribe(ctx)).resolves.toBeUndefined();
  });
});
