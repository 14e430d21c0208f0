import type { ZmqPublisher } from '@fleetctl/messaging-node';
import { sleep } from '@fleetctl/utils';
import type { WorkerBody, WorkerBodyContext } from '@fleetctl/worker-service-node';
import type { TickerWorkerContext } from './context.js';
import { tickerMetrics } from './metrics.js';

export interface TickMessage {
  sid: string;
  seq: number;
  timestamp: number;
}

/**
 * Publishes a numbered tick every `TICK_INTERVAL_MS` while the worker is
 * started. The loop runs in the background so `publish` returns right away;
 * a remote start while the loop is still alive reuses it.
 */
export function createTickerBody(
  context: TickerWorkerContext,
  publisher: ZmqPublisher<TickMessage>,
): WorkerBody {
  const { envContext, metricsContext, processContext } = context;
  const interval = envContext.config.TICK_INTERVAL_MS;
  const ticksPublished = metricsContext.createCounter(tickerMetrics.ticksPublished);

  let seq = 0;
  let loopRunning = false;

  async function tickLoop(ctx: WorkerBodyContext): Promise<void> {
    ctx.logger.info('Tick loop started', { sid: ctx.sid, interval });

    while (ctx.isStarted() && !processContext.isShuttingDown()) {
      seq += 1;
      await publisher.send({ sid: ctx.sid, seq, timestamp: Date.now() });
      ticksPublished.inc();

      await sleep(interval);
    }

    ctx.logger.info('Tick loop stopped', { sid: ctx.sid, state: ctx.status(), lastSeq: seq });
  }

  async function runTickLoop(ctx: WorkerBodyContext): Promise<void> {
    loopRunning = true;
    try {
      await tickLoop(ctx);
    } catch (error) {
      ctx.logger.fatal(error, 'Tick loop failed', { sid: ctx.sid });
      await processContext.shutdown(1);
    } finally {
      loopRunning = false;
    }
  }

  return {
    publish: async (ctx) => {
      if (loopRunning) {
        ctx.logger.debug('Tick loop already running', { sid: ctx.sid });
        return;
      }

      void runTickLoop(ctx);
    },
    // the ticker consumes nothing
    subscribe: async () => undefined,
  };
}
