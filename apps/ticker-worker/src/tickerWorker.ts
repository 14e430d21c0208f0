#!/usr/bin/env node
import { createZmqPublisher } from '@fleetctl/messaging-node';
import { SF } from '@fleetctl/service-framework-node';
import { startWorkerProcess } from '@fleetctl/worker-service-node';
import { createTickerWorkerContext } from './context.js';
import { createTickerBody } from './tickerBody.js';
import type { TickMessage } from './tickerBody.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(async (processContext) => {
    const context = createTickerWorkerContext(processContext);
    const { envContext, diagnosticContext } = context;

    const publisher = await createZmqPublisher<TickMessage>({
      endpoint: envContext.config.TICK_PUBLISH_ENDPOINT,
      diagnosticContext,
    });

    await startWorkerProcess(context, createTickerBody(context, publisher), { kind: 'ticker' });

    // registered after the worker so its loops are told to stop first
    processContext.onShutdown(() => publisher.close());

    return {
      diagnosticContext,
    };
  });
}

void bootstrap();
