import { createZmqRequestClient, createZmqSubscriber } from '@fleetctl/messaging-node';
import { SF } from '@fleetctl/service-framework-node';
import type { WorkerServiceEnv } from './environment.js';
import type { HeartbeatInfos, WorkerBody } from './types.js';
import { createWorkerService } from './workerService.js';

export type WorkerServiceContext<T extends WorkerServiceEnv = WorkerServiceEnv> =
  SF.ServiceContext<T>;

/**
 * Builds a worker on ZeroMQ transports and a status server from the env
 * config. `run` connects the transports and launches the worker tasks; a
 * task failure shuts the process down with exit code 1.
 */
export function createWorkerProcess<T extends WorkerServiceEnv>(
  context: WorkerServiceContext<T>,
  body: WorkerBody,
  infos: HeartbeatInfos = {},
) {
  const { envContext, diagnosticContext, metricsContext, processContext } = context;
  const config = envContext.config;
  const logger = diagnosticContext.logger;

  const heartbeatClient = createZmqRequestClient({
    endpoint: config.MONITOR_HEARTBEAT_ENDPOINT,
    diagnosticContext,
  });
  const controlSubscriber = createZmqSubscriber({
    endpoint: config.MONITOR_CONTROL_ENDPOINT,
    diagnosticContext,
  });

  const workerService = createWorkerService({
    sid: config.SERVICE_ID,
    body,
    infos,
    heartbeatTransport: heartbeatClient,
    controlTransport: controlSubscriber,
    diagnosticContext,
    metricsContext,
    discardMalformedControl: config.CONTROL_DISCARD_MALFORMED,
  });

  const httpServer = SF.createHttpServer(context, {
    healthChecks: [
      async () => ({
        component: 'WorkerService',
        isHealthy: workerService.isHealthy(),
      }),
    ],
    statusProvider: () => ({
      sid: workerService.sid,
      state: workerService.lifecycle.status(),
    }),
  });

  processContext.onShutdown(async () => {
    logger.info('Shutting down worker service', { sid: workerService.sid });
    workerService.shutdown();
    heartbeatClient.close();
    controlSubscriber.close();
  });

  function run(): void {
    heartbeatClient.connect();
    controlSubscriber.connect();

    // the failing task has already logged the error as fatal
    void workerService.start().catch(() => processContext.shutdown(1));
  }

  return {
    workerService,
    httpServer,
    run,
  };
}

export type WorkerProcess = ReturnType<typeof createWorkerProcess>;

export async function startWorkerProcess<T extends WorkerServiceEnv>(
  context: WorkerServiceContext<T>,
  body: WorkerBody,
  infos: HeartbeatInfos = {},
): Promise<WorkerProcess> {
  const workerProcess = createWorkerProcess(context, body, infos);

  await workerProcess.httpServer.startServer();
  workerProcess.run();

  return workerProcess;
}
