import { TB } from '@fleetctl/service-framework-node/typebox';
import { workerServiceEnvSchema } from '@fleetctl/worker-service-node';

export const tickerWorkerEnvSchema = TB.Object({
  ...workerServiceEnvSchema.properties,
  PROCESS_NAME: TB.String({ default: 'ticker-worker', minLength: 1 }),

  TICK_PUBLISH_ENDPOINT: TB.String({ default: 'tcp://*:8830' }),
  TICK_INTERVAL_MS: TB.Integer({ default: 1000, minimum: 1 }),
});

export type TickerWorkerEnv = TB.Static<typeof tickerWorkerEnvSchema>;
