import { defaultMonitorEndpoints } from '@fleetctl/messaging-node';
import { TB } from '@fleetctl/service-framework-node/typebox';

export const workerServiceEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'worker-service', minLength: 1 }),
  NODE_ENV: TB.String({ default: 'development' }),
  PORT: TB.Integer({ default: 3100 }),
  LOG_LEVEL: TB.String({ default: 'info' }),
  LOG_FORMAT: TB.String({ default: 'human' }),

  SERVICE_ID: TB.String({ default: 'servicebase', minLength: 1 }),
  MONITOR_HEARTBEAT_ENDPOINT: TB.String({ default: defaultMonitorEndpoints.heartbeat }),
  MONITOR_CONTROL_ENDPOINT: TB.String({ default: defaultMonitorEndpoints.control }),

  // when true, malformed control messages are logged and skipped instead of
  // ending the control loop
  CONTROL_DISCARD_MALFORMED: TB.Boolean({ default: false }),
});

export type WorkerServiceEnv = TB.Static<typeof workerServiceEnvSchema>;
