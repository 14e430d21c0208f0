import { SF } from '@fleetctl/service-framework-node';
import { tickerWorkerEnvSchema } from './environment.js';

export function createTickerWorkerContext(
  processContext: SF.ProcessLifecycleContext,
  customEnv?: Record<string, string | undefined>,
) {
  const envContext = SF.createEnvContext(tickerWorkerEnvSchema, { source: customEnv });

  const diagnosticContext = SF.createDiagnosticContext(envContext);

  const metricsContext = SF.createMetricsContext({
    envContext,
    enableDefaultMetrics: true,
  });

  return {
    envContext,
    diagnosticContext,
    metricsContext,
    processContext,
  };
}

export type TickerWorkerContext = ReturnType<typeof createTickerWorkerContext>;
