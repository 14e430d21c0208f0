import { SF } from '@fleetctl/service-framework-node';

export function createWorkerServiceMetrics(metricsContext: SF.MetricsContext) {
  return {
    serviceState: metricsContext.createGauge(SF.workerServiceMetrics.serviceState),
    stateTransitions: metricsContext.createCounter(SF.workerServiceMetrics.stateTransitions),
    heartbeatsSent: metricsContext.createCounter(SF.workerServiceMetrics.heartbeatsSent),
    heartbeatRoundTrip: metricsContext.createHistogram(SF.workerServiceMetrics.heartbeatRoundTrip),
    controlCommands: metricsContext.createCounter(SF.workerServiceMetrics.controlCommands),
  };
}

export type WorkerServiceMetrics = ReturnType<typeof createWorkerServiceMetrics>;
