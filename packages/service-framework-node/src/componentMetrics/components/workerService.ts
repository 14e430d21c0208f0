import type {
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
} from '../../metrics/types.js';

const serviceState: MetricConfigGauge<'state'> = {
  type: 'gauge',
  name: 'service_state',
  help: 'Lifecycle state of the worker, 1 for the current state and 0 for the others',
  labelNames: ['state'] as const,
};

const stateTransitions: MetricConfigCounter<'from' | 'to' | 'changed_by'> = {
  type: 'counter',
  name: 'service_state_transitions_total',
  help: 'Lifecycle state transitions',
  labelNames: ['from', 'to', 'changed_by'] as const,
};

const heartbeatsSent: MetricConfigCounter = {
  type: 'counter',
  name: 'heartbeats_sent_total',
  help: 'Heartbeats acknowledged by the monitor',
};

const heartbeatRoundTrip: MetricConfigHistogram = {
  type: 'histogram',
  name: 'heartbeat_round_trip_seconds',
  help: 'Time between sending a heartbeat and receiving its acknowledgement',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10],
};

const controlCommands: MetricConfigCounter<'action' | 'outcome'> = {
  type: 'counter',
  name: 'control_commands_total',
  help: 'Control messages addressed to this worker, by outcome',
  labelNames: ['action', 'outcome'] as const,
};

export const workerServiceMetrics = {
  serviceState,
  stateTransitions,
  heartbeatsSent,
  heartbeatRoundTrip,
  controlCommands,
};
