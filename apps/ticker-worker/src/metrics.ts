import type { SF } from '@fleetctl/service-framework-node';

const ticksPublished: SF.MetricConfigCounter = {
  type: 'counter',
  name: 'ticks_published_total',
  help: 'Tick messages handed to the publisher',
};

export const tickerMetrics = {
  ticksPublished,
};
