import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type {
  MetricConfig,
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricsConfig,
  MetricsContext,
} from './types.js';

const defaultHistogramBuckets = [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10];

const validMetricNamePattern = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const validLabelNamePattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function normalizeServiceName(serviceName: string): string {
  return serviceName
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

function validateMetricConfig(config: MetricConfig): void {
  if (!validMetricNamePattern.test(config.name)) {
    throw new Error(
      `Invalid metric name '${config.name}'. Metric names must match pattern: [a-zA-Z_:][a-zA-Z0-9_:]*`,
    );
  }

  for (const label of config.labelNames ?? []) {
    if (!validLabelNamePattern.test(label)) {
      throw new Error(
        `Invalid label name '${label}'. Label names must match pattern: [a-zA-Z_][a-zA-Z0-9_]*`,
      );
    }

    if (label.startsWith('__')) {
      throw new Error(`Label name '${label}' is reserved. Label names cannot start with '__'`);
    }
  }
}

export function createMetricsContext(config: MetricsConfig): MetricsContext {
  const registry = new Registry();
  const serviceName = normalizeServiceName(config.envContext.config.PROCESS_NAME);
  const prefix = config.prefix ? `${serviceName}_${config.prefix}_` : `${serviceName}_`;

  if (config.enableDefaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  function createCounter<T extends string>(metric: MetricConfigCounter<T>): Counter<T> {
    validateMetricConfig(metric);

    return new Counter<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      registers: [registry],
    });
  }

  function createGauge<T extends string>(metric: MetricConfigGauge<T>): Gauge<T> {
    validateMetricConfig(metric);

    return new Gauge<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      registers: [registry],
    });
  }

  function createHistogram<T extends string>(metric: MetricConfigHistogram<T>): Histogram<T> {
    validateMetricConfig(metric);

    return new Histogram<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      buckets: metric.buckets ?? defaultHistogramBuckets,
      registers: [registry],
    });
  }

  return {
    getRegistry: () => registry,
    createCounter,
    createGauge,
    createHistogram,
    getMetricsAsString: () => registry.metrics(),
    clearMetrics: () => registry.clear(),
  };
}
