import type { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { DefaultEnvContext } from '../environment/types.js';

export interface MetricConfigCounter<T extends string = string> {
  type: 'counter';
  name: string;
  help: string;
  labelNames?: readonly T[];
}

export interface MetricConfigGauge<T extends string = string> {
  type: 'gauge';
  name: string;
  help: string;
  labelNames?: readonly T[];
}

export interface MetricConfigHistogram<T extends string = string> {
  type: 'histogram';
  name: string;
  help: string;
  labelNames?: readonly T[];
  buckets?: number[];
}

export type MetricConfig<T extends string = string> =
  | MetricConfigCounter<T>
  | MetricConfigGauge<T>
  | MetricConfigHistogram<T>;

export interface MetricsConfig {
  envContext: DefaultEnvContext;
  enableDefaultMetrics?: boolean;
  prefix?: string;
}

export interface MetricsContext {
  getRegistry: () => Registry;
  createCounter: <T extends string>(config: MetricConfigCounter<T>) => Counter<T>;
  createGauge: <T extends string>(config: MetricConfigGauge<T>) => Gauge<T>;
  createHistogram: <T extends string>(config: MetricConfigHistogram<T>) => Histogram<T>;
  getMetricsAsString: () => Promise<string>;
  clearMetrics: () => void;
}
