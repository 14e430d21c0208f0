export { workerServiceMetrics, httpServerMetrics } from './componentMetrics/componentMetrics.js';
export {
  createCorrelationIdGenerator,
  createDiagnosticContext,
  createLogger,
  parseLogOutputFormat,
  parseLogSeverity,
} from './diagnostics/diagnostics.js';
export type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  Logger,
  LogOutputFormat,
  LogSeverity,
} from './diagnostics/types.js';
export { createEnvContext, createEnvParser } from './environment/environment.js';
export { DefaultEnvSchemaType } from './environment/types.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  DefaultEnvSchema,
  EnvContext,
  EnvParserConfig,
  EnvValidationError,
} from './environment/types.js';
export { createHttpServer } from './httpServer/httpServer.js';
export type {
  HealthCheckResult,
  HttpServerConfig,
  HttpServerEnv,
  ServiceContext,
} from './httpServer/types.js';
export { createMetricsContext } from './metrics/metrics.js';
export type {
  MetricConfig,
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricsConfig,
  MetricsContext,
} from './metrics/types.js';
export { startProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ProcessStartFn,
  ShutdownCallback,
  ShutdownConfiguration,
} from './processLifecycle/types.js';
