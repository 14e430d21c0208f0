import type { DiagnosticContext, Logger } from '../diagnostics/types.js';
import type { EnvContext } from '../environment/types.js';
import type { MetricsContext } from '../metrics/types.js';
import type { ProcessLifecycleContext } from '../processLifecycle/types.js';

export interface ServiceContext<T = Record<string, unknown>> {
  readonly envContext: EnvContext<T>;
  readonly diagnosticContext: DiagnosticContext;
  readonly metricsContext: MetricsContext;
  readonly processContext: ProcessLifecycleContext;
}

export interface HttpServerEnv {
  PORT: number;
  NODE_ENV: string;
}

export interface HealthCheckResult {
  component: string;
  isHealthy: boolean;
}

export interface HttpServerConfig {
  healthChecks?: (() => Promise<HealthCheckResult>)[];
  statusProvider?: () => Record<string, unknown>;
  host?: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    logger: Logger;
    correlationId: string;
    ctx: ServiceContext<HttpServerEnv>;
    startTime: number;
  }

  interface FastifyInstance {
    startServer(): Promise<void>;
  }
}
