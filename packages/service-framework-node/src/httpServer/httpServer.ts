import Fastify, { type FastifyInstance } from 'fastify';
import { httpServerMetrics } from '../componentMetrics/componentMetrics.js';
import type { HealthCheckResult, HttpServerConfig, HttpServerEnv, ServiceContext } from './types.js';

async function runHealthChecks(config: HttpServerConfig): Promise<HealthCheckResult[]> {
  return Promise.all((config.healthChecks ?? []).map((check) => check()));
}

export function createHttpServer<T extends HttpServerEnv>(
  context: ServiceContext<T>,
  config: HttpServerConfig = {},
): FastifyInstance {
  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'correlationId',
    requestIdHeader: 'x-correlation-id',
  });

  const httpRequestsTotal = context.metricsContext.createCounter(
    httpServerMetrics.httpRequestsTotal,
  );
  const httpRequestDuration = context.metricsContext.createHistogram(
    httpServerMetrics.httpRequestDuration,
  );

  fastify.decorateRequest('ctx');
  fastify.decorateRequest('logger');
  fastify.decorateRequest('correlationId');
  fastify.decorateRequest('startTime');

  fastify.addHook('onRequest', async (request) => {
    const correlationId =
      request.id || context.diagnosticContext.correlationIdGenerator.generateRootId();

    request.ctx = context;
    request.correlationId = correlationId;
    request.logger = context.diagnosticContext.createChildLogger(correlationId);
    request.startTime = Date.now();

    request.logger.debug('Request received', {
      method: request.method,
      url: request.url,
    });
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const duration = Date.now() - request.startTime;
    const route = request.routeOptions.url ?? request.url;

    request.logger.debug('Request completed', {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      duration_ms: duration,
    });

    httpRequestsTotal.inc({
      method: request.method,
      route,
      status_code: String(reply.statusCode),
    });
    httpRequestDuration.observe({ method: request.method, route }, duration / 1000);
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.type(context.metricsContext.getRegistry().contentType);
    return context.metricsContext.getMetricsAsString();
  });

  fastify.get('/status', async () => config.statusProvider?.() ?? {});

  fastify.get('/health', async (request, reply) => {
    const health: {
      status: string;
      uptime: number;
      timestamp: string;
      components: HealthCheckResult[];
    } = {
      status: 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      components: [],
    };

    if (context.processContext.isShuttingDown()) {
      reply.code(503);
      return { ...health, status: 'unhealthy' };
    }

    try {
      health.components = await runHealthChecks(config);
    } catch (error) {
      request.logger.error(error, 'Health check error');
      reply.code(503);
      return { ...health, status: 'unhealthy' };
    }

    const unhealthyComponents = health.components
      .filter((result) => !result.isHealthy)
      .map((result) => result.component);

    if (unhealthyComponents.length > 0) {
      request.logger.warn('Health check failed', { unhealthyComponents });
      reply.code(503);
      return { ...health, status: 'unhealthy' };
    }

    return health;
  });

  context.processContext.onShutdown(async () => {
    await fastify.close();
  });

  fastify.decorate('startServer', async function (this: FastifyInstance) {
    await this.listen({
      port: context.envContext.config.PORT,
      host: config.host ?? '0.0.0.0',
    });

    context.diagnosticContext.logger.info('Status server started', {
      port: context.envContext.config.PORT,
      environment: context.envContext.config.NODE_ENV,
    });
  });

  return fastify;
}
