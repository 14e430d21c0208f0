import type { FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';
import type { ProcessLifecycleContext } from '../processLifecycle/types.js';
import {
  createMockDiagnosticsContext,
  createMockEnvContext,
  createMockProcessContext,
  createTestMetricsContext,
} from '../test/index.js';
import { createHttpServer } from './httpServer.js';
import type { HttpServerConfig, HttpServerEnv, ServiceContext } from './types.js';

function createTestServiceContext(
  processOverrides?: Partial<ProcessLifecycleContext>,
): ServiceContext<HttpServerEnv> {
  return {
    envContext: createMockEnvContext({ PORT: 3100, NODE_ENV: 'test' }),
    diagnosticContext: createMockDiagnosticsContext(),
    metricsContext: createTestMetricsContext(),
    processContext: createMockProcessContext(processOverrides),
  };
}

describe('createHttpServer', () => {
  let server: FastifyInstance | undefined;

  function startTestServer(
    context: ServiceContext<HttpServerEnv>,
    config?: HttpServerConfig,
  ): FastifyInstance {
    server = createHttpServer(context, config);
    return server;
  }

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  describe('request context', () => {
    it('attaches the service context and correlation ID to requests', async () => {
      const context = createTestServiceContext();
      const app = startTestServer(context);
      let captured: { ctx: unknown; correlationId: string } | undefined;

      app.get('/probe', async (request) => {
        captured = { ctx: request.ctx, correlationId: request.correlationId };
        return { ok: true };
      });

      await app.inject({
        method: 'GET',
        url: '/probe',
        headers: { 'x-correlation-id': 'corr-1' },
      });

      expect(captured?.ctx).toBe(context);
      expect(captured?.correlationId).toBe('corr-1');
      expect(context.diagnosticContext.createChildLogger).toHaveBeenCalledWith('corr-1');
    });

    it('registers a shutdown callback that closes the server', () => {
      const context = createTestServiceContext();
      startTestServer(context);

      expect(context.processContext.onShutdown).toHaveBeenCalledTimes(1);
    });

    it('decorates the server with startServer', () => {
      const app = startTestServer(createTestServiceContext());

      expect(typeof app.startServer).toBe('function');
    });
  });

  describe('/status endpoint', () => {
    it('returns the status provided by the service', async () => {
      const app = startTestServer(createTestServiceContext(), {
        statusProvider: () => ({ sid: 'w1', state: 'started' }),
      });

      const response = await app.inject({ method: 'GET', url: '/status' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ sid: 'w1', state: 'started' });
    });

    it('returns an empty object without a status provider', async () => {
      const app = startTestServer(createTestServiceContext());

      const response = await app.inject({ method: 'GET', url: '/status' });

      expect(response.json()).toEqual({});
    });
  });

  describe('/metrics endpoint', () => {
    it('exposes request metrics in Prometheus format', async () => {
      const app = startTestServer(createTestServiceContext());

      await app.inject({ method: 'GET', url: '/status' });
      const response = await app.inject({ method: 'GET', url: '/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toContain(
        'test_service_http_requests_total{method="GET",route="/status",status_code="200"} 1',
      );
    });
  });

  describe('/health endpoint', () => {
    it('reports healthy components', async () => {
      const app = startTestServer(createTestServiceContext(), {
        healthChecks: [async () => ({ component: 'heartbeat', isHealthy: true })],
      });

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'healthy',
        components: [{ component: 'heartbeat', isHealthy: true }],
      });
    });

    it('reports unhealthy while shutting down', async () => {
      const app = startTestServer(createTestServiceContext({ isShuttingDown: () => true }));

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unhealthy' });
    });

    it('reports unhealthy when a component check fails', async () => {
      const context = createTestServiceContext();
      const app = startTestServer(context, {
        healthChecks: [
          async () => ({ component: 'heartbeat', isHealthy: false }),
          async () => ({ component: 'control', isHealthy: true }),
        ],
      });

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({ status: 'unhealthy' });
      expect(context.diagnosticContext.logger.warn).toHaveBeenCalledWith('Health check failed', {
        unhealthyComponents: ['heartbeat'],
      });
    });

    it('reports unhealthy when a check throws', async () => {
      const app = startTestServer(createTestServiceContext(), {
        healthChecks: [
          async () => {
            throw new Error('check crashed');
          },
        ],
      });

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
    });
  });
});
