import type { FastifyPluginAsync } from 'fastify';

/**
 * Named dependency checks; a check fails by rejecting
 */
export type ReadinessChecks = Record<string, () => Promise<unknown>>;

export interface HealthRoutesOptions {
  checks: ReadinessChecks;
}

/**
 * Health check routes
 *
 * - /health/live - Liveness check (is the server running?)
 * - /health/ready - Readiness check (are Postgres and Redis reachable?)
 */
export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, options) => {
  fastify.get('/live', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const names = Object.keys(options.checks);
    const results = await Promise.allSettled(names.map((name) => options.checks[name]?.()));

    const checks: Record<string, boolean> = { server: true };
    results.forEach((result, i) => {
      const name = names[i];
      if (name === undefined) {
        return;
      }
      checks[name] = result.status === 'fulfilled';
      if (result.status === 'rejected') {
        request.log.warn({ check: name, error: String(result.reason) }, 'Readiness check failed');
      }
    });

    const allHealthy = Object.values(checks).every(Boolean);

    return reply.status(allHealthy ? 200 : 503).send({
      status: allHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    });
  });
};
