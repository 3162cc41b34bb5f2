import type { FastifyInstance } from 'fastify';
import { getMetrics, getMetricsContentType } from '../middleware/metrics.js';

/**
 * Prometheus scrape endpoint. Each scrape reads live counters, so
 * intermediaries must not cache it.
 */
export async function metricsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/metrics', async (_request, reply) => {
    reply.header('cache-control', 'no-store');
    reply.type(getMetricsContentType());
    return getMetrics();
  });
}
