/**
 * Prometheus metrics for the gateway and its Bedrock calls.
 */

import client from 'prom-client';
import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';
import type { Usage } from '../providers/base.js';

const register = new client.Registry();

client.collectDefaultMetrics({ register });

const httpRequestDuration = new client.Histogram({
  name: 'bedrock_gateway_http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

const httpRequestTotal = new client.Counter({
  name: 'bedrock_gateway_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [register],
});

const bedrockLatency = new client.Histogram({
  name: 'bedrock_gateway_invoke_latency_seconds',
  help: 'Time until Bedrock answered (first byte for streams), in seconds',
  labelNames: ['model', 'mode', 'status'],
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

const tokensUsed = new client.Counter({
  name: 'bedrock_gateway_tokens_total',
  help: 'Tokens reported by Bedrock',
  labelNames: ['model', 'type'],
  registers: [register],
});

const cacheHits = new client.Counter({
  name: 'bedrock_gateway_cache_hits_total',
  help: 'Total number of cache hits',
  labelNames: ['type'],
  registers: [register],
});

const cacheMisses = new client.Counter({
  name: 'bedrock_gateway_cache_misses_total',
  help: 'Total number of cache misses',
  labelNames: ['type'],
  registers: [register],
});

export function metricsMiddleware(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = Date.now();

  reply.raw.on('finish', () => {
    const duration = (Date.now() - startTime) / 1000;
    const labels = {
      method: request.method,
      route: request.routeOptions?.url ?? request.url,
      status_code: reply.statusCode.toString(),
    };

    httpRequestDuration.observe(labels, duration);
    httpRequestTotal.inc(labels);
  });

  done();
}

/**
 * Track a Bedrock invocation; `status` is `success` or an error code.
 */
export function trackBedrockRequest(
  model: string,
  mode: 'invoke' | 'stream',
  status: string,
  durationSeconds: number
): void {
  bedrockLatency.observe({ model, mode, status }, durationSeconds);
}

export function trackTokens(model: string, usage: Usage): void {
  tokensUsed.inc({ model, type: 'input' }, usage.inputTokens);
  tokensUsed.inc({ model, type: 'output' }, usage.outputTokens);
  if (usage.cacheWriteTokens) {
    tokensUsed.inc({ model, type: 'cache_write' }, usage.cacheWriteTokens);
  }
  if (usage.cacheReadTokens) {
    tokensUsed.inc({ model, type: 'cache_read' }, usage.cacheReadTokens);
  }
}

export function trackCacheHit(type: string = 'response'): void {
  cacheHits.inc({ type });
}

export function trackCacheMiss(type: string = 'response'): void {
  cacheMisses.inc({ type });
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

export { register };
