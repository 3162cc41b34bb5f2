/**
 * Tests for Prometheus metrics.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  trackBedrockRequest,
  trackTokens,
  trackCacheHit,
  trackCacheMiss,
  getMetrics,
  getMetricsContentType,
  register,
} from '../../../src/middleware/metrics.js';

describe('Metrics', () => {
  beforeEach(() => {
    register.resetMetrics();
  });

  describe('getMetrics', () => {
    it('should return Prometheus formatted metrics', async () => {
      const metrics = await getMetrics();

      expect(metrics).toContain('bedrock_gateway_http_request_duration_seconds');
      expect(metrics).toContain('bedrock_gateway_http_requests_total');
      expect(metrics).toContain('bedrock_gateway_invoke_latency_seconds');
    });

    it('should expose the text exposition content type', () => {
      expect(getMetricsContentType()).toContain('text/plain');
    });
  });

  describe('trackBedrockRequest', () => {
    it('should count invocations by model, mode and status', async () => {
      trackBedrockRequest('anthropic.claude-3-haiku-20240307-v1:0', 'invoke', 'success', 1.5);
      trackBedrockRequest('anthropic.claude-3-haiku-20240307-v1:0', 'stream', 'throttled', 0.2);

      const metrics = await getMetrics();
      expect(metrics).toContain(
        'bedrock_gateway_invoke_latency_seconds_count{model="anthropic.claude-3-haiku-20240307-v1:0",mode="invoke",status="success"} 1'
      );
      expect(metrics).toContain(
        'bedrock_gateway_invoke_latency_seconds_count{model="anthropic.claude-3-haiku-20240307-v1:0",mode="stream",status="throttled"} 1'
      );
    });
  });

  describe('trackTokens', () => {
    it('should count each reported token type', async () => {
      trackTokens('haiku', { inputTokens: 10, outputTokens: 5, cacheReadTokens: 3 });

      const metrics = await getMetrics();
      expect(metrics).toContain('bedrock_gateway_tokens_total{model="haiku",type="input"} 10');
      expect(metrics).toContain('bedrock_gateway_tokens_total{model="haiku",type="output"} 5');
      expect(metrics).toContain('bedrock_gateway_tokens_total{model="haiku",type="cache_read"} 3');
      expect(metrics).not.toContain('type="cache_write"');
    });
  });

  describe('cache tracking', () => {
    it('should track cache hits and misses', async () => {
      trackCacheHit();
      trackCacheHit();
      trackCacheMiss();

      const metrics = await getMetrics();
      expect(metrics).toContain('bedrock_gateway_cache_hits_total{type="response"} 2');
      expect(metrics).toContain('bedrock_gateway_cache_misses_total{type="response"} 1');
    });
  });
});
