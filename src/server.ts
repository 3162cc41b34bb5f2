import { pathToFileURL } from 'node:url';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config as loadEnvFile } from 'dotenv';
import { ZodError } from 'zod';
import { loadConfig, type AppConfig } from './config.js';
import { logger } from './middleware/logger.js';
import { metricsMiddleware } from './middleware/metrics.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { healthRoutes } from './routes/health.js';
import { llmRoutes } from './routes/llm.js';
import { metricsRoutes } from './routes/metrics.js';
import { BedrockRuntimeInvoker } from './providers/index.js';
import { BedrockError } from './services/errors.js';
import { LLMService } from './services/llm-service.js';

export interface ServerDependencies {
  config?: AppConfig;
  llmService?: LLMService;
}

async function buildServer(deps: ServerDependencies = {}) {
  const config = deps.config ?? loadConfig();

  const server = Fastify({
    logger: false,
    disableRequestLogging: true,
  });

  await server.register(cors, {
    origin: config.corsOrigin === '*' ? '*' : config.corsOrigin.split(',').map(origin => origin.trim()),
  });

  server.addHook('onRequest', requestIdMiddleware);
  server.addHook('onRequest', metricsMiddleware);

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      logger.warn({ requestId: request.id, issues: error.errors.length }, 'Validation error');
      reply.code(400).send({
        error: 'Validation error',
        details: error.errors,
      });
      return;
    }

    if (error instanceof BedrockError) {
      logger.error({
        requestId: request.id,
        code: error.code,
        error: error.message,
      }, 'Bedrock request error');
      reply.code(error.statusCode).send({
        error: error.code,
        message: error.message,
        requestId: request.id,
      });
      return;
    }

    // Fastify's own client errors: malformed JSON, wrong content type, body too large.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.code(error.statusCode).send({ error: error.message });
      return;
    }

    logger.error({
      requestId: request.id,
      error: error.message,
      stack: error.stack,
    }, 'Request error');

    reply.code(500).send({
      error: 'Internal server error',
      requestId: request.id,
    });
  });

  await server.register(healthRoutes);
  await server.register(metricsRoutes);

  const llmService = deps.llmService ?? new LLMService(new BedrockRuntimeInvoker(config), config);

  await server.register((instance) => llmRoutes(instance, llmService));

  return server;
}

async function main() {
  loadEnvFile();

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logger.fatal({ error: err instanceof Error ? err.message : String(err) }, 'Invalid configuration');
    process.exit(1);
  }

  const invoker = new BedrockRuntimeInvoker(config);
  const server = await buildServer({
    config,
    llmService: new LLMService(invoker, config),
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await server.close();
    invoker.destroy();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ error: err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  logger.info({ port: config.port, modelId: config.modelId, region: config.region }, 'Starting server');

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    logger.error({ error: err }, 'Server failed to start');
    process.exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err: unknown) => {
    logger.fatal({ error: err }, 'Unhandled startup failure');
    process.exit(1);
  });
}

export { buildServer };
