import { Readable } from 'node:stream';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { BedrockResponse, StreamChunk, Usage } from '../providers/base.js';
import {
  ChatRequestSchema,
  ChatResponseSchema,
  CodeAnalysisRequestSchema,
  GenerateRequestSchema,
  SummarizeRequestSchema,
  type ChatResponse,
} from '../schemas/request.js';
import { BedrockError } from '../services/errors.js';
import type { LLMService } from '../services/llm-service.js';
import { logger } from '../middleware/logger.js';

function toUsageWire(usage: Usage): ChatResponse['usage'] {
  return {
    input_tokens: usage.inputTokens,
    output_tokens: usage.outputTokens,
    ...(usage.cacheWriteTokens !== undefined ? { cache_write_tokens: usage.cacheWriteTokens } : {}),
    ...(usage.cacheReadTokens !== undefined ? { cache_read_tokens: usage.cacheReadTokens } : {}),
  };
}

function toResponseWire(response: BedrockResponse): ChatResponse {
  return ChatResponseSchema.parse({
    model_id: response.modelId,
    content: response.content,
    usage: toUsageWire(response.usage),
    metadata: response.metadata,
  });
}

function toChunkWire(chunk: StreamChunk): Record<string, unknown> {
  if (chunk.type === 'text') {
    return { type: 'text', text: chunk.text };
  }
  return { type: 'usage', ...toUsageWire(chunk) };
}

/**
 * Newline-delimited JSON, one chunk per line. A failure after the first
 * byte can no longer change the status code, so it becomes a final
 * `error` line.
 */
async function* ndjson(chunks: AsyncIterable<StreamChunk>, requestId: string): AsyncGenerator<string> {
  try {
    for await (const chunk of chunks) {
      yield `${JSON.stringify(toChunkWire(chunk))}\n`;
    }
  } catch (error) {
    const failure = error instanceof BedrockError
      ? { error: error.code, message: error.message }
      : { error: 'internal_error', message: 'Stream interrupted' };
    logger.error({ requestId, ...failure }, 'Chat stream failed');
    yield `${JSON.stringify({ type: 'error', ...failure })}\n`;
  }
}

/**
 * Aborts when the client goes away before the reply is written.
 */
function clientSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client disconnected'));
    }
  });
  return controller.signal;
}

export async function llmRoutes(fastify: FastifyInstance, llmService: LLMService) {
  fastify.get('/api/llm/models', async (_request, reply) => {
    return reply.code(200).send({
      default: llmService.modelId,
      models: llmService.listModels(),
    });
  });

  fastify.post('/api/llm/generate', async (request, reply) => {
    const body = GenerateRequestSchema.parse(request.body);

    logger.info({
      requestId: request.id,
      promptLength: body.prompt.length,
      useCache: body.use_cache,
    }, 'Generate request');

    const response = await llmService.generate(body.prompt, {
      systemPrompt: body.system_prompt,
      temperature: body.temperature,
      maxTokens: body.max_tokens,
      useCache: body.use_cache,
      timeoutMs: body.timeout_ms,
      signal: clientSignal(reply),
    });

    return reply.code(200).send({ response });
  });

  fastify.post('/api/llm/chat', async (request, reply) => {
    const body = ChatRequestSchema.parse(request.body);

    logger.info({
      requestId: request.id,
      messageCount: body.messages.length,
      stream: body.stream,
    }, 'Chat request');

    const result = await llmService.chat(body.messages, {
      temperature: body.temperature,
      maxTokens: body.max_tokens,
      stream: body.stream,
      timeoutMs: body.timeout_ms,
      signal: clientSignal(reply),
    });

    if (result.stream) {
      reply.header('content-type', 'application/x-ndjson; charset=utf-8');
      return reply.code(200).send(Readable.from(ndjson(result.chunks, request.id)));
    }

    const response = toResponseWire(result.response);
    logger.info({
      requestId: request.id,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    }, 'Chat success');

    return reply.code(200).send(response);
  });

  fastify.post('/api/llm/analyze-code', async (request, reply) => {
    const body = CodeAnalysisRequestSchema.parse(request.body);

    logger.info({ requestId: request.id, codeLength: body.code.length }, 'Code analysis request');

    const result = await llmService.analyzeCode(body.code, body.context, {
      timeoutMs: body.timeout_ms,
      signal: clientSignal(reply),
    });
    if (!result.ok) {
      return reply.code(200).send({ error: result.error, raw_response: result.rawResponse });
    }
    return reply.code(200).send(result.analysis);
  });

  fastify.post('/api/llm/summarize', async (request, reply) => {
    const body = SummarizeRequestSchema.parse(request.body);

    logger.info({
      requestId: request.id,
      textLength: body.text.length,
      format: body.format,
    }, 'Summarize request');

    const summary = await llmService.summarize(body.text, {
      maxLength: body.max_length,
      format: body.format,
      timeoutMs: body.timeout_ms,
      signal: clientSignal(reply),
    });

    return reply.code(200).send({ summary });
  });
}
