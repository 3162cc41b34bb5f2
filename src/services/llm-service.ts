import { logger } from '../middleware/logger.js';
import { trackBedrockRequest, trackTokens } from '../middleware/metrics.js';
import type { AppConfig } from '../config.js';
import type {
  BedrockInvoker,
  BedrockResponse,
  Message,
  StreamChunk,
  VendorPayload,
} from '../providers/base.js';
import {
  BEDROCK_MODELS,
  getModelInfo,
  resolveInvocationModelId,
  type ModelInfo,
} from '../providers/models.js';
import { CodeAnalysisSchema, type CodeAnalysis } from '../schemas/analysis.js';
import { CallScope } from './call-scope.js';
import { BedrockError, TransportFailureError, classifyBedrockError } from './errors.js';
import {
  normalizeChat,
  normalizeGeneration,
  type NormalizerDefaults,
} from './request-normalizer.js';
import { RequestCoalescer } from './request-coalescing.js';
import { ResponseCache } from './response-cache.js';
import { parseInvokeResponse, translateStream } from './response-translator.js';

export type LLMServiceConfig = Pick<
  AppConfig,
  | 'modelId'
  | 'region'
  | 'temperature'
  | 'maxTokens'
  | 'useCrossRegion'
  | 'timeout'
  | 'cacheResponses'
  | 'cacheMaxEntries'
  | 'cacheTtlMs'
  | 'anthropicBeta'
>;

export interface CallOptions {
  signal?: AbortSignal;
  /** Overrides the configured timeout for this call. */
  timeoutMs?: number;
}

export interface GenerateOptions extends CallOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  useCache?: boolean;
}

export interface ChatOptions extends CallOptions {
  temperature?: number;
  maxTokens?: number;
}

export type ChatResult =
  | { stream: false; response: BedrockResponse }
  | { stream: true; chunks: ChunkStream };

/**
 * Chunks of an open stream. Returning it early, even before the first
 * `next()`, releases the vendor connection.
 */
export interface ChunkStream extends AsyncIterable<StreamChunk> {
  next(): Promise<IteratorResult<StreamChunk, void>>;
  return(): Promise<IteratorResult<StreamChunk, void>>;
}

export type SummaryFormat = 'paragraph' | 'bullet_points';

export interface SummarizeOptions extends CallOptions {
  maxLength?: number;
  /** `paragraph` or `bullet_points`; anything else gets a generic instruction. */
  format?: string;
}

export type CodeAnalysisResult =
  | { ok: true; analysis: CodeAnalysis }
  | { ok: false; error: 'Failed to parse analysis'; rawResponse: string };

const CODE_REVIEW_SYSTEM_PROMPT = [
  'You are an expert code reviewer. Analyze the provided code and answer with a single JSON object and nothing else.',
  'The object must have exactly these keys, each holding a list of strings:',
  '- issues: potential bugs or problems found',
  '- suggestions: concrete improvements',
  '- best_practices: relevant best practices',
  '- security_concerns: security considerations',
].join('\n');

const SUMMARY_INSTRUCTIONS: Record<SummaryFormat, string> = {
  paragraph: 'Provide a concise paragraph summary.',
  bullet_points: 'Provide a bullet-point summary with key points.',
};

const GENERIC_SUMMARY_INSTRUCTION = 'Provide a summary.';

function isSummaryFormat(format: string): format is SummaryFormat {
  return Object.hasOwn(SUMMARY_INSTRUCTIONS, format);
}

export function buildSummarySystemPrompt(format: string, maxLength?: number): string {
  const instruction = isSummaryFormat(format) ? SUMMARY_INSTRUCTIONS[format] : GENERIC_SUMMARY_INSTRUCTION;
  let prompt = `You are a skilled summarizer. ${instruction} Keep the summary clear and informative.`;
  if (maxLength) {
    prompt += ` Limit the summary to approximately ${maxLength} words.`;
  }
  return prompt;
}

export function buildCodeReviewPrompt(code: string, context?: string): string {
  let prompt = `Code to analyze:\n\`\`\`\n${code}\n\`\`\``;
  if (context) {
    prompt += `\n\nContext: ${context}`;
  }
  return prompt;
}

/**
 * Pull the JSON document out of a model reply, unwrapping a fenced block.
 */
export function parseCodeAnalysis(text: string): CodeAnalysis | undefined {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  const candidate = (fenced?.[1] ?? text).trim();

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch {
    return undefined;
  }

  const parsed = CodeAnalysisSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}

/**
 * A generator's own `finally` never runs when it is returned before its
 * first `next()`, so `close` runs on `return()` here as well.
 */
function closeOnReturn(
  chunks: AsyncGenerator<StreamChunk, void, undefined>,
  close: () => void
): ChunkStream {
  const stream: ChunkStream = {
    next: () => chunks.next(),
    return: () => {
      close();
      return chunks.return(undefined);
    },
    [Symbol.asyncIterator]: () => stream,
  };
  return stream;
}

export interface LLMServiceOptions {
  cache?: ResponseCache;
}

export class LLMService {
  private invoker: BedrockInvoker;
  private config: LLMServiceConfig;
  private cache: ResponseCache;
  private inflight = new RequestCoalescer<string>();
  private defaults: NormalizerDefaults;
  private invocationModelId: string;

  constructor(invoker: BedrockInvoker, config: LLMServiceConfig, options?: LLMServiceOptions) {
    const model = getModelInfo(config.modelId);
    if (!model) {
      throw new Error(`Unknown Bedrock model: ${config.modelId}`);
    }

    this.invoker = invoker;
    this.config = config;
    this.cache = options?.cache ?? new ResponseCache({
      maxEntries: config.cacheMaxEntries,
      ttlMs: config.cacheTtlMs,
    });
    this.defaults = {
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      modelMaxTokens: model.maxTokens,
      anthropicBeta: config.anthropicBeta,
    };
    this.invocationModelId = resolveInvocationModelId(config.modelId, config.region, config.useCrossRegion);
  }

  get modelId(): string {
    return this.config.modelId;
  }

  listModels(): Array<{ id: string } & ModelInfo> {
    return Object.entries(BEDROCK_MODELS).map(([id, info]) => ({ id, ...info }));
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const payload = normalizeGeneration(prompt, options, this.defaults);
    const useCache = options.useCache ?? this.config.cacheResponses;

    if (!useCache) {
      const response = await this.invoke(payload, options);
      return response.content;
    }

    const key = ResponseCache.key({
      prompt,
      systemPrompt: options.systemPrompt,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      logger.info({ modelId: this.config.modelId }, 'Cache hit for prompt');
      return cached;
    }

    // Concurrent misses for the same key share one vendor call, run under
    // the service's own deadline. Each caller waits under its own scope.
    const scope = this.scopeFor(options);
    const startTime = Date.now();
    try {
      return await this.inflight.execute(key, async (signal) => {
        const response = await this.invoke(payload, { signal });
        this.cache.set(key, response.content);
        return response.content;
      }, scope.signal);
    } catch (error) {
      if (scope.signal.aborted && !(error instanceof BedrockError)) {
        throw this.fail(error, scope, 'invoke', startTime);
      }
      throw error;
    } finally {
      scope.dispose();
    }
  }

  chat(messages: readonly Message[], options: ChatOptions & { stream: true }): Promise<Extract<ChatResult, { stream: true }>>;
  chat(messages: readonly Message[], options?: ChatOptions & { stream?: false }): Promise<Extract<ChatResult, { stream: false }>>;
  chat(messages: readonly Message[], options?: ChatOptions & { stream?: boolean }): Promise<ChatResult>;
  async chat(
    messages: readonly Message[],
    options: ChatOptions & { stream?: boolean } = {}
  ): Promise<ChatResult> {
    const payload = normalizeChat(messages, options, this.defaults);

    if (options.stream) {
      return { stream: true, chunks: await this.openStream(payload, options) };
    }
    return { stream: false, response: await this.invoke(payload, options) };
  }

  async analyzeCode(code: string, context?: string, call: CallOptions = {}): Promise<CodeAnalysisResult> {
    const text = await this.generate(buildCodeReviewPrompt(code, context), {
      systemPrompt: CODE_REVIEW_SYSTEM_PROMPT,
      temperature: 0.1,
      signal: call.signal,
      timeoutMs: call.timeoutMs,
    });

    const analysis = parseCodeAnalysis(text);
    if (!analysis) {
      logger.warn({ length: text.length }, 'Failed to parse analysis response as JSON');
      return { ok: false, error: 'Failed to parse analysis', rawResponse: text };
    }
    return { ok: true, analysis };
  }

  async summarize(text: string, options: SummarizeOptions = {}): Promise<string> {
    return this.generate(text, {
      systemPrompt: buildSummarySystemPrompt(options.format ?? 'bullet_points', options.maxLength),
      temperature: 0.3,
      signal: options.signal,
      timeoutMs: options.timeoutMs,
    });
  }

  clearCache(): void {
    this.cache.clear();
  }

  private scopeFor(call: CallOptions): CallScope {
    return new CallScope(call.timeoutMs ?? this.config.timeout * 1000, call.signal);
  }

  private fail(error: unknown, scope: CallScope, mode: 'invoke' | 'stream', startTime: number): BedrockError {
    const classified = scope.timedOut
      ? new TransportFailureError(`Bedrock call exceeded deadline of ${scope.timeoutMs}ms`, error)
      : classifyBedrockError(error, { modelId: this.invocationModelId, region: this.config.region });

    trackBedrockRequest(this.config.modelId, mode, classified.code, (Date.now() - startTime) / 1000);
    logger.error({
      modelId: this.invocationModelId,
      mode,
      code: classified.code,
      error: classified.message,
      cause: error instanceof Error ? error.message : String(error),
    }, 'Bedrock invocation failed');

    return classified;
  }

  private async invoke(payload: VendorPayload, call: CallOptions): Promise<BedrockResponse> {
    const scope = this.scopeFor(call);
    const startTime = Date.now();

    try {
      const body = await this.invoker.invoke({
        modelId: this.invocationModelId,
        payload,
        signal: scope.signal,
      });
      const response = parseInvokeResponse(body, this.config.modelId);
      const duration = (Date.now() - startTime) / 1000;

      trackBedrockRequest(this.config.modelId, 'invoke', 'success', duration);
      trackTokens(this.config.modelId, response.usage);
      logger.info({
        modelId: this.invocationModelId,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        durationMs: Date.now() - startTime,
      }, 'Bedrock invocation complete');

      return response;
    } catch (error) {
      throw this.fail(error, scope, 'invoke', startTime);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Opens the stream before returning so vendor errors surface to the
   * caller up front. The deadline covers opening only; the caller's signal
   * and an early stop both abort the connection.
   */
  private async openStream(
    payload: VendorPayload,
    call: CallOptions
  ): Promise<ChunkStream> {
    const scope = this.scopeFor(call);
    const startTime = Date.now();

    let frames: AsyncIterable<Uint8Array>;
    try {
      frames = await this.invoker.invokeStream({
        modelId: this.invocationModelId,
        payload,
        signal: scope.signal,
      });
    } catch (error) {
      scope.close();
      throw this.fail(error, scope, 'stream', startTime);
    }

    scope.settle();
    trackBedrockRequest(this.config.modelId, 'stream', 'success', (Date.now() - startTime) / 1000);
    logger.info({ modelId: this.invocationModelId }, 'Bedrock stream opened');

    const close = () => scope.close();
    return closeOnReturn(this.guardStream(translateStream(frames, close)), close);
  }

  private async *guardStream(
    chunks: AsyncGenerator<StreamChunk, void, undefined>
  ): AsyncGenerator<StreamChunk, void, undefined> {
    try {
      for await (const chunk of chunks) {
        if (chunk.type === 'usage') {
          trackTokens(this.config.modelId, chunk);
        }
        yield chunk;
      }
    } catch (error) {
      throw classifyBedrockError(error, { modelId: this.invocationModelId, region: this.config.region });
    }
  }
}
