import type { BedrockResponse, StreamChunk, Usage } from '../providers/base.js';
import {
  InvokeResponseSchema,
  StreamEventSchema,
  TRANSLATED_EVENT_TYPES,
  type StreamEvent,
  type VendorUsage,
} from '../schemas/vendor.js';
import { ParseError } from './errors.js';

const decoder = new TextDecoder();

function decodeJson(bytes: Uint8Array, what: string): unknown {
  const text = decoder.decode(bytes);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Failed to decode ${what} as JSON`, error);
  }
}

export function toUsage(usage: VendorUsage | undefined): Usage {
  const result: Usage = {
    inputTokens: usage?.input_tokens ?? 0,
    outputTokens: usage?.output_tokens ?? 0,
  };
  if (usage?.cache_creation_input_tokens != null) {
    result.cacheWriteTokens = usage.cache_creation_input_tokens;
  }
  if (usage?.cache_read_input_tokens != null) {
    result.cacheReadTokens = usage.cache_read_input_tokens;
  }
  return result;
}

/**
 * Translate a single-shot InvokeModel body. Non-text content blocks are
 * skipped; a body with no text block at all is a parse failure.
 */
export function parseInvokeResponse(body: Uint8Array, modelId: string): BedrockResponse {
  const parsed = InvokeResponseSchema.safeParse(decodeJson(body, 'response body'));
  if (!parsed.success) {
    throw new ParseError('Unexpected response shape from Bedrock', parsed.error);
  }

  const block = parsed.data.content.find(b => b.type === 'text' && b.text !== undefined);
  if (block?.text === undefined) {
    throw new ParseError('Bedrock response contains no text content block');
  }

  const metadata: Record<string, unknown> = {};
  if (parsed.data.id) metadata.id = parsed.data.id;
  if (parsed.data.stop_reason) metadata.stopReason = parsed.data.stop_reason;

  return {
    modelId,
    content: block.text,
    usage: toUsage(parsed.data.usage),
    ...(Object.keys(metadata).length > 0 ? { metadata } : {}),
  };
}

function translateEvent(event: StreamEvent): StreamChunk | undefined {
  switch (event.type) {
    case 'message_start':
      return { type: 'usage', ...toUsage(event.message.usage) };
    case 'content_block_start':
      return event.content_block.type === 'text'
        ? { type: 'text', text: event.content_block.text ?? '' }
        : undefined;
    case 'content_block_delta':
      return event.delta.type === 'text_delta'
        ? { type: 'text', text: event.delta.text ?? '' }
        : undefined;
  }
}

function eventType(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string') {
    return value.type;
  }
  return undefined;
}

/**
 * Lazily translate raw stream frames into chunks. Event types the gateway
 * does not translate are dropped. Stopping early runs `onClose` so the
 * caller can release the connection.
 */
export async function* translateStream(
  frames: AsyncIterable<Uint8Array>,
  onClose?: () => void
): AsyncGenerator<StreamChunk, void, undefined> {
  try {
    for await (const frame of frames) {
      const raw = decodeJson(frame, 'stream event');
      const type = eventType(raw);
      if (type === undefined || !TRANSLATED_EVENT_TYPES.has(type)) continue;

      const event = StreamEventSchema.safeParse(raw);
      if (!event.success) {
        throw new ParseError(`Malformed ${type} event in Bedrock stream`, event.error);
      }

      const chunk = translateEvent(event.data);
      if (chunk) yield chunk;
    }
  } finally {
    onClose?.();
  }
}

export interface CollectedStream {
  text: string;
  usage: Usage;
}

/**
 * Drain a chunk sequence into its concatenated text and summed usage.
 */
export async function collectStream(chunks: AsyncIterable<StreamChunk>): Promise<CollectedStream> {
  let text = '';
  const usage: Usage = { inputTokens: 0, outputTokens: 0 };

  for await (const chunk of chunks) {
    if (chunk.type === 'text') {
      text += chunk.text;
      continue;
    }
    usage.inputTokens += chunk.inputTokens;
    usage.outputTokens += chunk.outputTokens;
    if (chunk.cacheWriteTokens !== undefined) {
      usage.cacheWriteTokens = (usage.cacheWriteTokens ?? 0) + chunk.cacheWriteTokens;
    }
    if (chunk.cacheReadTokens !== undefined) {
      usage.cacheReadTokens = (usage.cacheReadTokens ?? 0) + chunk.cacheReadTokens;
    }
  }

  return { text, usage };
}
