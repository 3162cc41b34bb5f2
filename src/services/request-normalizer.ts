import type { Message, PayloadMessage, TextBlock, VendorPayload } from '../providers/base.js';

export interface GenerationOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface NormalizerDefaults {
  temperature: number;
  maxTokens: number;
  /** Output ceiling of the configured model. */
  modelMaxTokens: number;
  anthropicBeta?: readonly string[];
}

const ANTHROPIC_VERSION = 'bedrock-2023-05-31';

function textBlock(text: string): TextBlock {
  return { type: 'text', text };
}

function buildPayload(
  system: TextBlock[],
  messages: PayloadMessage[],
  options: Omit<GenerationOptions, 'systemPrompt'>,
  defaults: NormalizerDefaults
): VendorPayload {
  const maxTokens = Math.min(options.maxTokens ?? defaults.maxTokens, defaults.modelMaxTokens);

  return {
    anthropic_version: ANTHROPIC_VERSION,
    ...(system.length > 0 ? { system } : {}),
    messages,
    max_tokens: maxTokens,
    temperature: options.temperature ?? defaults.temperature,
    ...(defaults.anthropicBeta && defaults.anthropicBeta.length > 0
      ? { anthropic_beta: [...defaults.anthropicBeta] }
      : {}),
  };
}

export function normalizeGeneration(
  prompt: string,
  options: GenerationOptions,
  defaults: NormalizerDefaults
): VendorPayload {
  const system = options.systemPrompt ? [textBlock(options.systemPrompt)] : [];
  return buildPayload(
    system,
    [{ role: 'user', content: [textBlock(prompt)] }],
    options,
    defaults
  );
}

/**
 * One block per message, in input order. `system` turns move into the
 * payload's system blocks since the Messages API rejects them inline.
 */
export function normalizeChat(
  messages: readonly Message[],
  options: Omit<GenerationOptions, 'systemPrompt'>,
  defaults: NormalizerDefaults
): VendorPayload {
  const system: TextBlock[] = [];
  const turns: PayloadMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      system.push(textBlock(message.content));
    } else {
      turns.push({ role: message.role, content: [textBlock(message.content)] });
    }
  }

  return buildPayload(system, turns, options, defaults);
}
