import { z } from 'zod';

export const MessageSchema = z.object({
  role: z.string().min(1),
  content: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

const temperature = z.number().min(0).max(1).optional();
const maxTokens = z.number().int().positive().optional();
const timeoutMs = z.number().int().positive().max(600000).optional();

export const GenerateRequestSchema = z.object({
  prompt: z.string().min(1),
  system_prompt: z.string().optional(),
  temperature,
  max_tokens: maxTokens,
  use_cache: z.boolean().optional(),
  timeout_ms: timeoutMs,
});

export const ChatRequestSchema = z.object({
  messages: z.array(MessageSchema).min(1),
  temperature,
  max_tokens: maxTokens,
  stream: z.boolean().default(false),
  timeout_ms: timeoutMs,
});

export const CodeAnalysisRequestSchema = z.object({
  code: z.string().min(1),
  context: z.string().optional(),
  timeout_ms: timeoutMs,
});

export const SummarizeRequestSchema = z.object({
  text: z.string().min(1),
  max_length: z.number().int().positive().optional(),
  format: z.string().default('bullet_points'),
  timeout_ms: timeoutMs,
});

export type GenerateRequest = z.infer<typeof GenerateRequestSchema>;
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type CodeAnalysisRequest = z.infer<typeof CodeAnalysisRequestSchema>;
export type SummarizeRequest = z.infer<typeof SummarizeRequestSchema>;

export const UsageResponseSchema = z.object({
  input_tokens: z.number(),
  output_tokens: z.number(),
  cache_write_tokens: z.number().optional(),
  cache_read_tokens: z.number().optional(),
});

export const ChatResponseSchema = z.object({
  model_id: z.string(),
  content: z.string(),
  usage: UsageResponseSchema,
  metadata: z.record(z.unknown()).optional(),
});

export type ChatResponse = z.infer<typeof ChatResponseSchema>;
