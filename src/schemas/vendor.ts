import { z } from 'zod';

/**
 * Wire shapes of the Anthropic Messages API as returned through Bedrock.
 * Only the fields the gateway reads are declared; everything else passes.
 */

export const VendorUsageSchema = z.object({
  input_tokens: z.number().int().nonnegative().optional(),
  output_tokens: z.number().int().nonnegative().optional(),
  cache_creation_input_tokens: z.number().int().nonnegative().nullish(),
  cache_read_input_tokens: z.number().int().nonnegative().nullish(),
});

export const ContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

export const InvokeResponseSchema = z.object({
  id: z.string().optional(),
  content: z.array(ContentBlockSchema),
  stop_reason: z.string().nullish(),
  usage: VendorUsageSchema.optional(),
});

export const StreamEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('message_start'),
    message: z.object({ usage: VendorUsageSchema.optional() }),
  }),
  z.object({
    type: z.literal('content_block_start'),
    content_block: ContentBlockSchema,
  }),
  z.object({
    type: z.literal('content_block_delta'),
    delta: z.object({ type: z.string(), text: z.string().optional() }),
  }),
]);

export type VendorUsage = z.infer<typeof VendorUsageSchema>;
export type InvokeResponse = z.infer<typeof InvokeResponseSchema>;
export type StreamEvent = z.infer<typeof StreamEventSchema>;

export const TRANSLATED_EVENT_TYPES: ReadonlySet<string> = new Set([
  'message_start',
  'content_block_start',
  'content_block_delta',
]);
