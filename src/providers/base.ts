export interface Message {
  readonly role: string;
  readonly content: string;
  readonly metadata?: Record<string, unknown>;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  cacheWriteTokens?: number;
  cacheReadTokens?: number;
}

export interface BedrockResponse {
  modelId: string;
  content: string;
  usage: Usage;
  metadata?: Record<string, unknown>;
}

export type StreamChunk =
  | { type: 'text'; text: string }
  | ({ type: 'usage' } & Usage);

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface PayloadMessage {
  role: string;
  content: TextBlock[];
}

/**
 * Anthropic Messages body as accepted by Bedrock's InvokeModel.
 */
export interface VendorPayload {
  anthropic_version: 'bedrock-2023-05-31';
  system?: TextBlock[];
  messages: PayloadMessage[];
  max_tokens: number;
  temperature: number;
  anthropic_beta?: string[];
}

export interface InvokeRequest {
  modelId: string;
  payload: VendorPayload;
  signal?: AbortSignal;
}

/**
 * The single seam between the service and the vendor. Single-shot calls
 * resolve with the raw response body; streaming calls resolve once the
 * connection is open, with the raw event frames still to be read.
 */
export interface BedrockInvoker {
  invoke(request: InvokeRequest): Promise<Uint8Array>;
  invokeStream(request: InvokeRequest): Promise<AsyncIterable<Uint8Array>>;
}
