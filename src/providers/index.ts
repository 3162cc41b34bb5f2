import { BedrockRuntimeInvoker } from './bedrock.js';

export { BedrockRuntimeInvoker };
export type { BedrockRuntimeInvokerConfig } from './bedrock.js';
export type {
  BedrockInvoker,
  BedrockResponse,
  InvokeRequest,
  Message,
  StreamChunk,
  Usage,
  VendorPayload,
} from './base.js';
export {
  BEDROCK_MODELS,
  DEFAULT_MODEL_ID,
  SUPPORTED_REGIONS,
  getModelInfo,
  resolveInvocationModelId,
} from './models.js';
export type { ModelInfo, SupportedRegion } from './models.js';
