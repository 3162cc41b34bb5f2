export type ModelProvider = 'anthropic';

export interface ModelInfo {
  provider: ModelProvider;
  name: string;
  description: string;
  maxTokens: number;
  supportsStreaming: boolean;
  supportsFunctions: boolean;
  defaultTemperature: number;
}

export const DEFAULT_MODEL_ID = 'anthropic.claude-3-sonnet-20240229-v1:0';

export const BEDROCK_MODELS: Readonly<Record<string, Readonly<ModelInfo>>> = Object.freeze({
  'anthropic.claude-3-sonnet-20240229-v1:0': {
    provider: 'anthropic',
    name: 'Claude 3 Sonnet',
    description: 'Balanced Claude 3 model for enterprise workloads',
    maxTokens: 8192,
    supportsStreaming: true,
    supportsFunctions: true,
    defaultTemperature: 0,
  },
  'anthropic.claude-3-haiku-20240307-v1:0': {
    provider: 'anthropic',
    name: 'Claude 3 Haiku',
    description: 'Fast and efficient Claude model for simpler tasks',
    maxTokens: 4096,
    supportsStreaming: true,
    supportsFunctions: true,
    defaultTemperature: 0,
  },
  'anthropic.claude-3-opus-20240229-v1:0': {
    provider: 'anthropic',
    name: 'Claude 3 Opus',
    description: 'Most capable Claude 3 model for complex reasoning',
    maxTokens: 4096,
    supportsStreaming: true,
    supportsFunctions: true,
    defaultTemperature: 0,
  },
  'anthropic.claude-3-5-sonnet-20240620-v1:0': {
    provider: 'anthropic',
    name: 'Claude 3.5 Sonnet',
    description: 'Claude 3.5 Sonnet, first release',
    maxTokens: 8192,
    supportsStreaming: true,
    supportsFunctions: true,
    defaultTemperature: 0,
  },
  'anthropic.claude-3-5-sonnet-20241022-v2:0': {
    provider: 'anthropic',
    name: 'Claude 3.5 Sonnet v2',
    description: 'Claude 3.5 Sonnet, October 2024 release',
    maxTokens: 8192,
    supportsStreaming: true,
    supportsFunctions: true,
    defaultTemperature: 0,
  },
});

export const SUPPORTED_REGIONS = [
  'us-east-1', 'us-east-2', 'us-west-1', 'us-west-2',
  'eu-west-1', 'eu-west-2', 'eu-central-1',
  'ap-northeast-1', 'ap-southeast-1', 'ap-southeast-2',
] as const;

export type SupportedRegion = typeof SUPPORTED_REGIONS[number];

export function getModelInfo(modelId: string): Readonly<ModelInfo> | undefined {
  return Object.hasOwn(BEDROCK_MODELS, modelId) ? BEDROCK_MODELS[modelId] : undefined;
}

/**
 * Model id to invoke with. Cross-region inference goes through the
 * geography's system-defined inference profile, e.g. `us.anthropic.…`.
 */
export function resolveInvocationModelId(
  modelId: string,
  region: SupportedRegion,
  useCrossRegion: boolean
): string {
  if (!useCrossRegion) return modelId;
  const geography = region.startsWith('us-') ? 'us' : region.startsWith('eu-') ? 'eu' : 'apac';
  return `${geography}.${modelId}`;
}
