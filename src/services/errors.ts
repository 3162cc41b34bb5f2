/**
 * Bedrock error taxonomy. Every class keeps the original failure as `cause`
 * and carries the HTTP status the transport layer answers with.
 */

export type BedrockErrorCode =
  | 'invalid_request'
  | 'inference_profile_required'
  | 'access_denied'
  | 'model_not_found'
  | 'throttled'
  | 'transport_failure'
  | 'parse_error';

export class BedrockError extends Error {
  readonly code: BedrockErrorCode;
  readonly statusCode: number;

  constructor(code: BedrockErrorCode, statusCode: number, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BedrockError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidRequestError extends BedrockError {
  constructor(message: string, cause?: unknown) {
    super('invalid_request', 400, message, cause);
    this.name = 'InvalidRequestError';
  }
}

export class InferenceProfileRequiredError extends BedrockError {
  constructor(cause?: unknown) {
    super(
      'inference_profile_required',
      400,
      'AWS Bedrock requires an inference profile for this model. Create or select one in the AWS Console, or set BEDROCK_USE_CROSS_REGION=true.',
      cause
    );
    this.name = 'InferenceProfileRequiredError';
  }
}

export class AccessDeniedError extends BedrockError {
  constructor(cause?: unknown) {
    super('access_denied', 403, 'Access denied. Verify AWS credentials and model access permissions.', cause);
    this.name = 'AccessDeniedError';
  }
}

export class ModelNotFoundError extends BedrockError {
  readonly modelId: string;
  readonly region: string;

  constructor(modelId: string, region: string, cause?: unknown) {
    super('model_not_found', 404, `Model ${modelId} not found in ${region}`, cause);
    this.name = 'ModelNotFoundError';
    this.modelId = modelId;
    this.region = region;
  }
}

export class ThrottledError extends BedrockError {
  constructor(cause?: unknown) {
    super('throttled', 429, 'Request throttled. Reduce request rate or increase quota.', cause);
    this.name = 'ThrottledError';
  }
}

export class TransportFailureError extends BedrockError {
  constructor(message: string, cause?: unknown) {
    super('transport_failure', 502, message, cause);
    this.name = 'TransportFailureError';
  }
}

export class ParseError extends BedrockError {
  constructor(message: string, cause?: unknown) {
    super('parse_error', 502, message, cause);
    this.name = 'ParseError';
  }
}

export interface ClassifyContext {
  modelId: string;
  region: string;
}

function describe(error: unknown): { name: string; message: string } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  if (typeof error === 'object' && error !== null) {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : '';
    const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
    return { name, message };
  }
  return { name: '', message: String(error) };
}

const KNOWN_NAMES = [
  'ValidationException',
  'AccessDeniedException',
  'ResourceNotFoundException',
  'ThrottlingException',
  'ServiceQuotaExceededException',
] as const;

type KnownName = typeof KNOWN_NAMES[number];

function vendorErrorName(name: string, message: string): KnownName | undefined {
  const structured = KNOWN_NAMES.find(known => known === name);
  if (structured) return structured;
  // Errors that crossed a serialization boundary only keep their text.
  const text = `${name} ${message}`;
  return KNOWN_NAMES.find(known => text.includes(known));
}

/**
 * Map a failure from the vendor call onto the local taxonomy.
 */
export function classifyBedrockError(error: unknown, context: ClassifyContext): BedrockError {
  if (error instanceof BedrockError) return error;

  const { name, message } = describe(error);

  switch (vendorErrorName(name, message)) {
    case 'ValidationException':
      if (/inference profile/i.test(message)) {
        return new InferenceProfileRequiredError(error);
      }
      return new InvalidRequestError(`Invalid request: ${message}`, error);
    case 'AccessDeniedException':
      return new AccessDeniedError(error);
    case 'ResourceNotFoundException':
      return new ModelNotFoundError(context.modelId, context.region, error);
    case 'ThrottlingException':
    case 'ServiceQuotaExceededException':
      return new ThrottledError(error);
    default:
      return new TransportFailureError(
        message ? `Bedrock request failed: ${message}` : 'Bedrock request failed',
        error
      );
  }
}
