import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
  type ResponseStream,
} from '@aws-sdk/client-bedrock-runtime';
import { NodeHttpHandler } from '@smithy/node-http-handler';
import { logger } from '../middleware/logger.js';
import type { AppConfig } from '../config.js';
import type { BedrockInvoker, InvokeRequest } from './base.js';

export type BedrockRuntimeInvokerConfig = Pick<AppConfig, 'region' | 'timeout' | 'maxRetries' | 'headers'>;

/**
 * BedrockInvoker over the AWS SDK v3 runtime client. Credentials come from
 * the SDK's default provider chain (env vars, shared config, instance role).
 */
export class BedrockRuntimeInvoker implements BedrockInvoker {
  readonly client: BedrockRuntimeClient;
  private contentType: string;
  private accept: string;

  constructor(config: BedrockRuntimeInvokerConfig, client?: BedrockRuntimeClient) {
    this.contentType = config.headers['Content-Type'] ?? 'application/json';
    this.accept = config.headers.Accept ?? 'application/json';

    this.client = client ?? new BedrockRuntimeClient({
      region: config.region,
      maxAttempts: config.maxRetries + 1,
      retryMode: 'adaptive',
      requestHandler: new NodeHttpHandler({
        requestTimeout: config.timeout * 1000,
        connectionTimeout: 5000,
      }),
    });

    logger.info({
      region: config.region,
      timeoutSeconds: config.timeout,
      maxRetries: config.maxRetries,
    }, 'Initialized Bedrock runtime client');
  }

  async invoke(request: InvokeRequest): Promise<Uint8Array> {
    const command = new InvokeModelCommand({
      modelId: request.modelId,
      contentType: this.contentType,
      accept: this.accept,
      body: JSON.stringify(request.payload),
    });

    const response = await this.client.send(command, { abortSignal: request.signal });
    return response.body;
  }

  async invokeStream(request: InvokeRequest): Promise<AsyncIterable<Uint8Array>> {
    const command = new InvokeModelWithResponseStreamCommand({
      modelId: request.modelId,
      contentType: this.contentType,
      accept: this.accept,
      body: JSON.stringify(request.payload),
    });

    const response = await this.client.send(command, { abortSignal: request.signal });
    if (!response.body) {
      throw new Error('Bedrock returned no response stream');
    }
    return payloadBytes(response.body);
  }

  destroy(): void {
    this.client.destroy();
  }
}

async function* payloadBytes(events: AsyncIterable<ResponseStream>): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const event of events) {
    if (event.chunk?.bytes) {
      yield event.chunk.bytes;
    }
  }
}
