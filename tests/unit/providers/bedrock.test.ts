import { describe, it, expect } from 'vitest';
import {
  BedrockRuntimeClient,
  type ResponseStream,
  type ServiceInputTypes,
  type ServiceOutputTypes,
} from '@aws-sdk/client-bedrock-runtime';
import { Uint8ArrayBlobAdapter } from '@smithy/util-stream';
import { BedrockRuntimeInvoker } from '../../../src/providers/bedrock.js';
import { testConfig, toArray } from '../../helpers/bedrock.js';

const payload = {
  anthropic_version: 'bedrock-2023-05-31' as const,
  messages: [{ role: 'user', content: [{ type: 'text' as const, text: 'Hi' }] }],
  max_tokens: 100,
  temperature: 0,
};

/**
 * A runtime client whose middleware stack answers every command in process,
 * recording the command inputs it saw.
 */
function stubbedClient(output: ServiceOutputTypes) {
  const client = new BedrockRuntimeClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });
  const inputs: ServiceInputTypes[] = [];

  client.middlewareStack.add(
    () => async (args) => {
      inputs.push(args.input);
      return { output, response: {} };
    },
    { step: 'initialize', name: 'inProcessBedrock' }
  );

  return { client, inputs };
}

async function* events(items: ResponseStream[]): AsyncGenerator<ResponseStream> {
  for (const item of items) {
    yield item;
  }
}

describe('BedrockRuntimeInvoker', () => {
  it('sends the payload as a JSON InvokeModel body', async () => {
    const { client, inputs } = stubbedClient({
      $metadata: {},
      contentType: 'application/json',
      body: Uint8ArrayBlobAdapter.fromString('{"content":[]}'),
    });
    const invoker = new BedrockRuntimeInvoker(testConfig, client);

    const body = await invoker.invoke({ modelId: 'anthropic.claude-3-haiku-20240307-v1:0', payload });

    expect(new TextDecoder().decode(body)).toBe('{"content":[]}');
    expect(inputs).toHaveLength(1);
    expect(inputs[0]).toMatchObject({
      modelId: 'anthropic.claude-3-haiku-20240307-v1:0',
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify(payload),
    });
  });

  it('yields the raw bytes of each stream chunk', async () => {
    const encoder = new TextEncoder();
    const { client } = stubbedClient({
      $metadata: {},
      contentType: 'application/json',
      body: events([
        { chunk: { bytes: encoder.encode('{"type":"ping"}') } },
        { chunk: { bytes: encoder.encode('{"type":"message_stop"}') } },
      ]),
    });
    const invoker = new BedrockRuntimeInvoker(testConfig, client);

    const frames = await invoker.invokeStream({ modelId: 'anthropic.claude-3-haiku-20240307-v1:0', payload });
    const decoded = (await toArray(frames)).map((bytes) => new TextDecoder().decode(bytes));

    expect(decoded).toEqual(['{"type":"ping"}', '{"type":"message_stop"}']);
  });

  it('fails when the stream response has no body', async () => {
    const { client } = stubbedClient({
      $metadata: {},
      contentType: 'application/json',
      body: undefined,
    });
    const invoker = new BedrockRuntimeInvoker(testConfig, client);

    await expect(invoker.invokeStream({ modelId: 'anthropic.claude-3-haiku-20240307-v1:0', payload }))
      .rejects.toThrow('Bedrock returned no response stream');
  });
});
