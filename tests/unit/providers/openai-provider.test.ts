/**
 * Unit Tests for OpenAIProvider
 */

import {
  InvalidRequestError,
  OpenAIProvider,
  ProviderAPIError,
} from '../../../src/middleware/services/imagegen/providers';
import { FakeHttpClient, FakeTimer, captureError, jsonBody } from '../../fixtures/fakes';

describe('OpenAIProvider', () => {
  let http: FakeHttpClient;
  let provider: OpenAIProvider;

  beforeEach(() => {
    http = new FakeHttpClient();
    provider = new OpenAIProvider({
      apiUrl: 'https://openai.test/v1/',
      httpClient: http,
      timer: new FakeTimer(),
    });
  });

  describe('processImageGeneration', () => {
    it('should translate url and b64_json items', async () => {
      http.enqueue({
        status: 200,
        body: {
          created: 1700000000,
          data: [
            { url: 'https://cdn.test/dalle.png', revised_prompt: 'A red fox standing in snow' },
            { b64_json: 'aGVsbG8=' },
          ],
        },
      });

      const result = await provider.processImageGeneration(
        'images/generations',
        { prompt: 'a red fox', n: 2 },
        'test-secret'
      );

      expect(result).toEqual({
        created: 1700000000,
        data: [
          { url: 'https://cdn.test/dalle.png', revised_prompt: 'A red fox standing in snow' },
          { url: 'data:image/png;base64,aGVsbG8=', revised_prompt: 'a red fox' },
        ],
      });
    });

    it('should send the OpenAI request body', async () => {
      http.enqueue({ status: 200, body: { data: [{ url: 'https://cdn.test/dalle.png' }] } });

      await provider.processImageGeneration(
        'images/generations',
        { prompt: 'a red fox', quality: 'hd' },
        'test-secret'
      );

      const [request] = http.requests;
      expect(request.url).toBe('https://openai.test/v1/images/generations');
      expect(request.headers).toEqual({
        Authorization: 'Bearer test-secret',
        'Content-Type': 'application/json',
      });
      expect(jsonBody(request)).toEqual({
        model: 'dall-e-3',
        prompt: 'a red fox',
        n: 1,
        size: '1024x1024',
        quality: 'hd',
        response_format: 'url',
      });
    });

    it('should fail when no images come back', async () => {
      http.enqueue({ status: 200, body: { created: 1700000000, data: [] } });

      const error = await captureError(
        provider.processImageGeneration('images/generations', { prompt: 'a red fox' }, 'test-secret')
      );

      expect(error).toBeInstanceOf(ProviderAPIError);
      expect(error).toMatchObject({ statusCode: 500, message: 'No image data returned from OpenAI API' });
    });

    it('should fail without a network call when the prompt is empty', async () => {
      await expect(
        provider.processImageGeneration('images/generations', { prompt: '' }, 'test-secret')
      ).rejects.toBeInstanceOf(InvalidRequestError);
      expect(http.requests).toHaveLength(0);
    });
  });

  describe('listModels', () => {
    it('should fetch the live model list once per key', async () => {
      http.enqueue({ status: 200, body: { data: [{ id: 'dall-e-3' }, { id: 'gpt-image-1' }] } });

      const first = await provider.listModels('test-secret');
      const second = await provider.listModels('test-secret');

      expect(first).toEqual(['dall-e-3', 'gpt-image-1']);
      expect(second).toEqual(first);
      expect(http.requests).toHaveLength(1);
      expect(http.requests[0]).toMatchObject({
        method: 'GET',
        url: 'https://openai.test/v1/models',
        headers: { Authorization: 'Bearer test-secret' },
      });
    });

    it('should use the given base URL and query parameters', async () => {
      http.enqueue({ status: 200, body: { data: [{ id: 'local-model' }] } });

      await provider.listModels('test-secret', 'https://gateway.test/v1/', { limit: '10' });

      expect(http.requests[0].url).toBe('https://gateway.test/v1/models?limit=10');
    });

    it('should refetch after invalidation', async () => {
      http.enqueue(
        { status: 200, body: { data: [{ id: 'dall-e-2' }] } },
        { status: 200, body: { data: [{ id: 'dall-e-3' }] } }
      );

      await provider.listModels('test-secret');
      provider.invalidateModels('test-secret');

      await expect(provider.listModels('test-secret')).resolves.toEqual(['dall-e-3']);
      expect(http.requests).toHaveLength(2);
    });

    it('should fail and cache nothing on an error status', async () => {
      http.enqueue(
        { status: 401, text: 'Incorrect API key' },
        { status: 200, body: { data: [{ id: 'dall-e-3' }] } }
      );

      await expect(provider.listModels('test-secret')).rejects.toMatchObject({
        statusCode: 401,
        message: 'Incorrect API key',
      });
      await expect(provider.listModels('test-secret')).resolves.toEqual(['dall-e-3']);
    });
  });

  describe('forwarded operations', () => {
    it('should forward completion payloads', async () => {
      const reply = { id: 'cmpl-1', choices: [{ message: { role: 'assistant', content: 'hi' } }] };
      http.enqueue({ status: 200, body: reply });

      const payload = { model: 'gpt-4o-mini', messages: [{ role: 'user', content: 'hello' }] };
      const result = await provider.processCompletion('/chat/completions', payload, 'test-secret');

      expect(result).toEqual(reply);
      expect(http.requests[0].url).toBe('https://openai.test/v1/chat/completions');
      expect(jsonBody(http.requests[0])).toEqual(payload);
    });

    it('should forward embeddings payloads', async () => {
      http.enqueue({ status: 200, body: { data: [{ embedding: [0.1, 0.2] }] } });

      await provider.processEmbeddings('embeddings', { input: 'fox' }, 'test-secret');

      expect(http.requests[0].url).toBe('https://openai.test/v1/embeddings');
    });

    it('should surface the status of a rejected forward', async () => {
      http.enqueue({ status: 404, text: 'model not found' });

      await expect(
        provider.processCompletion('chat/completions', { model: 'missing' }, 'test-secret')
      ).rejects.toMatchObject({ statusCode: 404, message: 'model not found' });
    });
  });
});
