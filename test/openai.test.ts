/**
 * @file test/openai.test.ts
 * @description Тесты reasoning-клиента OpenAI Responses API (fetch подменён)
 */

import { OpenAIReasoningService } from '../src/services/openai';
import { AIProviderError } from '../src/types/errors';

function responsesBody(text: string): Response {
  return new Response(JSON.stringify({
    id: 'resp_1',
    output: [
      { type: 'reasoning' },
      { type: 'message', role: 'assistant', content: [{ type: 'output_text', text }] },
    ],
    usage: { input_tokens: 10, output_tokens: 5, total_tokens: 15 },
  }), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('OpenAIReasoningService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should fail fast without an API key', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch');
    const service = new OpenAIReasoningService({ apiKey: '' });

    await expect(service.complete('hello')).rejects.toThrow('AI Provider error (openai): OPENAI_API_KEY is not configured');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('should return the first output text block', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(responsesBody('AGENTS: performance'));
    const service = new OpenAIReasoningService({
      apiKey: 'test-secret',
      baseUrl: 'http://openai.test/v1',
      model: 'test-model',
    });

    const text = await service.complete('Route this', { instructions: 'Be brief', temperature: 0, maxTokens: 300 });

    expect(text).toBe('AGENTS: performance');
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://openai.test/v1/responses');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      input: 'Route this',
      instructions: 'Be brief',
      temperature: 0,
      max_output_tokens: 300,
    });
  });

  it('should not retry client errors', async () => {
    const fetchSpy = jest.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('bad request', { status: 400 }));
    const service = new OpenAIReasoningService({ apiKey: 'test-secret', baseUrl: 'http://openai.test/v1' });

    const pending = service.complete('hello');

    await expect(pending).rejects.toBeInstanceOf(AIProviderError);
    await expect(pending).rejects.toMatchObject({ httpStatus: 400 });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('should return an empty string when there is no message output', async () => {
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ id: 'resp_2', output: [] }), { status: 200 })
    );
    const service = new OpenAIReasoningService({ apiKey: 'test-secret', baseUrl: 'http://openai.test/v1' });

    await expect(service.complete('hello')).resolves.toBe('');
  });
});
