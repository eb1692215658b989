import { z } from 'zod';
import { PermanentProviderError, TransientProviderError } from '../../src/lib/errors';
import {
  AnthropicProvider,
  FakeContentProvider,
  OpenAIProvider,
  classifyProviderFailure,
  createContentProvider,
  extractJsonObject,
  generateStructured,
} from '../../queue-pump/src/ai';
import { chunkText } from '../../queue-pump/src/strategies/sme_ingestion';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

const request = { task: 'outline' as const, system: 'sys', prompt: 'Title: Churn' };

describe('classifyProviderFailure', () => {
  it.each([408, 429, 500, 529])('treats %i as transient', (status) => {
    expect(classifyProviderFailure('anthropic', status, 'busy')).toBeInstanceOf(TransientProviderError);
  });

  it('treats other client errors as permanent unless the body says otherwise', () => {
    const error = classifyProviderFailure('openai', 400, 'bad request');
    expect(error).toBeInstanceOf(PermanentProviderError);
    expect(error.message).toBe('openai 400: bad request');
    expect(classifyProviderFailure('openai', 400, 'model is overloaded')).toBeInstanceOf(TransientProviderError);
  });
});

describe('extractJsonObject', () => {
  it('reads plain JSON and JSON wrapped in prose or fences', () => {
    expect(extractJsonObject('{"a":1}')).toEqual({ a: 1 });
    expect(extractJsonObject('Here you go:\n```json\n{"a":{"b":2}}\n```')).toEqual({ a: { b: 2 } });
    expect(extractJsonObject('nothing here')).toBeNull();
  });
});

describe('generateStructured', () => {
  const schema = z.object({ title: z.string() });

  it('repairs an invalid first reply once', async () => {
    const provider = new FakeContentProvider().replyNext('{"name":"x"}').replyNext('{"title":"Fixed"}');
    const result = await generateStructured(provider, schema, request);

    expect(result).toEqual({ value: { title: 'Fixed' }, tokensUsed: 20 });
    expect(provider.requests[1].prompt).toContain('Problems: title: Required');
  });
});

describe('AnthropicProvider', () => {
  it('prefills the opening brace and sums token usage', async () => {
    const calls: Array<{ url: string; body: unknown }> = [];
    const provider = new AnthropicProvider({
      apiKey: 'test-secret',
      model: 'test-model',
      fetchImpl: async (url, init) => {
        calls.push({ url, body: JSON.parse(String(init?.body)) });
        return jsonResponse(200, {
          content: [{ type: 'text', text: '"title":"Churn"}' }],
          usage: { input_tokens: 12, output_tokens: 8 },
        });
      },
    });

    expect(await provider.generateJson(request)).toEqual({ text: '{"title":"Churn"}', tokensUsed: 20 });
    expect(calls[0].url).toBe('https://api.anthropic.com/v1/messages');
    expect(calls[0].body).toMatchObject({ model: 'test-model', system: 'sys', max_tokens: 3600 });
  });

  it('maps rate limits to transient errors', async () => {
    const provider = new AnthropicProvider({
      apiKey: 'test-secret',
      model: 'test-model',
      fetchImpl: async () => jsonResponse(429, 'slow down'),
    });
    await expect(provider.generateJson(request)).rejects.toThrow(new TransientProviderError('anthropic 429: slow down'));
  });

  it('maps transport failures to transient errors', async () => {
    const provider = new AnthropicProvider({
      apiKey: 'test-secret',
      model: 'test-model',
      fetchImpl: async () => {
        throw new Error('socket hang up');
      },
    });
    await expect(provider.generateJson(request)).rejects.toThrow('Provider request failed: socket hang up');
  });
});

describe('OpenAIProvider', () => {
  it('reports refusals as permanent', async () => {
    const provider = new OpenAIProvider({
      apiKey: 'test-secret',
      model: 'test-model',
      fetchImpl: async () =>
        jsonResponse(200, { choices: [{ message: { content: null, refusal: 'not allowed' } }] }),
    });
    await expect(provider.generateJson(request)).rejects.toThrow(new PermanentProviderError('openai refused: not allowed'));
  });
});

describe('createContentProvider', () => {
  it('needs an API key for real providers', () => {
    expect(() => createContentProvider({ provider: 'openai', model: 'm', apiKey: null, timeoutMs: 1000 })).toThrow(
      'BLOCKED: API key for openai is REQUIRED'
    );
    expect(createContentProvider({ provider: 'fake', model: 'fake', apiKey: null, timeoutMs: 1000 }).name).toBe('fake');
  });
});

describe('chunkText', () => {
  it('packs paragraphs up to the limit', () => {
    expect(chunkText('aaaa\n\nbbbb\n\ncccc', 10)).toEqual(['aaaa\n\nbbbb', 'cccc']);
  });

  it('splits paragraphs longer than the limit', () => {
    expect(chunkText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('ignores blank input', () => {
    expect(chunkText('  \n\n  ')).toEqual([]);
  });
});
