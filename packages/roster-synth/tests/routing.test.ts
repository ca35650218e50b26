/**
 * Model routing and providers - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { createContentModel, GeminiContentModel, OpenRouterContentModel } from '../src/providers/index.js';
import { ModelRouter } from '../src/routing/index.js';
import { APIError, SynthError, ValidationError } from '../src/types.js';

describe('ModelRouter', () => {
  const router = new ModelRouter({ defaultProvider: 'gemini', providerKeys: { gemini: 'test-secret' } });

  it('should pick the highest priority route of the provider', () => {
    expect(router.selectModel({}).model).toBe('gemini-2.5-flash');
    expect(router.selectModel({ provider: 'openrouter' }).model).toBe('google/gemini-2.5-flash');
  });

  it('should filter by capability', () => {
    expect(router.selectModel({ capabilities: ['reasoning'] }).model).toBe('gemini-2.5-pro');
  });

  it('should honour a known preferred model', () => {
    const route = router.selectModel({ provider: 'openrouter', preferredModel: 'openai/gpt-4o-mini' });
    expect(route.maxOutputTokens).toBe(16384);
  });

  it('should give an unknown preferred model a conservative ceiling', () => {
    expect(router.selectModel({ preferredModel: 'gemini-next' })).toEqual({
      provider: 'gemini',
      model: 'gemini-next',
      priority: 0,
      maxOutputTokens: 8192,
      capabilities: ['text', 'json']
    });
  });

  it('should fail when nothing matches', () => {
    let caught: unknown;
    try {
      router.selectModel({ capabilities: ['vision'] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SynthError);
    expect(caught).toMatchObject({ code: 'NO_MODEL_FOUND' });
  });

  it('should accept custom routes and hand out provider keys', () => {
    const custom = new ModelRouter({ defaultProvider: 'openrouter', providerKeys: { openrouter: 'test-secret' } });
    custom.addRoute({
      provider: 'openrouter',
      model: 'meta/llama-json',
      priority: 20,
      maxOutputTokens: 4096,
      capabilities: ['text', 'json']
    });

    const route = custom.selectModel({ capabilities: ['json'] });

    expect(route.model).toBe('meta/llama-json');
    expect(custom.getModelConfig(route)).toEqual({
      provider: 'openrouter',
      model: 'meta/llama-json',
      apiKey: 'test-secret'
    });
  });
});

describe('OpenRouterContentModel', () => {
  const request = { system: 'Answer in JSON.', prompt: 'Create a roster.', temperature: 0.5, maxOutputTokens: 2048 };

  function modelReturning(response: Response, bodies: unknown[] = []): OpenRouterContentModel {
    const fakeFetch: typeof fetch = async (_input, init) => {
      bodies.push(JSON.parse(String(init?.body)));
      return response;
    };
    return new OpenRouterContentModel({ apiKey: 'test-secret', model: 'openai/gpt-4o-mini', fetch: fakeFetch });
  }

  it('should send a JSON-mode chat completion', async () => {
    const bodies: unknown[] = [];
    const model = modelReturning(
      new Response(
        JSON.stringify({
          model: 'openai/gpt-4o-mini',
          choices: [{ message: { role: 'assistant', content: '{"students": []}' }, finish_reason: 'stop' }],
          usage: { prompt_tokens: 120, completion_tokens: 8, total_tokens: 128 }
        }),
        { status: 200 }
      ),
      bodies
    );

    const response = await model.complete(request);

    expect(response).toEqual({
      text: '{"students": []}',
      finishReason: 'stop',
      truncated: false,
      model: 'openai/gpt-4o-mini',
      usage: { promptTokens: 120, outputTokens: 8 }
    });
    expect(bodies[0]).toMatchObject({
      model: 'openai/gpt-4o-mini',
      temperature: 0.5,
      max_tokens: 2048,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: 'Answer in JSON.' },
        { role: 'user', content: 'Create a roster.' }
      ]
    });
  });

  it('should flag a length stop as truncated', async () => {
    const model = modelReturning(
      new Response(JSON.stringify({ choices: [{ message: { content: '{"students": [' }, finish_reason: 'length' }] }), {
        status: 200
      })
    );

    const response = await model.complete(request);

    expect(response.truncated).toBe(true);
    expect(response.model).toBe('openai/gpt-4o-mini');
  });

  it('should turn HTTP failures into API errors', async () => {
    const model = modelReturning(new Response('quota exceeded', { status: 429, statusText: 'Too Many Requests' }));

    const result = model.complete(request);

    await expect(result).rejects.toBeInstanceOf(APIError);
    await expect(result).rejects.toThrow('OpenRouter API error: HTTP 429: Too Many Requests quota exceeded');
  });
});

describe('createContentModel', () => {
  it('should build a Gemini model by default', () => {
    const { model, route } = createContentModel(loadConfig({ apiKey: 'test-secret' }, {}));

    expect(model).toBeInstanceOf(GeminiContentModel);
    expect(route.model).toBe('gemini-2.5-flash');
  });

  it('should build an OpenRouter model for the openrouter provider', () => {
    const { model, route } = createContentModel(loadConfig({ provider: 'openrouter', apiKey: 'test-secret' }, {}));

    expect(model).toBeInstanceOf(OpenRouterContentModel);
    expect(model.model).toBe('google/gemini-2.5-flash');
    expect(route.maxOutputTokens).toBe(65536);
  });

  it('should require an API key', () => {
    expect(() => createContentModel(loadConfig({ provider: 'openrouter' }, {}))).toThrow(ValidationError);
  });
});
