import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ModelRequest } from '../models/gateway';
import { OllamaGateway } from './ollama-gateway';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

const jsonRequest: ModelRequest = { prompt: 'List the headings.', maxTokens: 256, temperature: 0.1, topP: 0.9, json: true };

const ok = (response: string) => new Response(JSON.stringify({ response }), { status: 200 });
const rejected = () => new Response('unknown field: format', { status: 400 });

let fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>();

const sentBody = (call: number): Record<string, unknown> =>
  JSON.parse(String(fetchMock.mock.calls[call][1]?.body));

beforeEach(() => {
  fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>();
  vi.stubGlobal('fetch', fetchMock);
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('OllamaGateway', () => {
  it('posts a non-streaming generate request with JSON format', async () => {
    fetchMock.mockImplementation(async () => ok('  {"selected_heading_ids": ["H1"]}\n'));
    const gateway = new OllamaGateway({ baseUrl: 'http://ollama.test:11434/', model: 'test-model' });

    const text = await gateway.complete({ ...jsonRequest, system: 'Be brief.' });

    expect(text).toBe('{"selected_heading_ids": ["H1"]}');
    expect(fetchMock.mock.calls[0][0]).toBe('http://ollama.test:11434/api/generate');
    expect(sentBody(0)).toEqual({
      model: 'test-model',
      prompt: 'List the headings.',
      stream: false,
      system: 'Be brief.',
      format: 'json',
      options: { temperature: 0.1, top_p: 0.9, num_predict: 256 },
    });
    expect(gateway.jsonFormatSupport).toBe('supported');
  });

  it('retries once without format and stops sending it afterwards', async () => {
    fetchMock
      .mockImplementationOnce(async () => rejected())
      .mockImplementation(async () => ok('{"a": 1}'));
    const gateway = new OllamaGateway();

    expect(await gateway.complete(jsonRequest)).toBe('{"a": 1}');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(sentBody(0).format).toBe('json');
    expect(sentBody(1)).not.toHaveProperty('format');
    expect(gateway.jsonFormatSupport).toBe('unsupported');

    await gateway.complete(jsonRequest);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sentBody(2)).not.toHaveProperty('format');
  });

  it('keeps format support per gateway instance', async () => {
    fetchMock
      .mockImplementationOnce(async () => rejected())
      .mockImplementation(async () => ok('{}'));
    const first = new OllamaGateway();
    const second = new OllamaGateway();

    await first.complete(jsonRequest);
    await second.complete(jsonRequest);

    expect(first.jsonFormatSupport).toBe('unsupported');
    expect(second.jsonFormatSupport).toBe('supported');
    expect(sentBody(2).format).toBe('json');
  });

  it('does not fall back when format is pinned on', async () => {
    fetchMock.mockImplementation(async () => rejected());
    const gateway = new OllamaGateway({ jsonFormat: 'on' });

    expect(await gateway.complete(jsonRequest)).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('never sends format when pinned off or when JSON is not requested', async () => {
    fetchMock.mockImplementation(async () => ok('plain'));

    await new OllamaGateway({ jsonFormat: 'off' }).complete(jsonRequest);
    await new OllamaGateway().complete({ ...jsonRequest, json: false });

    expect(sentBody(0)).not.toHaveProperty('format');
    expect(sentBody(1)).not.toHaveProperty('format');
  });

  it('returns null when the server is unreachable, without giving up on format', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const gateway = new OllamaGateway();

    expect(await gateway.complete(jsonRequest)).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(gateway.jsonFormatSupport).toBe('unknown');
  });

  it('keeps sending format after a server error', async () => {
    fetchMock
      .mockImplementationOnce(async () => new Response('model is loading', { status: 503 }))
      .mockImplementation(async () => ok('{"a": 1}'));
    const gateway = new OllamaGateway();

    expect(await gateway.complete(jsonRequest)).toBeNull();
    expect(gateway.jsonFormatSupport).toBe('unknown');

    expect(await gateway.complete(jsonRequest)).toBe('{"a": 1}');
    expect(sentBody(1).format).toBe('json');
    expect(gateway.jsonFormatSupport).toBe('supported');
  });

  it('returns null for an unexpected response body', async () => {
    fetchMock.mockImplementation(async () => new Response(JSON.stringify({ done: true }), { status: 200 }));
    expect(await new OllamaGateway({ jsonFormat: 'off' }).complete(jsonRequest)).toBeNull();
  });

  it('skips empty prompts', async () => {
    expect(await new OllamaGateway().complete({ ...jsonRequest, prompt: '' })).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
