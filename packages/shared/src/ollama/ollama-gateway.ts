import { z } from 'zod';
import type { ModelGateway, ModelRequest } from '../models/gateway';

export type JsonFormatSetting = 'auto' | 'on' | 'off';
type JsonFormatSupport = 'unknown' | 'supported' | 'unsupported';

export interface OllamaGatewayOptions {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  /**
   * `auto` sends `format: "json"` until the server rejects it with a 4xx,
   * then stops for the lifetime of this gateway. `on`/`off` pin the behaviour.
   */
  jsonFormat?: JsonFormatSetting;
}

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'amsaravi/medgemma-4b-it:q8';
const DEFAULT_TIMEOUT_MS = 120_000;

/** Non-2xx reply from the generate endpoint. */
export class OllamaHttpError extends Error {
  constructor(readonly status: number, detail: string) {
    super(`Ollama generate failed (${status}): ${detail}`);
    this.name = 'OllamaHttpError';
  }
}

// A 4xx reply to a format request means the server does not accept the field
const isFormatRejection = (error: unknown): boolean =>
  error instanceof OllamaHttpError && error.status >= 400 && error.status < 500;

const GenerateResponseSchema = z.object({
  response: z.string(),
});

export class OllamaGateway implements ModelGateway {
  readonly name: string;
  private endpoint: string;
  private model: string;
  private timeoutMs: number;
  private jsonFormat: JsonFormatSetting;
  private formatSupport: JsonFormatSupport = 'unknown';

  constructor(options: OllamaGatewayOptions = {}) {
    const baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL).replace(/\/$/, '');
    this.endpoint = `${baseUrl}/api/generate`;
    this.model = options.model ?? DEFAULT_OLLAMA_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.jsonFormat = options.jsonFormat ?? 'auto';
    this.name = `ollama:${this.model}`;
  }

  /** Current view of whether this server honours `format: "json"`. */
  get jsonFormatSupport(): JsonFormatSupport {
    return this.formatSupport;
  }

  private shouldSendFormat(request: ModelRequest): boolean {
    if (!request.json) return false;
    if (this.jsonFormat === 'on') return true;
    if (this.jsonFormat === 'off') return false;
    return this.formatSupport !== 'unsupported';
  }

  async complete(request: ModelRequest): Promise<string | null> {
    if (!request.prompt) return null;

    if (this.shouldSendFormat(request)) {
      try {
        const text = await this.generate(request, true);
        this.formatSupport = 'supported';
        return text;
      } catch (error) {
        if (this.jsonFormat === 'on' || !isFormatRejection(error)) {
          console.error('[Ollama] Request with format="json" failed:', error);
          return null;
        }
        console.warn('[Ollama] format="json" appears unsupported; disabling it for this gateway.', error);
        this.formatSupport = 'unsupported';
      }
    }

    try {
      return await this.generate(request, false);
    } catch (error) {
      console.error('[Ollama] Generate API error:', error);
      return null;
    }
  }

  private async generate(request: ModelRequest, withFormat: boolean): Promise<string> {
    const body = {
      model: this.model,
      prompt: request.prompt,
      stream: false,
      ...(request.system ? { system: request.system } : {}),
      ...(withFormat ? { format: 'json' } : {}),
      options: {
        temperature: request.temperature,
        top_p: request.topP,
        num_predict: request.maxTokens,
      },
    };

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Ollama request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      throw new OllamaHttpError(response.status, errorText);
    }

    const parsed = GenerateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected Ollama response shape: ${parsed.error.message}`);
    }
    return parsed.data.response.trim();
  }
}
