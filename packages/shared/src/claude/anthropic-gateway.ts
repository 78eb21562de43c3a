import type Anthropic from '@anthropic-ai/sdk';
import type { ModelGateway, ModelRequest } from '../models/gateway';
import { getAnthropicClient } from './client';
import { DEFAULT_REMOTE_MODEL, resolveModel } from './model-router';

interface ResponseBlock {
  type: string;
  text?: string;
}

/** The slice of the SDK the gateway calls; an `Anthropic` instance satisfies it. */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<{
      content: ResponseBlock[];
      stop_reason: string | null;
    }>;
  };
}

export interface AnthropicGatewayOptions {
  model?: string;
  apiKey?: string;
  client?: MessagesClient;
}

export class AnthropicGateway implements ModelGateway {
  readonly name: string;
  private client: MessagesClient;
  private model: string;

  constructor(options: AnthropicGatewayOptions = {}) {
    this.model = resolveModel(options.model ?? DEFAULT_REMOTE_MODEL);
    this.client = options.client ?? getAnthropicClient(options.apiKey);
    this.name = `anthropic:${this.model}`;
  }

  async complete(request: ModelRequest): Promise<string | null> {
    if (!request.prompt) return null;

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        // Current models take temperature or top_p, not both
        temperature: request.temperature,
        ...(request.system ? { system: request.system } : {}),
        messages: [{ role: 'user', content: request.prompt }],
      });

      const text = response.content
        .filter(block => block.type === 'text' && typeof block.text === 'string')
        .map(block => block.text)
        .join('\n')
        .trim();

      if (!text) {
        console.error(`[Anthropic] ${this.model} returned no text (stop_reason: ${response.stop_reason})`);
        return null;
      }
      return text;
    } catch (error) {
      console.error('[Anthropic] Messages API error:', error);
      return null;
    }
  }
}
