import { z } from 'zod';
import {
  ProviderError,
  describeError,
  type ChatMessage,
  type GenerateParams,
  type ModelProviderName,
  type ModelReply,
} from '@refract/shared';
import { ModelProvider } from '../provider.js';

const ollamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  prompt_eval_count: z.number().int().nonnegative().optional(),
  eval_count: z.number().int().nonnegative().optional(),
});

export class OllamaProvider extends ModelProvider {
  readonly name: ModelProviderName = 'ollama';
  readonly model: string;

  private baseUrl: string;

  constructor(config: { baseUrl?: string; model?: string } = {}) {
    super();
    this.baseUrl = (config.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.model = config.model ?? 'llama3:8b';
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(3000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  async generate(messages: ChatMessage[], params: GenerateParams = {}): Promise<ModelReply> {
    const url = `${this.baseUrl}/api/chat`;
    const body = {
      model: this.model,
      messages: messages.map(m => ({ role: m.role, content: m.content })),
      stream: false,
      options: {
        temperature: params.temperature ?? 0.2,
        ...(params.maxTokens !== undefined ? { num_predict: params.maxTokens } : {}),
      },
    };

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ProviderError('ollama', `failed to call model at ${url}: ${describeError(err)}`, err);
    }

    if (!res.ok) {
      let text: string;
      try {
        text = await res.text();
      } catch (err) {
        throw new ProviderError('ollama', `API error (${res.status}), body unreadable: ${describeError(err)}`, err);
      }
      throw new ProviderError('ollama', `API error (${res.status}): ${text}`);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new ProviderError('ollama', `response is not JSON: ${describeError(err)}`, err);
    }

    const parsed = ollamaChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError('ollama', 'response did not contain a chat message');
    }

    return {
      text: parsed.data.message.content,
      usage: {
        promptTokens: parsed.data.prompt_eval_count ?? 0,
        outputTokens: parsed.data.eval_count ?? 0,
      },
    };
  }
}
