import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import {
  ProviderError,
  describeError,
  type ChatMessage,
  type GenerateParams,
  type ModelProviderName,
  type ModelReply,
} from '@refract/shared';
import { ModelProvider } from '../provider.js';

export class OpenAIProvider extends ModelProvider {
  readonly name: ModelProviderName = 'openai';
  readonly model: string;

  private client: OpenAI;

  constructor(config: { apiKey: string; model?: string; baseUrl?: string }) {
    super();
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
    });
    this.model = config.model ?? 'gpt-4o';
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async generate(messages: ChatMessage[], params: GenerateParams = {}): Promise<ModelReply> {
    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        temperature: params.temperature ?? 0.2,
        ...(params.maxTokens !== undefined ? { max_tokens: params.maxTokens } : {}),
      });
    } catch (err) {
      throw new ProviderError('openai', `chat completion failed: ${describeError(err)}`, err);
    }

    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined) {
      throw new ProviderError('openai', 'chat completion returned no message content');
    }

    return {
      text: content,
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
    };
  }
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}
