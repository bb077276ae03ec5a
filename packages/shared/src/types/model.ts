export type ModelProviderName = 'openai' | 'ollama';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerateParams {
  temperature?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  promptTokens: number;
  outputTokens: number;
}

export interface ModelReply {
  text: string;
  usage: TokenUsage;
}
