export { ModelProvider } from './provider.js';
export { createProvider } from './factory.js';
export { OpenAIProvider } from './providers/openai.js';
export { OllamaProvider } from './providers/ollama.js';
