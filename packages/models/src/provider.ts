import type {
  ChatMessage,
  GenerateParams,
  ModelProviderName,
  ModelReply,
} from '@refract/shared';

/**
 * The single capability the rest of the system needs from a model backend:
 * turn an ordered conversation into a reply plus token usage.
 *
 * Implementations reject with a `ProviderError` on any transport or provider
 * failure and never return partial results. Usage counts are zero when the
 * backend does not report them.
 */
export abstract class ModelProvider {
  abstract readonly name: ModelProviderName;
  abstract readonly model: string;

  abstract isAvailable(): Promise<boolean>;
  abstract generate(messages: ChatMessage[], params?: GenerateParams): Promise<ModelReply>;
}
