import type { ChatMessage, GenerateParams } from '@refract/shared';
import { executeWithRetry, type AgentReply, type ExecutionOptions } from './agent-execution.js';
import type { RuntimeContext } from './context.js';

/** A task agent is data: a name, generation settings and a prompt builder. */
export interface AgentDefinition<TInput> {
  name: string;
  description: string;
  params: Required<GenerateParams>;
  buildMessages(input: TInput): ChatMessage[];
}

export class PromptAgent<TInput> {
  private readonly options: ExecutionOptions;

  constructor(
    readonly definition: AgentDefinition<TInput>,
    context: RuntimeContext,
  ) {
    this.options = {
      provider: context.provider,
      maxRetries: context.config.agents.maxRetries,
      verbose: context.config.agents.verbose,
      logger: context.logger,
    };
  }

  get name(): string {
    return this.definition.name;
  }

  execute(input: TInput): Promise<AgentReply> {
    return executeWithRetry(
      {
        agentName: this.definition.name,
        messages: this.definition.buildMessages(input),
        params: this.definition.params,
      },
      this.options,
    );
  }
}
