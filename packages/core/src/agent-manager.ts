import { AgentNotFoundError } from '@refract/shared';
import { PromptAgent } from './agent-base.js';
import type { RuntimeContext } from './context.js';
import {
  refinerAgent,
  sanitizeDataAgent,
  sanitizeDataValidatorAgent,
  summarizeAgent,
  summarizeValidatorAgent,
  validatorAgent,
  writeArticleAgent,
  writeArticleValidatorAgent,
  type ArticleValidationInput,
  type RefineInput,
  type SanitizeInput,
  type SanitizeValidationInput,
  type SummarizeInput,
  type SummarizeValidationInput,
  type WriteArticleInput,
} from './agents/index.js';

export interface AgentInputs {
  summarize: SummarizeInput;
  summarize_validator: SummarizeValidationInput;
  write_article: WriteArticleInput;
  write_article_validator: ArticleValidationInput;
  sanitize_data: SanitizeInput;
  sanitize_data_validator: SanitizeValidationInput;
  refiner: RefineInput;
  validator: ArticleValidationInput;
}

export type AgentKey = keyof AgentInputs;

type AgentRegistry = { [K in AgentKey]: PromptAgent<AgentInputs[K]> };

export type AnyPromptAgent = AgentRegistry[AgentKey];

export class AgentManager {
  private readonly agents: AgentRegistry;

  constructor(context: RuntimeContext) {
    this.agents = {
      summarize: new PromptAgent(summarizeAgent, context),
      summarize_validator: new PromptAgent(summarizeValidatorAgent, context),
      write_article: new PromptAgent(writeArticleAgent, context),
      write_article_validator: new PromptAgent(writeArticleValidatorAgent, context),
      sanitize_data: new PromptAgent(sanitizeDataAgent, context),
      sanitize_data_validator: new PromptAgent(sanitizeDataValidatorAgent, context),
      refiner: new PromptAgent(refinerAgent, context),
      validator: new PromptAgent(validatorAgent, context),
    };
  }

  get<K extends AgentKey>(key: K): AgentRegistry[K] {
    return this.agents[key];
  }

  /** Lookup by untyped name, e.g. from user input. */
  getAgent(name: string): AnyPromptAgent {
    if (!isAgentKey(name, this.agents)) {
      throw new AgentNotFoundError(name);
    }
    return this.agents[name];
  }

  keys(): AgentKey[] {
    return [...AGENT_KEYS];
  }
}

export const AGENT_KEYS: readonly AgentKey[] = [
  'summarize',
  'summarize_validator',
  'write_article',
  'write_article_validator',
  'sanitize_data',
  'sanitize_data_validator',
  'refiner',
  'validator',
];

function isAgentKey(name: string, registry: AgentRegistry): name is AgentKey {
  return Object.prototype.hasOwnProperty.call(registry, name);
}
