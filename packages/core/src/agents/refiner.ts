import type { AgentDefinition } from '../agent-base.js';

export interface RefineInput {
  draft: string;
}

export const refinerAgent: AgentDefinition<RefineInput> = {
  name: 'RefinerAgent',
  description: 'Improves the language, coherence and academic quality of a draft',
  params: { temperature: 0.5, maxTokens: 2048 },
  buildMessages: ({ draft }) => [
    {
      role: 'system',
      content: 'You are an expert editor who refines and enhances research articles for clarity, coherence, and academic quality.',
    },
    {
      role: 'user',
      content:
        'Please refine the following research article draft to improve its language, coherence, and overall quality:\n\n'
        + `${draft}\n\nRefined Article:`,
    },
  ],
};
