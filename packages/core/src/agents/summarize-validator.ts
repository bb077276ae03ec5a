import type { AgentDefinition } from '../agent-base.js';

export interface SummarizeValidationInput {
  originalText: string;
  summary: string;
}

export const summarizeValidatorAgent: AgentDefinition<SummarizeValidationInput> = {
  name: 'SummarizeValidatorAgent',
  description: 'Checks a summary against its source text and rates it 1-5',
  params: { temperature: 0.7, maxTokens: 512 },
  buildMessages: ({ originalText, summary }) => [
    { role: 'system', content: 'You are an AI assistant that validates summaries of medical texts.' },
    {
      role: 'user',
      content:
        'Given the original text and its summary, assess whether the summary accurately and concisely captures the key points.\n'
        + 'Provide a brief analysis and rate the summary on a scale of 1 to 5, where 5 indicates excellent quality.\n\n'
        + `Original Text:\n${originalText}\n\n`
        + `Summary:\n${summary}\n\n`
        + 'Validation:',
    },
  ],
};
