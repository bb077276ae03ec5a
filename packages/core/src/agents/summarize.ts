import type { AgentDefinition } from '../agent-base.js';

export interface SummarizeInput {
  text: string;
}

export const summarizeAgent: AgentDefinition<SummarizeInput> = {
  name: 'SummarizeTool',
  description: 'Produces a concise summary of a medical text',
  params: { temperature: 0.7, maxTokens: 300 },
  buildMessages: ({ text }) => [
    { role: 'system', content: 'You are an AI assistant that summarizes medical texts.' },
    {
      role: 'user',
      content: `Please provide a concise summary of the following medical text:\n\n${text}\n\nSummary:`,
    },
  ],
};
