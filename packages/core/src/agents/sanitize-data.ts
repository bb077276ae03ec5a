import type { AgentDefinition } from '../agent-base.js';

export interface SanitizeInput {
  medicalData: string;
}

export const sanitizeDataAgent: AgentDefinition<SanitizeInput> = {
  name: 'SanitizeDataTool',
  description: 'Removes protected health information (PHI) from medical data',
  params: { temperature: 0.7, maxTokens: 500 },
  buildMessages: ({ medicalData }) => [
    {
      role: 'system',
      content: 'You are an AI assistant that sanitizes medical data by removing Protected Health Information (PHI).',
    },
    {
      role: 'user',
      content: `Remove all PHI from the following data:\n\n${medicalData}\n\nSanitized Data:`,
    },
  ],
};
