import type { AgentDefinition } from '../agent-base.js';

export interface SanitizeValidationInput {
  originalData: string;
  sanitizedData: string;
}

export const sanitizeDataValidatorAgent: AgentDefinition<SanitizeValidationInput> = {
  name: 'SanitizeDataValidatorAgent',
  description: 'Lists PHI left in sanitized data and rates the sanitization 1-5',
  params: { temperature: 0.7, maxTokens: 512 },
  buildMessages: ({ originalData, sanitizedData }) => [
    {
      role: 'system',
      content:
        'You are an AI assistant that validates the sanitization of medical data by checking for the removal of Protected Health Information (PHI).',
    },
    {
      role: 'user',
      content:
        'Given the original data and the sanitized data, verify that all PHI has been removed.\n'
        + 'List any remaining PHI in the sanitized data and rate the sanitization process on a scale of 1 to 5, where 5 indicates complete sanitization.\n\n'
        + `Original Data:\n${originalData}\n\n`
        + `Sanitized Data:\n${sanitizedData}\n\n`
        + 'Validation:',
    },
  ],
};
