import type { AgentDefinition } from '../agent-base.js';
import { ARTICLE_ASSESSMENT_INSTRUCTIONS, type ArticleValidationInput } from './write-article-validator.js';

export const validatorAgent: AgentDefinition<ArticleValidationInput> = {
  name: 'ValidatorAgent',
  description: 'Final review of a refined article against its topic',
  params: { temperature: 0.3, maxTokens: 500 },
  buildMessages: ({ topic, article }) => [
    {
      role: 'system',
      content: 'You are an AI assistant that validates research articles for accuracy, completeness, and adherence to academic standards.',
    },
    {
      role: 'user',
      content:
        `Given the topic and the research article below, ${ARTICLE_ASSESSMENT_INSTRUCTIONS}`
        + `Topic: ${topic}\n\n`
        + `Article:\n${article}\n\nValidation:`,
    },
  ],
};
