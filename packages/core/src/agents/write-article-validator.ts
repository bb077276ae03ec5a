import type { AgentDefinition } from '../agent-base.js';

export interface ArticleValidationInput {
  topic: string;
  article: string;
}

export const ARTICLE_ASSESSMENT_INSTRUCTIONS =
  'assess whether the article comprehensively covers the topic, follows a logical structure, and maintains academic standards.\n'
  + 'Provide a brief analysis and rate the article on a scale of 1 to 5, where 5 indicates excellent quality.\n\n';

export const writeArticleValidatorAgent: AgentDefinition<ArticleValidationInput> = {
  name: 'WriteArticleValidatorAgent',
  description: 'Rates a drafted article for coverage, structure and academic standards',
  params: { temperature: 0.7, maxTokens: 512 },
  buildMessages: ({ topic, article }) => [
    { role: 'system', content: 'You are an AI assistant that validates research articles.' },
    {
      role: 'user',
      content:
        `Given the topic and the article, ${ARTICLE_ASSESSMENT_INSTRUCTIONS}`
        + `Topic: ${topic}\n\n`
        + `Article:\n${article}\n\n`
        + 'Validation:',
    },
  ],
};
