import type { AgentDefinition } from '../agent-base.js';

export interface WriteArticleInput {
  topic: string;
  outline?: string;
}

export const writeArticleAgent: AgentDefinition<WriteArticleInput> = {
  name: 'WriteArticleTool',
  description: 'Drafts a research article on a topic, following an optional outline',
  params: { temperature: 0.7, maxTokens: 1000 },
  buildMessages: ({ topic, outline }) => {
    let content = `Write a research article on the following topic:\nTopic: ${topic}\n\n`;
    if (outline) {
      content += `Outline:\n${outline}\n\n`;
    }
    content += 'Article:\n';
    return [
      { role: 'system', content: 'You are an expert academic writer.' },
      { role: 'user', content },
    ];
  },
};
