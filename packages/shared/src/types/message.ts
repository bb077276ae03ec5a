export const MESSAGE_ROLES = ['user', 'agent', 'validator', 'system', 'tool'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface Message {
  id: string;
  role: MessageRole;
  sender: string;
  content: string;
  /** Only set on `tool` messages */
  toolName?: string;
  /** Only set on `tool` messages */
  toolArgs?: Record<string, unknown>;
  /** ISO-8601 wall clock at construction */
  ts: string;
}

export interface MessageInput {
  role: MessageRole;
  sender: string;
  content: string;
  toolName?: string;
  toolArgs?: Record<string, unknown>;
}
