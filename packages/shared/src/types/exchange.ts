import type { Message } from './message.js';

export type Verdict = 'pass' | 'pass_after_revise' | 'validated' | 'agent_failure' | (string & {});

export interface Exchange {
  taskId: string;
  messages: Message[];
  costTokensPrompt: number;
  costTokensOutput: number;
  latencyMs: number | null;
  verdict: Verdict | null;
}

/** Wire shape of one line in `{traceDir}/{taskId}.jsonl` */
export interface ExchangeRecord {
  task_id: string;
  messages: MessageRecord[];
  cost_tokens_prompt: number;
  cost_tokens_output: number;
  latency_ms: number | null;
  verdict: string | null;
}

export interface MessageRecord {
  id: string;
  role: Message['role'];
  sender: string;
  content: string;
  tool_name?: string;
  tool_args?: Record<string, unknown>;
  ts: string;
}
