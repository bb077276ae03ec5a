import {
  AgentExhaustedError,
  ValidationError,
  createMessage,
  type Exchange,
  type TokenUsage,
  type Verdict,
} from '@refract/shared';
import { executeWithRetry, type ExecutionOptions } from './agent-execution.js';
import { CRITIQUE_PROMPT, assessCritique } from './critique.js';
import type { RuntimeContext } from './context.js';
import { Tracer } from './tracer.js';

export const CRITIC_AGENT = 'critic';
export const REVISION_PROMPT = 'Apply the patch or produce a revised complete draft.';

export interface ReflectOptions {
  taskId: string;
  agentName: string;
  taskDescription: string;
  draft: string;
  /** Revision cycles after the first; 0 still allows one critique and one revision */
  maxRevisions?: number;
}

export interface ReflectResult {
  draft: string;
  verdict: Verdict;
  critiqueCalls: number;
  revisionCalls: number;
  exchange: Exchange;
}

/**
 * Critique-and-revise loop over a draft. Each cycle asks the critic for an
 * assessment; approval ends the loop with the current draft, otherwise the
 * reviser rewrites it. Runs at most `maxRevisions + 1` cycles and records
 * every call in the task's trace.
 */
export async function reflectiveImprove(context: RuntimeContext, options: ReflectOptions): Promise<ReflectResult> {
  const maxRevisions = options.maxRevisions ?? context.config.reflection.maxRevisions;
  if (!Number.isInteger(maxRevisions) || maxRevisions < 0) {
    throw new ValidationError(`maxRevisions must be a non-negative integer, got ${maxRevisions}`);
  }

  const { taskId, agentName, taskDescription } = options;
  const reviserName = `${agentName}-reviser`;
  const tracer = new Tracer(taskId, { sink: context.traceSink, logger: context.logger });
  const execution: ExecutionOptions = {
    provider: context.provider,
    maxRetries: context.config.agents.maxRetries,
    verbose: context.config.agents.verbose,
    logger: context.logger,
  };

  tracer.log(createMessage({ role: 'user', sender: 'user', content: taskDescription }));
  tracer.log(createMessage({ role: 'agent', sender: agentName, content: options.draft }));

  let draft = options.draft;
  let critiqueCalls = 0;
  let revisionCalls = 0;
  let cycleUsage: TokenUsage = { promptTokens: 0, outputTokens: 0 };

  const finish = (verdict: Verdict): ReflectResult => {
    tracer.finalize({ verdict, ...cycleUsage });
    return { draft, verdict, critiqueCalls, revisionCalls, exchange: tracer.snapshot() };
  };

  try {
    for (let cycle = 0; cycle <= maxRevisions; cycle++) {
      cycleUsage = { promptTokens: 0, outputTokens: 0 };

      const critique = await executeWithRetry(
        {
          agentName: CRITIC_AGENT,
          messages: [
            { role: 'system', content: CRITIQUE_PROMPT },
            { role: 'user', content: `TASK:\n${taskDescription}\n\nDRAFT:\n${draft}\n` },
          ],
        },
        execution,
      );
      critiqueCalls++;
      cycleUsage = addUsage(cycleUsage, critique.usage);
      tracer.log(createMessage({ role: 'validator', sender: CRITIC_AGENT, content: critique.text }));

      if (!assessCritique(critique.text).reviseRequired) {
        return finish('pass');
      }

      const revision = await executeWithRetry(
        {
          agentName: reviserName,
          messages: [
            { role: 'system', content: REVISION_PROMPT },
            { role: 'user', content: critique.text },
          ],
        },
        execution,
      );
      revisionCalls++;
      cycleUsage = addUsage(cycleUsage, revision.usage);
      tracer.log(createMessage({ role: 'agent', sender: reviserName, content: revision.text }));
      draft = revision.text;
    }
  } catch (e) {
    if (e instanceof AgentExhaustedError) {
      tracer.finalize({ verdict: 'agent_failure', ...cycleUsage });
    }
    throw e;
  }

  return finish('pass_after_revise');
}

function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    outputTokens: a.outputTokens + b.outputTokens,
  };
}
