import { z } from 'zod';

export const CRITIQUE_PROMPT =
  'You are a meticulous reviewer. Given the task description and draft, '
  + 'list concrete issues (if any) and propose exact fixes. Return JSON '
  + 'with fields: {"issues": [...], "revise_required": true/false, '
  + '"patch": "..."}.';

/** Literal approval marker, matched case-insensitively when the reply is not parseable JSON. */
export const APPROVAL_MARKER = '"revise_required": false';

export interface CritiqueAssessment {
  reviseRequired: boolean;
  issues: string[];
  patch?: string;
  /** How the decision was reached */
  source: 'json' | 'marker' | 'default';
}

const critiqueSchema = z.object({
  issues: z.array(z.unknown()).optional(),
  revise_required: z.union([z.boolean(), z.enum(['true', 'false'])]),
  patch: z.string().optional(),
});

/**
 * Decides whether a critic reply asks for a revision. A well-formed JSON object
 * wins; otherwise the approval marker; otherwise a revision is required.
 */
export function assessCritique(reply: string): CritiqueAssessment {
  const json = extractJson(reply);
  if (json !== undefined) {
    const parsed = critiqueSchema.safeParse(lowercaseKeys(json));
    if (parsed.success) {
      const flag = parsed.data.revise_required;
      return {
        reviseRequired: flag === true || flag === 'true',
        issues: (parsed.data.issues ?? []).map(issue => (typeof issue === 'string' ? issue : JSON.stringify(issue))),
        ...(parsed.data.patch ? { patch: parsed.data.patch } : {}),
        source: 'json',
      };
    }
  }

  if (reply.toLowerCase().includes(APPROVAL_MARKER)) {
    return { reviseRequired: false, issues: [], source: 'marker' };
  }

  return { reviseRequired: true, issues: [], source: 'default' };
}

/** Parses the outermost `{...}` span of a reply, ignoring surrounding prose or code fences. */
export function extractJson(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

function lowercaseKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).map(([key, v]) => [key.toLowerCase(), v]));
}
