import { describe, it, expect } from 'vitest';
import { assessCritique, extractJson } from '../src/critique.js';

describe('assessCritique', () => {
  it('accepts a JSON approval', () => {
    expect(assessCritique('{"issues": [], "revise_required": false, "patch": ""}')).toEqual({
      reviseRequired: false,
      issues: [],
      source: 'json',
    });
  });

  it('reads issues and patch when a revision is requested', () => {
    const reply = 'Review:\n```json\n{"issues": ["no dosage units", {"line": 3}], "revise_required": true, "patch": "Add mg"}\n```';

    expect(assessCritique(reply)).toEqual({
      reviseRequired: true,
      issues: ['no dosage units', '{"line":3}'],
      patch: 'Add mg',
      source: 'json',
    });
  });

  it('matches keys case-insensitively', () => {
    expect(assessCritique('{"Revise_Required": false}').reviseRequired).toBe(false);
  });

  it('accepts string booleans', () => {
    expect(assessCritique('{"revise_required": "false"}').reviseRequired).toBe(false);
  });

  it('falls back to the approval marker when the JSON is malformed', () => {
    expect(assessCritique('{"ISSUES": [], "REVISE_REQUIRED": FALSE}')).toEqual({
      reviseRequired: false,
      issues: [],
      source: 'marker',
    });
  });

  it('requires a revision when nothing can be read', () => {
    expect(assessCritique('The draft looks fine to me.')).toEqual({
      reviseRequired: true,
      issues: [],
      source: 'default',
    });
  });

  it('requires a revision when the JSON lacks the flag', () => {
    expect(assessCritique('{"issues": ["too short"]}').source).toBe('default');
  });
});

describe('extractJson', () => {
  it('returns undefined without an object span', () => {
    expect(extractJson('no braces here')).toBeUndefined();
    expect(extractJson('} backwards {')).toBeUndefined();
  });

  it('parses the outermost object inside prose', () => {
    expect(extractJson('Result: {"a": {"b": 1}} done')).toEqual({ a: { b: 1 } });
  });
});
