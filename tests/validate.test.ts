import { describe, expect, it } from 'vitest';
import { MalformedResponseError } from '../src/errors.js';
import type { MessageRules } from '../src/types.js';
import { normalize, splitSuggestions, toGenerationResult, truncateSubject, validationIssues } from '../src/validate.js';

const rules: MessageRules = { maxSubjectLength: 72, defaultType: 'chore' };
const CONVENTIONAL = /^\w+(\([\w-]+\))?: .+/;

describe('normalize', () => {
  it('wraps a message without a type in the default type', () => {
    const candidate = normalize('Added new feature', rules, 'relay');

    expect(candidate.text).toBe('chore: added new feature');
    expect(candidate.text).toMatch(CONVENTIONAL);
    expect(candidate.wrapped).toBe(true);
    expect(candidate.truncated).toBe(false);
  });

  it('keeps a conventional message as it is', () => {
    const candidate = normalize('feat(core): add caching layer', rules, 'direct');

    expect(candidate).toEqual({ text: 'feat(core): add caching layer', backend: 'direct', truncated: false, wrapped: false });
  });

  it('drops quotes, code fences and a preamble', () => {
    expect(normalize('"feat: add login"', rules, 'relay').text).toBe('feat: add login');
    expect(
      normalize('Here is your commit message:\n\n```\nfeat(core): add caching layer\n```', rules, 'relay').text
    ).toBe('feat(core): add caching layer');
  });

  it('lowercases the type and strips a trailing period', () => {
    expect(normalize('Fix: handle empty payload.', rules, 'relay').text).toBe('fix: handle empty payload');
  });

  it('keeps the body after a blank line', () => {
    const raw = 'fix(api): handle empty payload\n\nReturn 400 instead of crashing.';

    expect(normalize(raw, rules, 'relay').text).toBe(raw);
  });

  it('cuts a long subject at a word boundary', () => {
    const raw = 'feat(cache): add a least recently used eviction policy to the response cache layer';

    const candidate = normalize(raw, rules, 'relay');

    expect(candidate.text).toBe('feat(cache): add a least recently used eviction policy to the response');
    expect(candidate.text.length).toBeLessThanOrEqual(72);
    expect(candidate.truncated).toBe(true);
  });

  it('rejects an empty response', () => {
    expect(() => normalize('  \n```\n```\n', rules, 'relay')).toThrow(MalformedResponseError);
  });
});

describe('truncateSubject', () => {
  it('cuts exactly at the limit when a space follows it', () => {
    expect(truncateSubject('fix: aaaa bbbb', 9)).toEqual({ text: 'fix: aaaa', truncated: true });
  });

  it('hard-cuts when no word boundary lies past the prefix', () => {
    expect(truncateSubject('fix: abcdefghijklmnop', 10, 5)).toEqual({ text: 'fix: abcde', truncated: true });
  });
});

describe('splitSuggestions', () => {
  it('splits a numbered list', () => {
    expect(splitSuggestions('1. feat: add cache\n2) fix: evict stale keys\n- docs: describe caching')).toEqual([
      'feat: add cache',
      'fix: evict stale keys',
      'docs: describe caching'
    ]);
  });
});

describe('toGenerationResult', () => {
  it('keeps a single multi-line suggestion whole', () => {
    const result = toGenerationResult(
      ['feat(api): add endpoint\n\n- validate input\n- add tests'],
      { kind: 'suggestions', count: 3 },
      rules,
      'relay'
    );

    expect(result.candidates.map(candidate => candidate.text)).toEqual([
      'feat(api): add endpoint\n\n- validate input\n- add tests'
    ]);
    expect(result.candidates[0]?.wrapped).toBe(false);
  });

  it('removes duplicates', () => {
    const result = toGenerationResult(
      ['feat: add cache', 'feat: add cache', 'fix: evict stale keys'],
      { kind: 'suggestions', count: 3 },
      rules,
      'relay'
    );

    expect(result.candidates.map(candidate => candidate.text)).toEqual(['feat: add cache', 'fix: evict stale keys']);
  });

  it('drops unusable entries and keeps the rest', () => {
    const result = toGenerationResult(['', 'fix: evict stale keys'], { kind: 'suggestions', count: 2 }, rules, 'relay');

    expect(result.candidates).toHaveLength(1);
  });

  it('fails when nothing usable remains', () => {
    expect(() => toGenerationResult([], { kind: 'commit-message' }, rules, 'relay')).toThrow(MalformedResponseError);
  });
});

describe('validationIssues', () => {
  it('reports the default type and subject truncation', () => {
    const issues = validationIssues({ text: 'chore: x', backend: 'relay', truncated: true, wrapped: true }, rules);

    expect(issues.map(issue => issue.message)).toEqual([
      'No conventional commit type found; used "chore"',
      'Subject shortened to 72 characters'
    ]);
  });
});
