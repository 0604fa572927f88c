import { MalformedResponseError, ValidationError } from './errors.js';
import { isCommitType } from './types.js';
import type { BackendMode, Candidate, GenerationResult, MessageRules, TaskKind } from './types.js';

const CONVENTIONAL_PATTERN = /^(\w+)(\([\w\-./ ]+\))?(!)?:\s*(.+)$/;
const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s+/;
const CODE_FENCE = /^```[\w-]*\s*\n?([\s\S]*?)\n?```$/;
const WRAPPING_PAIRS: Array<[string, string]> = [['"', '"'], ["'", "'"], ['`', '`'], ['“', '”']];

function stripWrapping(text: string): string {
  let result = text.trim();
  let changed = true;

  while (changed && result.length >= 2) {
    changed = false;
    for (const [open, close] of WRAPPING_PAIRS) {
      if (result.startsWith(open) && result.endsWith(close)) {
        result = result.slice(open.length, result.length - close.length).trim();
        changed = true;
      }
    }
  }

  return result;
}

function stripFences(text: string): string {
  const fenced = text.trim().match(CODE_FENCE);
  const inner = fenced ? fenced[1] ?? '' : text;
  return inner
    .split('\n')
    .filter(line => !line.trim().startsWith('```'))
    .join('\n');
}

function cleanLine(line: string): string {
  return stripWrapping(line.replace(LIST_MARKER, ''));
}

function startsWithCommitType(line: string): boolean {
  const match = cleanLine(line).match(CONVENTIONAL_PATTERN);
  return match !== null && isCommitType((match[1] ?? '').toLowerCase());
}

function lowercaseFirst(text: string): string {
  return /^[A-Z][a-z]/.test(text) ? text.charAt(0).toLowerCase() + text.slice(1) : text;
}

/**
 * Applies the conventional pattern to a subject line. Returns the formatted
 * subject, whether the default type had to be added, and the prefix length
 * ("type(scope): ") used to keep truncation out of the header.
 */
function conventionalSubject(line: string, rules: MessageRules): { subject: string; wrapped: boolean; prefixLength: number } {
  const match = line.match(CONVENTIONAL_PATTERN);
  const type = (match?.[1] ?? '').toLowerCase();

  if (match && isCommitType(type)) {
    const prefix = `${type}${match[2] ?? ''}${match[3] ?? ''}: `;
    const description = (match[4] ?? '').trim();
    return { subject: prefix + description, wrapped: false, prefixLength: prefix.length };
  }

  const prefix = `${rules.defaultType}: `;
  return { subject: prefix + lowercaseFirst(line), wrapped: true, prefixLength: prefix.length };
}

/**
 * Cuts `subject` to at most `max` characters at the last word boundary. Falls
 * back to a hard cut when the header leaves no room for a whole word.
 */
export function truncateSubject(subject: string, max: number, prefixLength = 0): { text: string; truncated: boolean } {
  if (subject.length <= max) {
    return { text: subject, truncated: false };
  }

  if (subject.charAt(max) === ' ') {
    return { text: subject.slice(0, max).trimEnd(), truncated: true };
  }

  const boundary = subject.lastIndexOf(' ', max);
  if (boundary > prefixLength) {
    return { text: subject.slice(0, boundary).trimEnd(), truncated: true };
  }

  return { text: subject.slice(0, max), truncated: true };
}

/**
 * Turns raw model output into a conventional commit message.
 *
 * @throws MalformedResponseError when nothing usable remains after cleanup
 */
export function normalize(raw: string, rules: MessageRules, backend: BackendMode): Candidate {
  const lines = stripFences(stripWrapping(raw))
    .split('\n')
    .map(line => line.trimEnd());

  // Drop any preamble ("Here is a commit message:") before the first typed line
  const typedIndex = lines.findIndex(startsWithCommitType);
  const firstContent = lines.findIndex(line => cleanLine(line).length > 0);
  const subjectIndex = typedIndex >= 0 ? typedIndex : firstContent;

  if (subjectIndex < 0) {
    throw new MalformedResponseError('The AI response was empty after cleanup');
  }

  const subjectLine = cleanLine(lines[subjectIndex] ?? '').replace(/\.+$/, '').trim();
  if (!subjectLine) {
    throw new MalformedResponseError('The AI response has no subject line');
  }

  const { subject, wrapped, prefixLength } = conventionalSubject(subjectLine, rules);
  const { text: finalSubject, truncated } = truncateSubject(subject, rules.maxSubjectLength, prefixLength);

  const body = lines
    .slice(subjectIndex + 1)
    .join('\n')
    .replace(/^\s*\n/, '')
    .trim();

  return {
    text: body ? `${finalSubject}\n\n${body}` : finalSubject,
    backend,
    truncated,
    wrapped
  };
}

/**
 * Splits a response holding several numbered or bulleted messages into one
 * string per message.
 */
export function splitSuggestions(raw: string): string[] {
  const lines = stripFences(stripWrapping(raw))
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

  const listed = lines.filter(line => LIST_MARKER.test(line));
  const items = listed.length > 0 ? listed : lines;
  return items.map(line => line.replace(LIST_MARKER, ''));
}

/** Removes exact-text duplicates, keeping the first occurrence. */
export function dedupe(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>();
  return candidates.filter(candidate => {
    if (seen.has(candidate.text)) {
      return false;
    }
    seen.add(candidate.text);
    return true;
  });
}

/**
 * Normalizes every raw text a backend returned for a task, one text per
 * candidate. Unusable entries
 * are dropped; the call fails only when none survive.
 */
export function toGenerationResult(
  raws: string[],
  task: TaskKind,
  rules: MessageRules,
  backend: BackendMode
): GenerationResult {
  const count = task.kind === 'suggestions' ? task.count : 1;
  const candidates: Candidate[] = [];
  let lastError: unknown;

  for (const text of raws) {
    try {
      candidates.push(normalize(text, rules, backend));
    } catch (error) {
      if (!(error instanceof MalformedResponseError)) {
        throw error;
      }
      lastError = error;
    }
  }

  if (candidates.length === 0) {
    throw lastError instanceof MalformedResponseError
      ? lastError
      : new MalformedResponseError('The AI backend returned no text');
  }

  return { candidates: dedupe(candidates).slice(0, count) };
}

/** Recoverable degradations applied during normalization, for reporting. */
export function validationIssues(candidate: Candidate, rules: MessageRules): ValidationError[] {
  const issues: ValidationError[] = [];
  if (candidate.wrapped) {
    issues.push(new ValidationError(`No conventional commit type found; used "${rules.defaultType}"`));
  }
  if (candidate.truncated) {
    issues.push(new ValidationError(`Subject shortened to ${rules.maxSubjectLength} characters`));
  }
  return issues;
}
