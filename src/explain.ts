import chalk from 'chalk';

export interface CommandStep {
  command: string;
  explanation: string;
  note?: string;
}

export interface CommandSuggestion {
  intro: string;
  steps: CommandStep[];
  tip?: string;
}

type PrefixedField = 'command' | 'explanation' | 'note' | 'tip';
type Field = 'intro' | PrefixedField;

const FIELD_PREFIXES: Array<[PrefixedField, RegExp]> = [
  ['command', /^COMMAND:\s*/i],
  ['explanation', /^EXPLANATION:\s*/i],
  ['note', /^NOTE:\s*/i],
  ['tip', /^ADDITIONAL TIP:\s*/i]
];

const WARNING_WORDS = /careful|warning|important|do not|caution/i;

function appendText(existing: string | undefined, text: string): string {
  return existing ? `${existing}\n${text}` : text;
}

/**
 * Parses the COMMAND / EXPLANATION / NOTE convention. Text before the first
 * COMMAND becomes the intro; a response without any COMMAND is all intro.
 */
export function parseCommandSuggestion(text: string): CommandSuggestion {
  const result: CommandSuggestion = { intro: '', steps: [] };
  let field: Field = 'intro';
  let current: CommandStep | undefined;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    const prefixed = FIELD_PREFIXES.find(([, pattern]) => pattern.test(line));

    if (prefixed) {
      const [name, pattern] = prefixed;
      const value = line.replace(pattern, '');
      field = name;

      if (name === 'command') {
        current = { command: value, explanation: '' };
        result.steps.push(current);
      } else if (name === 'tip') {
        result.tip = value;
      } else if (current) {
        current[name] = value;
      } else {
        result.intro = appendText(result.intro, value);
      }
      continue;
    }

    if (!line) {
      continue;
    }

    if (field === 'intro' || !current) {
      result.intro = appendText(result.intro || undefined, line);
    } else if (field === 'tip') {
      result.tip = appendText(result.tip, line);
    } else if (field === 'note') {
      current.note = appendText(current.note, line);
    } else {
      current[field] = appendText(current[field] || undefined, line);
    }
  }

  return result;
}

export function isWarning(text: string): boolean {
  return WARNING_WORDS.test(text);
}

export function renderCommandSuggestion(suggestion: CommandSuggestion): string {
  const out: string[] = [];

  if (suggestion.intro) {
    out.push(suggestion.intro, '');
  }

  for (const step of suggestion.steps) {
    out.push(chalk.green.bold(`$ ${step.command}`));
    if (step.explanation) {
      out.push(`  ${step.explanation}`);
    }
    if (step.note) {
      out.push(isWarning(step.note) ? chalk.yellow(`  ! ${step.note}`) : chalk.gray(`  ${step.note}`));
    }
    out.push('');
  }

  if (suggestion.tip) {
    out.push(isWarning(suggestion.tip) ? chalk.yellow.italic(suggestion.tip) : chalk.gray(suggestion.tip));
  }

  return out.join('\n').trimEnd();
}
