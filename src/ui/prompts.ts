import { confirm, input, select } from '@inquirer/prompts';
import type { TransformSpec } from '../types.js';

export async function confirmAction(message: string): Promise<boolean> {
  return confirm({ message, default: false });
}

export async function promptInput(
  message: string,
  defaultValue?: string,
): Promise<string> {
  return input({ message, default: defaultValue });
}

export async function promptSelect<T extends string>(
  message: string,
  choices: { name: string; value: T }[],
): Promise<T> {
  return select({ message, choices });
}

function required(value: string): true | string {
  return value.length > 0 || 'A value is required.';
}

/** Ask for a rename mode and its parameters. */
export async function promptTransformSpec(): Promise<TransformSpec> {
  const mode = await promptSelect('Rename mode:', [
    { name: 'Search & replace', value: 'searchReplace' },
    { name: 'Regex', value: 'regex' },
    { name: 'Numbering (e.g. photo_###)', value: 'numbering' },
    { name: 'Add prefix', value: 'prefixAdd' },
    { name: 'Remove prefix', value: 'prefixRemove' },
    { name: 'Add suffix (before extension)', value: 'suffixAdd' },
    { name: 'Remove suffix (before extension)', value: 'suffixRemove' },
    { name: 'UPPERCASE', value: 'upper' },
    { name: 'lowercase', value: 'lower' },
    { name: 'Title Case', value: 'title' },
    { name: 'Insert modification date', value: 'date' },
  ]);

  switch (mode) {
    case 'searchReplace':
      return {
        mode,
        search: await input({ message: 'Search for:', validate: required }),
        replace: await promptInput('Replace with:', ''),
      };
    case 'regex':
      return {
        mode,
        pattern: await input({ message: 'Pattern:', validate: required }),
        replacement: await promptInput('Replacement ($1, $2 for groups):', ''),
      };
    case 'numbering': {
      const pattern = await input({
        message: 'Pattern (# per digit):',
        validate: required,
      });
      const start = await input({
        message: 'Start at:',
        default: '1',
        validate: (v) => /^\d+$/.test(v) || 'Enter a whole number.',
      });
      return { mode, pattern, start: Number(start) };
    }
    case 'prefixAdd':
    case 'prefixRemove':
      return {
        mode: 'prefix',
        text: await input({ message: 'Prefix:', validate: required }),
        action: mode === 'prefixAdd' ? 'add' : 'remove',
      };
    case 'suffixAdd':
    case 'suffixRemove':
      return {
        mode: 'suffix',
        text: await input({ message: 'Suffix:', validate: required }),
        action: mode === 'suffixAdd' ? 'add' : 'remove',
      };
    case 'upper':
    case 'lower':
    case 'title':
      return { mode: 'case', style: mode };
    case 'date':
      return {
        mode,
        position: await promptSelect('Date position:', [
          { name: 'Before the name', value: 'prefix' },
          { name: 'After the name', value: 'suffix' },
          { name: 'Replace the name', value: 'replace' },
        ]),
      };
  }
}
