export interface ClassifyArgs {
  input: string | null; // file path, '-' for stdin, null when missing
  save: boolean;
  json: boolean;
  excluded: string[];
  url?: string;
  title?: string;
  company?: string;
}

const VALUE_FLAGS = new Set(['--exclude', '--url', '--title', '--company']);

function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value !== undefined && !value.startsWith('--') ? value : undefined;
}

export function parseClassifyArgs(args: readonly string[]): ClassifyArgs {
  let input: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++; // skip its value
      continue;
    }
    if (arg === '-' || !arg.startsWith('--')) {
      input = arg;
      break;
    }
  }

  const excluded = (flagValue(args, '--exclude') ?? '')
    .split(',')
    .map(key => key.trim())
    .filter(Boolean);

  return {
    input,
    save: args.includes('--save'),
    json: args.includes('--json'),
    excluded,
    url: flagValue(args, '--url'),
    title: flagValue(args, '--title'),
    company: flagValue(args, '--company'),
  };
}

// Text the classifier sees for a job: title first, then the description
export function jobText(title: string | undefined, description: string): string {
  return title ? `${title}\n${description}` : description;
}
