export interface CliOptions {
  reportPath?: string;
  structuredPath?: string;
  guidelinesPath?: string;
  /** Hosted model preset key or id */
  model?: string;
  /** Local model name for the compliance audit */
  complianceModel?: string;
  level?: number;
  outputPath?: string;
  pretty: boolean;
}

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export const USAGE = `Usage: npm run plan -- <report.pdf> [options]

Options:
  -g, --guidelines <file>        Guideline PDF to audit the report against
  -s, --structured <file>        Use an already structured report JSON instead of a PDF
  -m, --model <key>              Hosted model preset (haiku, sonnet, opus) or model id
  -c, --compliance-model <name>  Local model used for the compliance audit
  -l, --level <n>                Heading level whose sections are audited (default 2)
  -o, --output <file>            Write the action plan here instead of stdout
      --pretty                   Indent the JSON output
  -h, --help                     Show this message`;

type ValueFlag = 'guidelinesPath' | 'structuredPath' | 'model' | 'complianceModel' | 'level' | 'outputPath';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-g': 'guidelinesPath',
  '--guidelines': 'guidelinesPath',
  '-s': 'structuredPath',
  '--structured': 'structuredPath',
  '-m': 'model',
  '--model': 'model',
  '-c': 'complianceModel',
  '--compliance-model': 'complianceModel',
  '-l': 'level',
  '--level': 'level',
  '-o': 'outputPath',
  '--output': 'outputPath',
};

export function parseCliArgs(argv: string[]): CliParseResult {
  const options: CliOptions = { pretty: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') return { ok: false, error: USAGE };
    if (arg === '--pretty') {
      options.pretty = true;
      continue;
    }

    const [flag, inline] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];
    const key = VALUE_FLAGS[flag];

    if (!key) {
      if (arg.startsWith('-')) return { ok: false, error: `Unknown option: ${arg}` };
      positional.push(arg);
      continue;
    }

    const value = inline ?? argv[++i];
    if (value === undefined || value === '') {
      return { ok: false, error: `Missing value for ${flag}` };
    }

    if (key === 'level') {
      const level = Number(value);
      if (!Number.isInteger(level) || level < 1) {
        return { ok: false, error: `--level must be a positive integer, got "${value}"` };
      }
      options.level = level;
    } else {
      options[key] = value;
    }
  }

  if (positional.length > 1) {
    return { ok: false, error: `Unexpected arguments: ${positional.slice(1).join(' ')}` };
  }
  options.reportPath = positional[0];

  if (!options.reportPath && !options.structuredPath) {
    return { ok: false, error: `A report PDF or --structured file is required.\n\n${USAGE}` };
  }

  return { ok: true, options };
}
