/**
 * Command-line flags for the pipeline script
 */

import { PipelineSettings } from './types';

export interface CliResult {
  overrides: Partial<PipelineSettings>;
  errors: string[];
  help: boolean;
}

const NUMERIC_FLAGS = {
  'max-age-hours': 'max_age_hours',
  top: 'top_count',
  iterations: 'max_refine_iterations',
} as const;

type NumericFlag = keyof typeof NUMERIC_FLAGS;

function isNumericFlag(flag: string): flag is NumericFlag {
  return flag in NUMERIC_FLAGS;
}

export const USAGE =
  'Usage: npm run pipeline -- [--max-age-hours 24] [--top 9] [--iterations 3]';

/**
 * Accepts `--flag value` and `--flag=value`. Values must be non-negative numbers.
 */
export function parsePipelineArgs(argv: string[]): CliResult {
  const overrides: Partial<PipelineSettings> = {};
  const errors: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '--help' || token === '-h') {
      help = true;
      continue;
    }
    if (!token.startsWith('--')) {
      errors.push(`Unexpected argument: ${token}`);
      continue;
    }

    let flag = token.slice(2);
    let value: string | undefined;
    const eq = flag.indexOf('=');
    if (eq !== -1) {
      value = flag.slice(eq + 1);
      flag = flag.slice(0, eq);
    } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
      value = argv[i + 1];
      i += 1;
    }

    if (!isNumericFlag(flag)) {
      errors.push(`Unknown flag: --${flag}`);
      continue;
    }

    const parsed = value === undefined ? NaN : Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      errors.push(`--${flag} expects a non-negative number`);
      continue;
    }

    overrides[NUMERIC_FLAGS[flag]] = parsed;
  }

  return { overrides, errors, help };
}
