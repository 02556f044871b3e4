import { InvalidArgumentError } from 'commander';

/**
 * "Claude, VSCode" → ['Claude', 'VSCode']
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Seconds as typed on the command line, returned in milliseconds
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim().length === 0 || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError(`Expected a non-negative number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}

/**
 * Collects repeated `--env KEY=VALUE` flags; only the first "=" splits
 */
export function parseEnv(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got "${value}"`);
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}
