import { CommanderError, InvalidArgumentError } from 'commander';

/** Commander codes for help and version output, which end the process successfully. */
const INFORMATIONAL_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

/**
 * Detect Commander-thrown usage/control-flow errors so they are reported as usage
 * failures instead of runtime failures.
 */
export function isCommanderError(err: unknown): err is CommanderError {
  return err instanceof CommanderError;
}

export function isInformational(err: CommanderError): boolean {
  return INFORMATIONAL_CODES.has(err.code);
}

export function normalizeCommanderMessage(message: string): string {
  return message.replace(/^error:\s*/i, '').trim();
}

/**
 * Option parser for strictly positive integers such as `--timeout 30`.
 */
export function positiveIntOption(raw: string): number {
  if (!/^\d+$/.test(raw.trim()) || Number(raw) < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(raw);
}

/**
 * Option parser for absolute URLs such as `--base-url https://example.test`.
 */
export function urlOption(raw: string): string {
  if (!URL.canParse(raw)) {
    throw new InvalidArgumentError('Expected an absolute URL.');
  }
  return raw;
}
