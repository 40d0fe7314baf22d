import { vi } from 'vitest';

export interface Captured {
  /** Everything printed through console.log, joined with newlines. */
  stdout(): string;
  /** Raw writes to process.stdout (Commander help and version). */
  rawStdout(): string;
  stderr(): string;
  /** stdout parsed as the single JSON document the CLI prints. */
  json<T = unknown>(): T;
}

/**
 * Capture CLI output for one test. Undo with vi.restoreAllMocks().
 */
export function captureOutput(): Captured {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

  const text = (calls: unknown[][]): string => calls.map((call) => String(call[0])).join('');

  return {
    stdout: () => log.mock.calls.map((call) => String(call[0])).join('\n'),
    rawStdout: () => text(out.mock.calls),
    stderr: () => text(err.mock.calls),
    json: <T>() => {
      const parsed: T = JSON.parse(log.mock.calls.map((call) => String(call[0])).join('\n'));
      return parsed;
    },
  };
}
