/**
 * Base class for failures the CLI reports as a JSON `{ "error": ... }` document
 * with exit code 1.
 */
export abstract class CliError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Settings could not be resolved from the environment or the `.env` file.
 */
export class ConfigError extends CliError {
  readonly code = 'CONFIG_ERROR';
}

/**
 * A `--params` token is not a valid `key=value` pair.
 */
export class ParameterFormatError extends CliError {
  readonly code = 'INVALID_PARAMETER';
}

/**
 * A GET failed: transport error, non-2xx status or an undecodable body.
 */
export class RequestError extends CliError {
  readonly code = 'REQUEST_FAILED';

  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Render an unknown rejection reason as a single line of text.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    if (err.message) return err.message;
    if ('code' in err && typeof err.code === 'string') return err.code;
    return err.name;
  }
  return String(err);
}
