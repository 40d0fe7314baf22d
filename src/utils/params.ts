import { ParameterFormatError } from './errors';

export type ParamValue = boolean | number | string;
export type RequestParams = Record<string, ParamValue>;

const DIGITS_RE = /^\d+$/;
const DECIMAL_RE = /^\d*\.\d*$/;

type Coercion = (raw: string) => ParamValue | undefined;

function asBoolean(raw: string): boolean | undefined {
  const lower = raw.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return undefined;
}

// Digit strings beyond 2^53 stay strings so the query carries them exactly.
function asInteger(raw: string): number | undefined {
  if (!DIGITS_RE.test(raw)) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

// Exactly one '.', digits elsewhere. Only literals that print back unchanged
// ("3.14", not "1.0" or ".5") become numbers, so the query carries the literal.
function asFloat(raw: string): number | undefined {
  if (!DECIMAL_RE.test(raw) || raw.length < 2) return undefined;
  const value = Number.parseFloat(raw);
  return String(value) === raw ? value : undefined;
}

/**
 * Value coercions in precedence order. The first that accepts the raw text wins;
 * anything none accepts stays a string.
 */
export const COERCIONS: readonly Coercion[] = [asBoolean, asInteger, asFloat];

export function coerceValue(raw: string): ParamValue {
  for (const coerce of COERCIONS) {
    const value = coerce(raw);
    if (value !== undefined) return value;
  }
  return raw;
}

/**
 * Parse one `key=value` token. Splits on the first `=`; key and value are trimmed.
 */
export function parseParam(token: string): [string, ParamValue] {
  const separator = token.indexOf('=');
  if (separator === -1) {
    throw new ParameterFormatError(`Invalid parameter format: ${token}. Expected 'key=value'`);
  }

  const key = token.slice(0, separator).trim();
  const value = token.slice(separator + 1).trim();
  if (!key) {
    throw new ParameterFormatError(`Empty key in parameter: ${token}`);
  }
  return [key, coerceValue(value)];
}

/**
 * Parse repeated `--params` tokens into query parameters. A repeated key keeps
 * its last value.
 */
export function parseParams(tokens: readonly string[] = []): RequestParams {
  // Null prototype so keys such as "__proto__" stay ordinary entries
  const params: RequestParams = Object.create(null);
  for (const token of tokens) {
    const [key, value] = parseParam(token);
    params[key] = value;
  }
  return params;
}
