/**
 * Error document printed on stdout when a command fails.
 */
export interface FailureDocument {
  error: string;
}

export function failure(message: string): FailureDocument {
  return { error: message };
}

/**
 * Print a single JSON document on stdout, pretty-printed with 2-space indentation.
 */
export function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
