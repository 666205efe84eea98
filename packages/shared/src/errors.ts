/**
 * Completion-level failures. Anything thrown by a CompletionClient ends the
 * turn; these subclasses only let callers and logs tell the causes apart.
 */
export class CompletionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompletionError';
  }
}

export class CompletionTimeoutError extends CompletionError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`completion timed out after ${timeoutMs}ms`);
    this.name = 'CompletionTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The provider answered, but not with something the loop can use. */
export class MalformedCompletionError extends CompletionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedCompletionError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
