/**
 * Error raised by every stage of the formatter.
 *
 * The `kind` discriminant lets callers branch without matching on messages.
 */

export type FormatterErrorKind =
  | 'FileNotFound'
  | 'UnsupportedFormat'
  | 'ReadError'
  | 'WriteError'
  | 'InvalidPattern'
  | 'EmptyResponse'
  | 'ConfigError';

export class FormatterError extends Error {
  constructor(
    public readonly kind: FormatterErrorKind,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FormatterError';
  }
}

export function isFormatterError(
  value: unknown,
  kind?: FormatterErrorKind
): value is FormatterError {
  return value instanceof FormatterError && (kind === undefined || value.kind === kind);
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
