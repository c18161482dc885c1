export type AdventureLoadErrorCode =
  | 'SOURCE_UNREADABLE'
  | 'MALFORMED_INPUT'
  | 'TRUNCATED_DATA'
  | 'TYPE_MISMATCH'
  | 'INVALID_HEADER'
  | 'CHECKSUM_MISMATCH'
  | 'INVALID_ACTION_TABLE';

export type AdventureLoadErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: AdventureLoadErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

/** Every failure to turn a data file into a playable world. */
export class AdventureLoadError extends Error {
  readonly code: AdventureLoadErrorCode;
  readonly context?: AdventureLoadErrorContext;

  constructor(code: AdventureLoadErrorCode, message: string, context?: AdventureLoadErrorContext, cause?: unknown) {
    super(formatMessage(`Cannot load adventure: ${message}`, context), cause === undefined ? undefined : { cause });
    this.name = 'AdventureLoadError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function malformedInputError(message: string, context?: AdventureLoadErrorContext): AdventureLoadError {
  return new AdventureLoadError('MALFORMED_INPUT', message, context);
}

export function truncatedDataError(message: string, context?: AdventureLoadErrorContext): AdventureLoadError {
  return new AdventureLoadError('TRUNCATED_DATA', message, context);
}

export function typeMismatchError(message: string, context?: AdventureLoadErrorContext): AdventureLoadError {
  return new AdventureLoadError('TYPE_MISMATCH', message, context);
}

export function isAdventureLoadError(error: unknown): error is AdventureLoadError {
  return error instanceof AdventureLoadError;
}

export function isAdventureLoadErrorCode<C extends AdventureLoadErrorCode>(
  error: unknown,
  code: C,
): error is AdventureLoadError & { readonly code: C } {
  return isAdventureLoadError(error) && error.code === code;
}
