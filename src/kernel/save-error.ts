export type SaveGameErrorCode =
  | 'SAVE_IO_FAILED'
  | 'SAVE_MALFORMED'
  | 'SAVE_ADVENTURE_MISMATCH'
  | 'SAVE_ITEM_COUNT_MISMATCH';

export type SaveGameErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: SaveGameErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class SaveGameError extends Error {
  readonly code: SaveGameErrorCode;
  readonly context?: SaveGameErrorContext;

  constructor(code: SaveGameErrorCode, message: string, context?: SaveGameErrorContext, cause?: unknown) {
    super(formatMessage(message, context), cause === undefined ? undefined : { cause });
    this.name = 'SaveGameError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function saveIoFailedError(message: string, context?: SaveGameErrorContext, cause?: unknown): SaveGameError {
  return new SaveGameError('SAVE_IO_FAILED', message, context, cause);
}

export function saveMalformedError(message: string, context?: SaveGameErrorContext): SaveGameError {
  return new SaveGameError('SAVE_MALFORMED', message, context);
}

export function isSaveGameError(error: unknown): error is SaveGameError {
  return error instanceof SaveGameError;
}

export function isSaveGameErrorCode<C extends SaveGameErrorCode>(
  error: unknown,
  code: C,
): error is SaveGameError & { readonly code: C } {
  return isSaveGameError(error) && error.code === code;
}
