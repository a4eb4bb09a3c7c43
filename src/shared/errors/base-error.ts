export type BaseError = Error & {
  code: string;
  details?: Record<string, unknown>;
};

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'DECODE_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'CONFIG_NOT_FOUND'
  | 'NO_GROUPS'
  | 'INTERNAL_ERROR';

/**
 * ベースエラーを作成する
 */
export function createBaseError(
  message: string,
  code: ErrorCode = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): BaseError {
  return Object.assign(new Error(message), { name: 'BaseError', code, details });
}

/**
 * 値が BaseError かどうかを判定する
 */
export function isBaseError(error: unknown): error is BaseError {
  return (
    error instanceof Error &&
    error.name === 'BaseError' &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * ユーザー向けのエラーメッセージを組み立てる
 */
export function describeError(error: unknown): string {
  if (isBaseError(error)) {
    return `${error.message} [${error.code}]`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
