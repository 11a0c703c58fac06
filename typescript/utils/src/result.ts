/********* RESULT MONAD *********/
export type Result<T> =
  | {
      success: true;
      data: T;
    }
  | {
      success: false;
      error: string;
    };

export function success<T>(data: T): Result<T> {
  return { success: true, data };
}

export function failure<T>(error: string): Result<T> {
  return { success: false, error };
}

export function unwrapResult<T>(
  result: Result<T>,
  toError: (message: string) => Error = (message) => new Error(message),
): T {
  if (!result.success) throw toError(result.error);
  return result.data;
}
