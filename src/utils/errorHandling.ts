////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// result helpers
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err = {
  ok: false;
  error: string;
};
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<T = never>(error: string): Result<T> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
