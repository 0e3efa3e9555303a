export class TimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Rejects with a `TimeoutError` unless `promise` settles within `timeoutMs`. Non-positive limits disable the timer. */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise.finally(() => clearTimeout(timer)),
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    })
  ]);
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  if (e === undefined || e === null || e === "") return "unknown error";
  return String(e);
}
