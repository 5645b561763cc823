// backend/services/systemd-control/src/systemd/withTimeout.ts

/**
 * Bound a backend call. The timer is cleared on settle so it never holds the
 * event loop open. The underlying work is not cancelled; its late result is
 * dropped.
 */

export class TimeoutError extends Error {
  public readonly code = "TIMEOUT";

  public constructor(
    public readonly label: string,
    public readonly ms: number
  ) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export function withTimeout<T>(
  work: Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}
