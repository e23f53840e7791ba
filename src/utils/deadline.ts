import { TimeoutError } from "@domain/errors";

/**
 * Races `work` against a timer. On expiry the caller gets a TimeoutError and
 * whatever `work` later resolves to is discarded.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TimeoutError(operation, timeoutMs)),
      timeoutMs
    );
  });

  // The losing side of the race must not surface as an unhandled rejection.
  work.catch(() => undefined);

  try {
    return await Promise.race([work, expired]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
