import { logger } from "@infrastructure/logging/Logger";

export const DEFAULT_BACKOFF_MS: readonly number[] = [0, 200, 500];

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface ErrorCandidate {
  code?: string;
  causeCode?: string;
  status?: number;
}

function describeError(error: unknown): ErrorCandidate {
  if (!error || typeof error !== "object") {
    return {};
  }

  const code = "code" in error ? error.code : undefined;
  const cause = "cause" in error ? error.cause : undefined;
  const causeCode =
    cause && typeof cause === "object" && "code" in cause
      ? cause.code
      : undefined;
  const statusCode = "statusCode" in error ? error.statusCode : undefined;
  const status = "status" in error ? error.status : undefined;
  const response = "response" in error ? error.response : undefined;
  const responseStatus =
    response && typeof response === "object" && "status" in response
      ? response.status
      : undefined;

  const firstNumber = [statusCode, status, responseStatus].find(
    (value): value is number => typeof value === "number"
  );

  return {
    code: typeof code === "string" ? code : undefined,
    causeCode: typeof causeCode === "string" ? causeCode : undefined,
    status: firstNumber,
  };
}

/**
 * Transient network and provider failures worth another attempt:
 * connection resets, timeouts, rate limiting and 5xx gateways.
 */
export function isRetryableError(error: unknown): boolean {
  const retryableCodes = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED"]);
  const retryableStatuses = new Set([429, 500, 502, 503]);

  const candidate = describeError(error);

  const code = candidate.code ?? candidate.causeCode;
  if (code && retryableCodes.has(code)) {
    return true;
  }

  return (
    typeof candidate.status === "number" &&
    retryableStatuses.has(candidate.status)
  );
}

export interface RetryOptions {
  backoffMs?: readonly number[];
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs `fn` once per entry in `backoffMs`, waiting that many milliseconds
 * before each attempt. Non-retryable errors and the last failure are thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  options: RetryOptions = {}
): Promise<T> {
  const backoffDelays =
    options.backoffMs && options.backoffMs.length > 0
      ? options.backoffMs
      : DEFAULT_BACKOFF_MS;
  const retryable = options.isRetryable ?? isRetryableError;
  const sleep = options.sleep ?? delay;

  let lastError: unknown;

  for (let attempt = 1; attempt <= backoffDelays.length; attempt += 1) {
    const delayMs = backoffDelays[attempt - 1] ?? 0;
    if (delayMs > 0) {
      await sleep(delayMs);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;

      if (!retryable(e) || attempt === backoffDelays.length) {
        throw e;
      }

      logger.log("warn", "RETRY", {
        attempt,
        error: e instanceof Error ? e.message : String(e),
        operation,
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`${operation} failed after retries.`);
}
