/**
 * Connection retry for MySQL HeatWave. Only network-level and server
 * capacity errors are retried; credentials, unknown databases and
 * anything without a driver error code fail on the first attempt.
 */

export const TRANSIENT_CONNECT_CODES: ReadonlySet<string> = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "PROTOCOL_CONNECTION_LOST",
  "ER_CON_COUNT_ERROR",
  "ER_SERVER_SHUTDOWN"
]);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isTransientConnectError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_CONNECT_CODES.has(code);
}

export interface ConnectRetryOptions {
  retries: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

/** Calls `connect` until it succeeds, it raises a non-transient error, or the retries run out; the last error is rethrown as-is. */
export async function connectWithRetry<T>(
  connect: () => Promise<T>,
  { retries, initialDelayMs = 250, maxDelayMs = 5000 }: ConnectRetryOptions
): Promise<T> {
  let delayMs = initialDelayMs;
  for (let attempt = 0; ; attempt++) {
    try {
      return await connect();
    } catch (error) {
      if (attempt >= retries || !isTransientConnectError(error)) throw error;
      console.warn(
        `HeatWave connect attempt ${attempt + 1}/${retries + 1} failed (${errorCode(error)}); retrying in ${delayMs}ms`
      );
      await sleep(delayMs);
      delayMs = Math.min(delayMs * 2, maxDelayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
