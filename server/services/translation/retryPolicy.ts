import { TransientRequestError } from "./errors";

export interface RetryPolicy {
  maxAttempts: number;
  initialBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
}

export type RetryDecision =
  | { action: "retry"; delayMs: number }
  | { action: "give-up"; reason: "attempts-exhausted" | "non-retryable" };

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  initialBackoffMs: 2000,
  backoffMultiplier: 2,
  maxBackoffMs: 60000,
};

const TRANSIENT_STATUS = new Set([408, 409, 429]);
const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const readStatus = (error: unknown): number | null => {
  if (!error || typeof error !== "object") return null;
  const status = "status" in error ? error.status : undefined;
  return typeof status === "number" ? status : null;
};

const readNetworkCode = (error: unknown): string | null => {
  if (!error || typeof error !== "object") return null;
  const code = "code" in error ? error.code : undefined;
  return typeof code === "string" ? code : null;
};

export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientRequestError) return true;
  const status = readStatus(error);
  if (status !== null && (TRANSIENT_STATUS.has(status) || status >= 500)) {
    return true;
  }
  const code = readNetworkCode(error);
  return code !== null && TRANSIENT_NETWORK_CODES.has(code);
}

export function backoffDelay(policy: RetryPolicy, attemptsMade: number): number {
  const exponent = Math.max(0, attemptsMade - 1);
  const delay = policy.initialBackoffMs * policy.backoffMultiplier ** exponent;
  return Math.min(policy.maxBackoffMs, delay);
}

/** Decides what to do after `attemptsMade` attempts ended with `error`. */
export function decideRetry(
  policy: RetryPolicy,
  attemptsMade: number,
  error: unknown,
): RetryDecision {
  if (!isTransientError(error)) {
    return { action: "give-up", reason: "non-retryable" };
  }
  if (attemptsMade >= policy.maxAttempts) {
    return { action: "give-up", reason: "attempts-exhausted" };
  }
  return { action: "retry", delayMs: backoffDelay(policy, attemptsMade) };
}
