import type { ErrorClass, VerdictReason } from "@chapterwise/translation-types";

export type TranslationEngineErrorCode =
  | "transient_request"
  | "request_timeout"
  | "malformed_response"
  | "unresolved_unit"
  | "configuration"
  | "split_reassembly";

export class TranslationEngineError extends Error {
  readonly code: TranslationEngineErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(
    code: TranslationEngineErrorCode,
    message: string,
    metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.metadata = metadata;
  }
}

/** Network, rate-limit or 5xx failure of a single request. Retryable. */
export class TransientRequestError extends TranslationEngineError {
  readonly status: number | null;

  constructor(
    message: string,
    options: {
      status?: number | null;
      cause?: unknown;
      code?: "transient_request" | "request_timeout";
    } = {},
  ) {
    super(options.code ?? "transient_request", message, {
      status: options.status ?? null,
    });
    this.status = options.status ?? null;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RequestTimeoutError extends TransientRequestError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, {
      status: 408,
      code: "request_timeout",
    });
    this.timeoutMs = timeoutMs;
  }
}

export class MalformedResponseError extends TranslationEngineError {
  constructor(taskId: string, reason: string) {
    super("malformed_response", `Response for ${taskId} is malformed: ${reason}`, {
      taskId,
      reason,
    });
  }
}

export class ConfigurationError extends TranslationEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("configuration", `Invalid translation engine configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class SplitReassemblyError extends TranslationEngineError {
  constructor(containerId: string, message: string) {
    super("split_reassembly", `Cannot reassemble ${containerId}: ${message}`, {
      containerId,
    });
  }
}

/**
 * Describes a unit that was still failing after the last repair round.
 * Reported to the caller, never thrown.
 */
export class UnresolvedUnitError extends TranslationEngineError {
  readonly unitId: string;
  readonly containerId: string;
  readonly errorClass: Exclude<ErrorClass, "success">;
  readonly reason: VerdictReason;
  readonly lastText: string | null;

  constructor(params: {
    unitId: string;
    containerId: string;
    errorClass: Exclude<ErrorClass, "success">;
    reason: VerdictReason;
    lastText: string | null;
  }) {
    super(
      "unresolved_unit",
      `Unit ${params.unitId} unresolved after final round (${params.reason})`,
    );
    this.unitId = params.unitId;
    this.containerId = params.containerId;
    this.errorClass = params.errorClass;
    this.reason = params.reason;
    this.lastText = params.lastText;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error ?? "unknown error");
}
