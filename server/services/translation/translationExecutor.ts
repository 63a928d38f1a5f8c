import pLimit from "p-limit";
import type {
  TranslationResult,
  TranslationTask,
  TranslationTaskVariant,
} from "@chapterwise/translation-types";

import { isTranslationDebugEnabled } from "../../config/env";
import {
  MalformedResponseError,
  RequestTimeoutError,
  describeError,
} from "./errors";
import { ResponseLog } from "./responseLog";
import { DEFAULT_RETRY_POLICY, decideRetry, type RetryPolicy } from "./retryPolicy";
import { parseTaskResponse } from "./unitCodec";

export interface CompletionRequest {
  taskId: string;
  variant: TranslationTaskVariant;
  round: number;
  instructions: string;
  input: string;
  maxOutputTokens?: number | null;
}

export interface CompletionResponse {
  text: string;
  model?: string | null;
}

/** Text-completion transport. Implementations must honour the abort signal. */
export interface TranslationCompletionClient {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<CompletionResponse>;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface ExecutorOptions {
  client: TranslationCompletionClient;
  buildRequest: (task: TranslationTask) => CompletionRequest;
  responseLog: ResponseLog;
  concurrencyLimit?: number;
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  onSettled?: (result: TranslationResult) => void;
}

const DEFAULT_CONCURRENCY = 5;
const DEFAULT_TIMEOUT_MS = 300_000;

/**
 * Runs `run` with its own abort signal and rejects with RequestTimeoutError
 * once `timeoutMs` elapses. The signal is aborted when the timer fires.
 */
export function runWithTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new RequestTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
    let pending: Promise<T>;
    try {
      pending = run(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }
    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

const absentUnits = (task: TranslationTask) =>
  new Map<string, string | undefined>(task.units.map((unit) => [unit.id, undefined]));

type AttemptOutcome =
  | { ok: true; text: string; model: string | null }
  | { ok: false; error: unknown };

async function runTask(
  task: TranslationTask,
  options: ExecutorOptions,
): Promise<TranslationResult> {
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const sleep = options.sleep ?? defaultSleep;
  const request = options.buildRequest(task);
  let attempts = 0;

  for (;;) {
    attempts += 1;
    let outcome: AttemptOutcome;
    try {
      const response = await runWithTimeout(
        (signal) => options.client.complete(request, signal),
        timeoutMs,
      );
      outcome = { ok: true, text: response.text, model: response.model ?? null };
    } catch (error) {
      outcome = { ok: false, error };
    }

    if (outcome.ok) {
      options.responseLog.append({
        taskId: task.taskId,
        variant: task.variant,
        round: task.round,
        attempt: attempts,
        status: "ok",
        rawResponse: outcome.text,
        model: outcome.model,
      });
      return settleResponse(task, outcome.text, attempts);
    }

    const message = describeError(outcome.error);
    options.responseLog.append({
      taskId: task.taskId,
      variant: task.variant,
      round: task.round,
      attempt: attempts,
      status: "error",
      rawResponse: null,
      error: message,
    });

    const decision = decideRetry(policy, attempts, outcome.error);
    if (decision.action === "give-up") {
      console.warn("[TRANSLATION EXECUTOR] Task failed", {
        taskId: task.taskId,
        attempts,
        reason: decision.reason,
        error: message,
      });
      return {
        taskId: task.taskId,
        variant: task.variant,
        task,
        rawResponse: null,
        status: "failed",
        perUnit: absentUnits(task),
        attempts,
        error: message,
      };
    }

    console.warn("[TRANSLATION EXECUTOR] Retrying task", {
      taskId: task.taskId,
      attempt: attempts,
      delayMs: decision.delayMs,
      error: message,
    });
    await sleep(decision.delayMs);
  }
}

function settleResponse(
  task: TranslationTask,
  rawResponse: string,
  attempts: number,
): TranslationResult {
  try {
    const parsed = parseTaskResponse(task, rawResponse);
    if (parsed.unexpectedIds.length) {
      console.warn("[TRANSLATION EXECUTOR] Ignoring unexpected unit ids", {
        taskId: task.taskId,
        unexpectedIds: parsed.unexpectedIds,
      });
    }
    if (parsed.duplicateIds.length) {
      console.warn("[TRANSLATION EXECUTOR] Duplicate unit ids, kept first", {
        taskId: task.taskId,
        duplicateIds: parsed.duplicateIds,
      });
    }
    if (isTranslationDebugEnabled()) {
      console.debug("[TRANSLATION EXECUTOR] Parsed response", {
        taskId: task.taskId,
        found: parsed.foundCount,
        expected: task.units.length,
        cleanup: parsed.cleanup,
      });
    }
    return {
      taskId: task.taskId,
      variant: task.variant,
      task,
      rawResponse,
      status: "completed",
      perUnit: parsed.perUnit,
      attempts,
    };
  } catch (error) {
    if (!(error instanceof MalformedResponseError)) throw error;
    console.warn("[TRANSLATION EXECUTOR] Malformed response", {
      taskId: task.taskId,
      error: error.message,
    });
    return {
      taskId: task.taskId,
      variant: task.variant,
      task,
      rawResponse,
      status: "malformed",
      perUnit: absentUnits(task),
      attempts,
      error: error.message,
    };
  }
}

/**
 * Executes tasks through a bounded pool. Results come back in completion
 * order; callers match them to tasks by `taskId`.
 */
export async function executeTranslationTasks(
  tasks: readonly TranslationTask[],
  options: ExecutorOptions,
): Promise<TranslationResult[]> {
  const limit = pLimit(Math.max(1, options.concurrencyLimit ?? DEFAULT_CONCURRENCY));
  const results: TranslationResult[] = [];

  await Promise.all(
    tasks.map((task) =>
      limit(async () => {
        const result = await runTask(task, options);
        results.push(result);
        options.onSettled?.(result);
      }),
    ),
  );

  return results;
}
