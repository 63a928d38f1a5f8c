import { describe, test } from "node:test";
import assert from "node:assert/strict";
import type { TranslationTask } from "@chapterwise/translation-types";

import { createRequestBuilder } from "../../../agents/translation/promptBuilder";
import { RequestTimeoutError, TransientRequestError } from "../errors";
import { ResponseLog } from "../responseLog";
import { DEFAULT_RETRY_POLICY } from "../retryPolicy";
import { buildFixTask, packRepairBatches } from "../taskPlanner";
import {
  executeTranslationTasks,
  runWithTimeout,
  type CompletionRequest,
  type TranslationCompletionClient,
} from "../translationExecutor";
import { FakeCompletionClient, renderResponse, taskUnit } from "./helpers";

const buildRequest = createRequestBuilder({ sourceLanguage: "en", targetLanguage: "zh" });

const fixTasks = (...ids: string[]): TranslationTask[] =>
  ids.map((id) => buildFixTask(taskUnit(id, "c1", `Source ${id}`), 0));

const echo = (request: CompletionRequest) =>
  renderResponse(request, (segment) => `译文 ${segment.id}`);

describe("executeTranslationTasks", () => {
  test("never runs more requests at once than the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const client: TranslationCompletionClient = {
      complete: async (request) => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return { text: echo(request) };
      },
    };
    const responseLog = new ResponseLog();

    const results = await executeTranslationTasks(fixTasks("a", "b", "c", "d"), {
      client,
      buildRequest,
      responseLog,
      concurrencyLimit: 2,
    });

    assert.equal(peak, 2);
    assert.equal(results.length, 4);
    assert.ok(results.every((result) => result.status === "completed"));
    assert.equal(responseLog.size, 4);
  });

  test("returns results in completion order", async () => {
    const client = new FakeCompletionClient(
      (segment) => `译文 ${segment.id}`,
      (request) => (request.taskId === "r0::fix::slow" ? 30 : 0),
    );

    const results = await executeTranslationTasks(fixTasks("slow", "fast"), {
      client,
      buildRequest,
      responseLog: new ResponseLog(),
    });

    assert.deepEqual(
      results.map((result) => result.taskId),
      ["r0::fix::fast", "r0::fix::slow"],
    );
    assert.equal(results[1].perUnit.get("slow"), "译文 slow");
  });

  test("retries transient failures with backoff and logs every attempt", async () => {
    let calls = 0;
    const sleeps: number[] = [];
    const client: TranslationCompletionClient = {
      complete: async (request) => {
        calls += 1;
        if (calls === 1) throw new TransientRequestError("rate limited", { status: 429 });
        return { text: echo(request), model: "fake-model" };
      },
    };
    const responseLog = new ResponseLog();

    const [result] = await executeTranslationTasks(fixTasks("a"), {
      client,
      buildRequest,
      responseLog,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    assert.equal(result.status, "completed");
    assert.equal(result.attempts, 2);
    assert.deepEqual(sleeps, [2000]);
    assert.deepEqual(
      responseLog.list().map((entry) => [entry.sequence, entry.attempt, entry.status, entry.error]),
      [
        [0, 1, "error", "rate limited"],
        [1, 2, "ok", null],
      ],
    );
    assert.equal(responseLog.list()[1].model, "fake-model");
  });

  test("marks every unit absent once retries are exhausted", async () => {
    const sleeps: number[] = [];
    const client: TranslationCompletionClient = {
      complete: async () => {
        throw new TransientRequestError("overloaded", { status: 503 });
      },
    };
    const responseLog = new ResponseLog();

    const [result] = await executeTranslationTasks(fixTasks("a"), {
      client,
      buildRequest,
      responseLog,
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    assert.equal(result.status, "failed");
    assert.equal(result.attempts, 3);
    assert.deepEqual([...result.perUnit.entries()], [["a", undefined]]);
    assert.deepEqual(sleeps, [2000, 4000]);
    assert.equal(responseLog.size, 3);
  });

  test("does not retry a non-transient failure", async () => {
    const client: TranslationCompletionClient = {
      complete: async () => {
        throw new Error("invalid request");
      },
    };

    const [result] = await executeTranslationTasks(fixTasks("a"), {
      client,
      buildRequest,
      responseLog: new ResponseLog(),
      sleep: async () => {
        assert.fail("should not sleep");
      },
    });

    assert.equal(result.status, "failed");
    assert.equal(result.attempts, 1);
    assert.equal(result.error, "invalid request");
  });

  test("aborts a request that exceeds its timeout", async () => {
    let aborted = false;
    const client: TranslationCompletionClient = {
      complete: (_request, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => {
            aborted = true;
            reject(new Error("aborted"));
          });
        }),
    };

    const [result] = await executeTranslationTasks(fixTasks("a"), {
      client,
      buildRequest,
      responseLog: new ResponseLog(),
      timeoutMs: 20,
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 },
    });

    assert.equal(result.status, "failed");
    assert.equal(result.error, "Request timed out after 20ms");
    assert.equal(aborted, true);
  });

  test("counts a timed-out attempt and succeeds on the retry", async () => {
    let calls = 0;
    const sleeps: number[] = [];
    const client: TranslationCompletionClient = {
      complete: (request, signal) => {
        calls += 1;
        if (calls > 1) return Promise.resolve({ text: echo(request) });
        return new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        });
      },
    };
    const responseLog = new ResponseLog();

    const [result] = await executeTranslationTasks(fixTasks("a"), {
      client,
      buildRequest,
      responseLog,
      timeoutMs: 20,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    assert.equal(result.status, "completed");
    assert.equal(result.attempts, 2);
    assert.equal(result.perUnit.get("a"), "译文 a");
    assert.deepEqual(sleeps, [2000]);
    assert.deepEqual(
      responseLog.list().map((entry) => [entry.attempt, entry.status, entry.error]),
      [
        [1, "error", "Request timed out after 20ms"],
        [2, "ok", null],
      ],
    );
  });

  test("clears the deadline when the client throws synchronously", async () => {
    const pendingTimers = () =>
      process.getActiveResourcesInfo().filter((resource) => resource === "Timeout").length;
    const before = pendingTimers();
    const client: TranslationCompletionClient = {
      complete: () => {
        throw new Error("boom");
      },
    };

    const [result] = await executeTranslationTasks(fixTasks("a"), {
      client,
      buildRequest,
      responseLog: new ResponseLog(),
      timeoutMs: 2000,
    });

    assert.equal(result.status, "failed");
    assert.equal(result.error, "boom");
    assert.equal(pendingTimers(), before);
  });

  test("keeps the raw reply of a malformed response", async () => {
    const [batch] = packRepairBatches([taskUnit("a", "c1", "Hello")], {
      budget: 19200,
      round: 1,
    });
    const client: TranslationCompletionClient = {
      complete: async () => ({ text: '<seg id="a">你好</seg>' }),
    };
    const responseLog = new ResponseLog();

    const [result] = await executeTranslationTasks([batch], {
      client,
      buildRequest,
      responseLog,
    });

    assert.equal(result.status, "malformed");
    assert.equal(result.rawResponse, '<seg id="a">你好</seg>');
    assert.deepEqual([...result.perUnit.entries()], [["a", undefined]]);
    assert.equal(responseLog.list()[0].status, "ok");
  });
});

describe("runWithTimeout", () => {
  test("resolves with the value when the work finishes in time", async () => {
    assert.equal(await runWithTimeout(async () => "done", 1000), "done");
  });

  test("rejects with the thrown error when the work throws before starting", async () => {
    await assert.rejects(
      runWithTimeout((): Promise<string> => {
        throw new Error("sync failure");
      }, 1000),
      /sync failure/,
    );
  });

  test("rejects with RequestTimeoutError when the deadline passes", async () => {
    await assert.rejects(
      runWithTimeout(() => new Promise<string>(() => {}), 10),
      RequestTimeoutError,
    );
  });
});
