import { describe, test } from "node:test";
import assert from "node:assert/strict";

import { classifyResult, classifyUnitText } from "../qualityClassifier";
import { buildFixTask } from "../taskPlanner";
import { taskUnit } from "./helpers";

describe("classifyUnitText", () => {
  test("flags a run of one repeated character", () => {
    assert.deepEqual(classifyUnitText("Hello", "我我我我我我"), {
      errorClass: "hard",
      reason: "repetition",
    });
  });

  test("flags a repeated short phrase", () => {
    assert.deepEqual(classifyUnitText("Run!", "快跑快跑快跑快跑快跑"), {
      errorClass: "hard",
      reason: "repetition",
    });
  });

  test("ignores repetition that the source already contains", () => {
    assert.deepEqual(classifyUnitText("Zzzzzz, he snored.", "Zzzzzz，他打着呼噜。"), {
      errorClass: "success",
      reason: "ok",
    });
    assert.deepEqual(classifyUnitText("In 100000 years", "在100000年里"), {
      errorClass: "success",
      reason: "ok",
    });
  });

  test("accepts numbers written without their separators", () => {
    assert.deepEqual(classifyUnitText("It cost 1,000,000 dollars.", "花了1000000美元。"), {
      errorClass: "success",
      reason: "ok",
    });
  });

  test("still flags digit runs the source does not have", () => {
    assert.deepEqual(classifyUnitText("Chapter 1", "第1章0000000"), {
      errorClass: "hard",
      reason: "repetition",
    });
  });

  test("respects the configured threshold", () => {
    assert.equal(
      classifyUnitText("Hello", "我我我我我我", {
        repetitionThreshold: 8,
        failureSentinels: [],
      }).errorClass,
      "success",
    );
  });

  test("flags a bracket-wrapped escape", () => {
    assert.deepEqual(classifyUnitText("Hello world", "[Hello world]"), {
      errorClass: "hard",
      reason: "escape-marker",
    });
  });

  test("accepts brackets the source already had", () => {
    assert.equal(classifyUnitText("[Note]", "[注]").errorClass, "success");
  });

  test("treats empty and missing text as soft", () => {
    assert.deepEqual(classifyUnitText("Hello", ""), {
      errorClass: "soft",
      reason: "absent",
    });
    assert.deepEqual(classifyUnitText("Hello", undefined), {
      errorClass: "soft",
      reason: "absent",
    });
  });

  test("treats the failure sentinel as soft", () => {
    assert.deepEqual(classifyUnitText("Hello", "[TRANSLATION_FAILED] timeout"), {
      errorClass: "soft",
      reason: "failure-sentinel",
    });
  });

  test("accepts a real translation", () => {
    assert.deepEqual(classifyUnitText("Hello", "你好"), {
      errorClass: "success",
      reason: "ok",
    });
  });

  test("flags text returned untranslated", () => {
    assert.deepEqual(classifyUnitText("Hello", "Hello"), {
      errorClass: "hard",
      reason: "identical-to-source",
    });
    assert.equal(classifyUnitText("Hello", "  hello ").reason, "identical-to-source");
  });

  test("does not flag copies of text without letters", () => {
    assert.equal(classifyUnitText("42", "42").errorClass, "success");
  });
});

describe("classifyResult", () => {
  test("returns verdicts in task order and is deterministic", () => {
    const task = {
      ...buildFixTask(taskUnit("a", "c1", "Hello"), 0),
      units: [taskUnit("a", "c1", "Hello"), taskUnit("b", "c1", "World")],
    };
    const result = {
      taskId: task.taskId,
      variant: task.variant,
      task,
      rawResponse: "",
      status: "completed" as const,
      perUnit: new Map<string, string | undefined>([
        ["a", "你好"],
        ["b", undefined],
      ]),
      attempts: 1,
    };
    const sources = new Map([
      ["a", "Hello"],
      ["b", "World"],
    ]);

    const first = classifyResult(result, sources);

    assert.deepEqual(first, [
      { unitId: "a", errorClass: "success", reason: "ok" },
      { unitId: "b", errorClass: "soft", reason: "absent" },
    ]);
    assert.deepEqual(classifyResult(result, sources), first);
  });
});
