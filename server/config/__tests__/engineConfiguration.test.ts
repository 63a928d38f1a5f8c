import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { ConfigurationError } from "../../services/translation/errors";
import {
  effectiveBudgetOf,
  loadEngineConfigurationFile,
  mergeConfigurationLayers,
  reloadEngineConfiguration,
  resolveEngineConfiguration,
  toRetryPolicy,
  validateEngineConfiguration,
} from "../engineConfiguration";

const issuesOf = (run: () => unknown): string[] => {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  return assert.fail("expected a ConfigurationError");
};

const tempConfigFile = (contents: string) => {
  const dir = mkdtempSync(path.join(tmpdir(), "engine-config-"));
  const file = path.join(dir, "translationEngine.json");
  writeFileSync(file, contents, "utf8");
  return file;
};

describe("validateEngineConfiguration", () => {
  test("fills every default", () => {
    const config = validateEngineConfiguration({});

    assert.deepEqual(config.tokenBudget, {
      outputTokenLimit: 64000,
      languageExpansionFactor: 3,
      safetyMargin: 0.9,
    });
    assert.equal(config.concurrencyLimit, 5);
    assert.equal(config.maxRounds, 3);
    assert.equal(config.roundDelayMs, 5000);
    assert.equal(config.request.timeoutMs, 300000);
    assert.deepEqual(config.quality, {
      repetitionThreshold: 5,
      failureSentinels: ["[TRANSLATION_FAILED]"],
      missedTranslationPasses: 1,
    });
    assert.equal(config.model.name, "gpt-5-mini");
    assert.equal(effectiveBudgetOf(config), 19200);
    assert.deepEqual(toRetryPolicy(config), {
      maxAttempts: 5,
      initialBackoffMs: 2000,
      backoffMultiplier: 2,
      maxBackoffMs: 60000,
    });
  });

  test("reports each invalid field by path", () => {
    assert.deepEqual(
      issuesOf(() => validateEngineConfiguration({ concurrencyLimit: 0 })),
      ["concurrencyLimit: Number must be greater than 0"],
    );
    assert.deepEqual(
      issuesOf(() => validateEngineConfiguration({ prompts: { batch: "Translate it" } })),
      ["prompts.batch: template must contain {{payload}}"],
    );
  });

  test("rejects settings whose effective budget is not positive", () => {
    const issues = issuesOf(() =>
      validateEngineConfiguration({
        tokenBudget: { outputTokenLimit: 1, languageExpansionFactor: 3, safetyMargin: 0.5 },
      }),
    );

    assert.equal(issues.length, 1);
    assert.match(issues[0], /^effective token budget must be positive \(got 0/);
  });
});

describe("mergeConfigurationLayers", () => {
  test("lets later layers win and merges sections one level deep", () => {
    assert.deepEqual(
      mergeConfigurationLayers(
        { maxRounds: 2, request: { timeoutMs: 1000 } },
        null,
        { request: { maxAttempts: 2 } },
        { maxRounds: undefined, concurrencyLimit: 4 },
      ),
      { maxRounds: 2, request: { timeoutMs: 1000, maxAttempts: 2 }, concurrencyLimit: 4 },
    );
  });
});

describe("configuration file", () => {
  test("is read once until reloaded", () => {
    const file = tempConfigFile(JSON.stringify({ maxRounds: 4 }));

    assert.equal(resolveEngineConfiguration({}, { configPath: file }).maxRounds, 4);

    writeFileSync(file, JSON.stringify({ maxRounds: 6 }), "utf8");
    assert.equal(resolveEngineConfiguration({}, { configPath: file }).maxRounds, 4);

    reloadEngineConfiguration();
    assert.equal(resolveEngineConfiguration({}, { configPath: file }).maxRounds, 6);
  });

  test("is overridden by explicit settings", () => {
    const file = tempConfigFile(JSON.stringify({ concurrencyLimit: 8, maxRounds: 2 }));

    const config = resolveEngineConfiguration({ concurrencyLimit: 2 }, { configPath: file });

    assert.equal(config.concurrencyLimit, 2);
    assert.equal(config.maxRounds, 2);
  });

  test("counts a missing file as empty", () => {
    const missing = path.join(tmpdir(), "no-such-dir-for-engine-config", "missing.json");

    assert.deepEqual(loadEngineConfigurationFile(missing), {});
  });

  test("rejects unreadable JSON", () => {
    const file = tempConfigFile("{ not json");

    assert.throws(() => loadEngineConfigurationFile(file), ConfigurationError);
  });
});
