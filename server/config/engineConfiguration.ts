import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ConfigurationError } from "../services/translation/errors";
import { DEFAULT_FAILURE_SENTINEL } from "../services/translation/qualityClassifier";
import type { RetryPolicy } from "../services/translation/retryPolicy";
import {
  computeEffectiveBudget,
  tokenBudgetSchema,
} from "../services/translation/tokenBudget";
import { env } from "./env";

export const DEFAULT_TRANSLATION_MODEL = "gpt-5-mini";

const requestSchema = z.object({
  timeoutMs: z.number().int().positive().default(300_000),
  maxAttempts: z.number().int().positive().default(5),
  initialBackoffMs: z.number().int().nonnegative().default(2000),
  backoffMultiplier: z.number().min(1).default(2),
  maxBackoffMs: z.number().int().nonnegative().default(60_000),
});

const qualitySchema = z.object({
  repetitionThreshold: z.number().int().min(2).default(5),
  failureSentinels: z
    .array(z.string().min(1))
    .default([DEFAULT_FAILURE_SENTINEL]),
  missedTranslationPasses: z.number().int().nonnegative().default(1),
});

const modelSchema = z.object({
  name: z.string().trim().min(1).default(DEFAULT_TRANSLATION_MODEL),
  maxOutputTokens: z.number().int().positive().optional(),
});

const PAYLOAD_PLACEHOLDER = "{{payload}}";

const userTemplateSchema = z
  .string()
  .min(1)
  .refine((template) => template.includes(PAYLOAD_PLACEHOLDER), {
    message: `template must contain ${PAYLOAD_PLACEHOLDER}`,
  });

const promptSchema = z.object({
  system: z.string().min(1).optional(),
  batch: userTemplateSchema.optional(),
  split: userTemplateSchema.optional(),
  fix: userTemplateSchema.optional(),
});

export const engineConfigurationSchema = z.object({
  tokenBudget: tokenBudgetSchema.default({}),
  concurrencyLimit: z.number().int().positive().default(5),
  maxRounds: z.number().int().positive().default(3),
  roundDelayMs: z.number().int().nonnegative().default(5000),
  request: requestSchema.default({}),
  quality: qualitySchema.default({}),
  model: modelSchema.default({}),
  prompts: promptSchema.default({}),
});

export type EngineConfiguration = z.infer<typeof engineConfigurationSchema>;
export type EngineConfigurationInput = z.input<typeof engineConfigurationSchema>;
export type PromptOverrides = EngineConfiguration["prompts"];

const DEFAULT_CONFIG_PATH = path.resolve(
  process.cwd(),
  "server",
  "translationEngine.json",
);

const resolveConfigPath = () =>
  env.TRANSLATION_ENGINE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

const fileCache = new Map<string, unknown>();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isMissingFile = (error: unknown) =>
  isRecord(error) && error.code === "ENOENT";

/**
 * Reads the JSON configuration file once per path. A missing file counts as
 * an empty layer; unreadable JSON is a configuration error.
 */
export function loadEngineConfigurationFile(
  configPath: string = resolveConfigPath(),
): unknown {
  if (fileCache.has(configPath)) {
    return fileCache.get(configPath);
  }
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf8");
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    fileCache.set(configPath, {});
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([
      `${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  fileCache.set(configPath, parsed);
  return parsed;
}

export function reloadEngineConfiguration(): void {
  fileCache.clear();
}

/** Later layers win; nested sections merge one level deep. */
export function mergeConfigurationLayers(
  ...layers: unknown[]
): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!isRecord(layer)) continue;
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = merged[key];
      merged[key] =
        isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
    }
  }
  return merged;
}

export function validateEngineConfiguration(input: unknown): EngineConfiguration {
  const parsed = engineConfigurationSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => {
        const location = issue.path.join(".") || "(root)";
        return `${location}: ${issue.message}`;
      }),
    );
  }
  // Surfaces a non-positive budget before any task is planned.
  computeEffectiveBudget(parsed.data.tokenBudget);
  return parsed.data;
}

export interface ResolveEngineConfigurationOptions {
  /** `null` skips the configuration file entirely. */
  configPath?: string | null;
}

export function resolveEngineConfiguration(
  overrides: EngineConfigurationInput = {},
  options: ResolveEngineConfigurationOptions = {},
): EngineConfiguration {
  const fileLayer =
    options.configPath === null
      ? {}
      : loadEngineConfigurationFile(options.configPath ?? resolveConfigPath());
  const envLayer = env.TRANSLATION_MODEL
    ? { model: { name: env.TRANSLATION_MODEL } }
    : {};
  return validateEngineConfiguration(
    mergeConfigurationLayers(fileLayer, envLayer, overrides),
  );
}

export const toRetryPolicy = (config: EngineConfiguration): RetryPolicy => ({
  maxAttempts: config.request.maxAttempts,
  initialBackoffMs: config.request.initialBackoffMs,
  backoffMultiplier: config.request.backoffMultiplier,
  maxBackoffMs: config.request.maxBackoffMs,
});

export const effectiveBudgetOf = (config: EngineConfiguration): number =>
  computeEffectiveBudget(config.tokenBudget);
