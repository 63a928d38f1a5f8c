import { z } from "zod";

import { ConfigurationError } from "./errors";

export interface TokenBudgetSettings {
  outputTokenLimit: number;
  languageExpansionFactor: number;
  safetyMargin: number;
}

export const DEFAULT_OUTPUT_TOKEN_LIMIT = 64_000;
export const DEFAULT_LANGUAGE_EXPANSION_FACTOR = 3;
export const DEFAULT_SAFETY_MARGIN = 0.9;

export const tokenBudgetSchema = z.object({
  outputTokenLimit: z.number().int().positive().default(DEFAULT_OUTPUT_TOKEN_LIMIT),
  languageExpansionFactor: z
    .number()
    .finite()
    .min(1)
    .default(DEFAULT_LANGUAGE_EXPANSION_FACTOR),
  safetyMargin: z.number().gt(0).max(1).default(DEFAULT_SAFETY_MARGIN),
});

/**
 * Input budget per request. The model's output limit is divided by the
 * expected target-language growth and then shrunk by the safety margin.
 */
export function computeEffectiveBudget(settings: TokenBudgetSettings): number {
  const { outputTokenLimit, languageExpansionFactor, safetyMargin } = settings;
  const raw = Math.floor(
    (outputTokenLimit * safetyMargin) / languageExpansionFactor,
  );
  if (!Number.isFinite(raw) || raw <= 0) {
    throw new ConfigurationError([
      `effective token budget must be positive (got ${raw} from limit ${outputTokenLimit}, expansion ${languageExpansionFactor}, margin ${safetyMargin})`,
    ]);
  }
  return raw;
}
