import type {
  TaskUnit,
  TranslationResult,
  TranslationTask,
} from "@chapterwise/translation-types";

import {
  DEFAULT_QUALITY_OPTIONS,
  classifyUnitText,
  type Classification,
  type QualityOptions,
} from "./qualityClassifier";
import { buildFixTask, packRepairBatches } from "./taskPlanner";
import type { TokenEstimator } from "./tokenEstimator";
import { defaultSleep, type Sleep } from "./translationExecutor";

export interface RoundSummary {
  round: number;
  taskCount: number;
  succeeded: number;
  soft: number;
  hard: number;
  acceptedAsIs: number;
}

export interface UnresolvedUnit {
  unit: TaskUnit;
  verdict: Classification;
  lastText: string | null;
}

export interface RepairLoopOptions {
  execute: (tasks: TranslationTask[], round: number) => Promise<TranslationResult[]>;
  budget: number;
  maxRounds?: number;
  roundDelayMs?: number;
  /** Fix passes granted to text that came back unchanged before it is accepted. */
  missedTranslationPasses?: number;
  quality?: QualityOptions;
  estimate?: TokenEstimator;
  sleep?: Sleep;
  onRoundStarted?: (round: number, tasks: readonly TranslationTask[]) => void;
  onRoundCompleted?: (summary: RoundSummary) => void;
}

export interface RepairLoopOutcome {
  translations: Map<string, string>;
  unresolved: UnresolvedUnit[];
  rounds: RoundSummary[];
  initialResults: TranslationResult[];
}

export const DEFAULT_MAX_ROUNDS = 3;
export const DEFAULT_ROUND_DELAY_MS = 5000;

/**
 * Round 0 runs the planned tasks; every later round resubmits only the units
 * that failed the previous one. Units absent from a reply are repacked into
 * batches, units with suspicious content go out alone as fix tasks.
 */
export async function runRepairLoop(
  initialTasks: readonly TranslationTask[],
  options: RepairLoopOptions,
): Promise<RepairLoopOutcome> {
  const maxRounds = Math.max(1, options.maxRounds ?? DEFAULT_MAX_ROUNDS);
  const roundDelayMs = options.roundDelayMs ?? DEFAULT_ROUND_DELAY_MS;
  const missedPasses = options.missedTranslationPasses ?? 1;
  const quality = options.quality ?? DEFAULT_QUALITY_OPTIONS;
  const sleep = options.sleep ?? defaultSleep;

  const translations = new Map<string, string>();
  const latestText = new Map<string, string>();
  const failing = new Map<string, { unit: TaskUnit; verdict: Classification }>();
  const identicalPasses = new Map<string, number>();
  const rounds: RoundSummary[] = [];
  let initialResults: TranslationResult[] = [];
  let pending: TranslationTask[] = [...initialTasks];

  for (let round = 0; round < maxRounds && pending.length; round += 1) {
    if (round > 0 && roundDelayMs > 0) {
      await sleep(roundDelayMs);
    }
    options.onRoundStarted?.(round, pending);

    const results = await options.execute(pending, round);
    if (round === 0) initialResults = results;
    const resultsById = new Map(results.map((result) => [result.taskId, result]));

    const soft: TaskUnit[] = [];
    const hard: TaskUnit[] = [];
    let succeeded = 0;
    let acceptedAsIs = 0;

    for (const task of pending) {
      const result = resultsById.get(task.taskId);
      for (const unit of task.units) {
        const text = result?.perUnit.get(unit.id);
        const trimmed = text?.trim() ?? "";
        if (trimmed) latestText.set(unit.id, trimmed);

        const verdict = classifyUnitText(unit.sourceText, text, quality);
        if (verdict.errorClass === "success") {
          translations.set(unit.id, trimmed);
          failing.delete(unit.id);
          succeeded += 1;
          continue;
        }

        if (verdict.reason === "identical-to-source") {
          const passes = identicalPasses.get(unit.id) ?? 0;
          if (passes >= missedPasses) {
            translations.set(unit.id, trimmed);
            failing.delete(unit.id);
            acceptedAsIs += 1;
            continue;
          }
          identicalPasses.set(unit.id, passes + 1);
        }

        failing.set(unit.id, { unit, verdict });
        if (verdict.errorClass === "soft") soft.push(unit);
        else hard.push(unit);
      }
    }

    const summary: RoundSummary = {
      round,
      taskCount: pending.length,
      succeeded,
      soft: soft.length,
      hard: hard.length,
      acceptedAsIs,
    };
    rounds.push(summary);
    options.onRoundCompleted?.(summary);

    const nextRound = round + 1;
    pending =
      nextRound < maxRounds
        ? [
            ...packRepairBatches(soft, {
              budget: options.budget,
              round: nextRound,
              estimate: options.estimate,
            }),
            ...hard.map((unit) => buildFixTask(unit, nextRound, options.estimate)),
          ]
        : [];
  }

  const unresolved = [...failing.values()].map(({ unit, verdict }) => ({
    unit,
    verdict,
    lastText: latestText.get(unit.id) ?? null,
  }));

  return { translations, unresolved, rounds, initialResults };
}
