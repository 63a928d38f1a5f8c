import type {
  GlossaryEntry,
  TranslatableDocument,
} from "@chapterwise/translation-types";

import { createRequestBuilder } from "../../agents/translation/promptBuilder";
import {
  effectiveBudgetOf,
  resolveEngineConfiguration,
  toRetryPolicy,
  type EngineConfiguration,
  type EngineConfigurationInput,
} from "../../config/engineConfiguration";
import {
  emitTranslationComplete,
  emitTranslationRoundCompleted,
  emitTranslationRoundStarted,
  emitTranslationTaskSettled,
} from "../translationEvents";
import { UnresolvedUnitError } from "./errors";
import { collectSplitParts, reassembleDocument } from "./reassembler";
import { runRepairLoop, type RoundSummary } from "./repairLoop";
import { ResponseLog } from "./responseLog";
import { planTranslationTasks } from "./taskPlanner";
import { estimateTokens, type TokenEstimator } from "./tokenEstimator";
import {
  executeTranslationTasks,
  type Sleep,
  type TranslationCompletionClient,
} from "./translationExecutor";

export interface TranslateDocumentOptions {
  client: TranslationCompletionClient;
  /** Overrides layered over the configuration file. */
  configuration?: EngineConfigurationInput;
  /** `null` skips the configuration file. */
  configPath?: string | null;
  glossary?: readonly GlossaryEntry[];
  responseLog?: ResponseLog;
  runId?: string;
  estimate?: TokenEstimator;
  sleep?: Sleep;
}

export interface TranslationStats {
  effectiveBudget: number;
  plannedTasks: number;
  requestCount: number;
  roundCount: number;
  translatedUnits: number;
  unresolvedUnits: number;
  skippedContainerIds: string[];
}

export interface TranslateDocumentOutcome {
  document: TranslatableDocument;
  unresolved: UnresolvedUnitError[];
  rounds: RoundSummary[];
  responseLog: ResponseLog;
  stats: TranslationStats;
  configuration: EngineConfiguration;
}

export async function translateDocument(
  document: TranslatableDocument,
  options: TranslateDocumentOptions,
): Promise<TranslateDocumentOutcome> {
  const configuration = resolveEngineConfiguration(options.configuration, {
    configPath: options.configPath,
  });
  const budget = effectiveBudgetOf(configuration);
  const estimate = options.estimate ?? estimateTokens;
  const responseLog = options.responseLog ?? new ResponseLog();
  const runId = options.runId ?? document.id;

  const plan = planTranslationTasks(document, { budget, estimate });
  console.log("[TRANSLATION ENGINE] Planned document", {
    documentId: document.id,
    budget,
    tasks: plan.tasks.length,
    batches: plan.tasks.filter((task) => task.variant === "batch").length,
    splitParts: plan.tasks.filter((task) => task.variant === "split").length,
    syntheticHeadings: plan.syntheticHeadings.length,
    skippedContainers: plan.skippedContainerIds.length,
  });

  const buildRequest = createRequestBuilder(
    {
      title: document.title,
      sourceLanguage: document.sourceLanguage,
      targetLanguage: document.targetLanguage,
      glossary: options.glossary,
    },
    {
      templates: configuration.prompts,
      maxOutputTokens: configuration.model.maxOutputTokens,
    },
  );

  const loop = await runRepairLoop(plan.tasks, {
    budget,
    estimate,
    maxRounds: configuration.maxRounds,
    roundDelayMs: configuration.roundDelayMs,
    missedTranslationPasses: configuration.quality.missedTranslationPasses,
    quality: configuration.quality,
    sleep: options.sleep,
    execute: (tasks) =>
      executeTranslationTasks(tasks, {
        client: options.client,
        buildRequest,
        responseLog,
        concurrencyLimit: configuration.concurrencyLimit,
        timeoutMs: configuration.request.timeoutMs,
        retryPolicy: toRetryPolicy(configuration),
        sleep: options.sleep,
        onSettled: (result) =>
          emitTranslationTaskSettled({
            runId,
            documentId: document.id,
            round: result.task.round,
            taskId: result.taskId,
            variant: result.variant,
            status: result.status,
            attempts: result.attempts,
          }),
      }),
    onRoundStarted: (round, tasks) => {
      console.log("[TRANSLATION ENGINE] Round started", {
        documentId: document.id,
        round,
        tasks: tasks.length,
      });
      emitTranslationRoundStarted({
        runId,
        documentId: document.id,
        round,
        taskCount: tasks.length,
      });
    },
    onRoundCompleted: (summary) => {
      console.log("[TRANSLATION ENGINE] Round completed", {
        documentId: document.id,
        ...summary,
      });
      emitTranslationRoundCompleted({ runId, documentId: document.id, summary });
    },
  });

  // Unresolved units keep their source text so the output stays complete.
  const translations = new Map(loop.translations);
  const unresolved = loop.unresolved.map(({ unit, verdict, lastText }) => {
    translations.set(unit.id, unit.sourceText);
    return new UnresolvedUnitError({
      unitId: unit.id,
      containerId: unit.containerId,
      errorClass: verdict.errorClass === "soft" ? "soft" : "hard",
      reason: verdict.reason,
      lastText,
    });
  });
  for (const error of unresolved) {
    console.warn("[TRANSLATION ENGINE] Unit left untranslated", {
      documentId: document.id,
      unitId: error.unitId,
      reason: error.reason,
    });
  }

  const translated = reassembleDocument({
    document,
    translations,
    syntheticHeadings: plan.syntheticHeadings,
    splitParts: collectSplitParts(loop.initialResults),
  });

  emitTranslationComplete({
    runId,
    documentId: document.id,
    unresolvedCount: unresolved.length,
    roundCount: loop.rounds.length,
    requestCount: responseLog.size,
    completedAt: new Date().toISOString(),
  });

  return {
    document: translated,
    unresolved,
    rounds: loop.rounds,
    responseLog,
    configuration,
    stats: {
      effectiveBudget: budget,
      plannedTasks: plan.tasks.length,
      requestCount: responseLog.size,
      roundCount: loop.rounds.length,
      translatedUnits: loop.translations.size,
      unresolvedUnits: unresolved.length,
      skippedContainerIds: plan.skippedContainerIds,
    },
  };
}
