import type { Job } from "bullmq";
import type {
  ErrorClass,
  GlossaryEntry,
  TranslatableDocument,
  VerdictReason,
} from "@chapterwise/translation-types";

import {
  resolveEngineConfiguration,
  type EngineConfiguration,
  type EngineConfigurationInput,
} from "../../config/engineConfiguration";
import { subscribeTranslationEvents } from "../translationEvents";
import { persistResponseLog } from "./exchangeStore";
import { OpenAICompletionClient } from "./openaiCompletionClient";
import {
  translateDocument,
  type TranslationStats,
} from "./translationEngine";
import type { TranslationCompletionClient } from "./translationExecutor";

export interface DocumentTranslationJobData {
  jobId: string;
  document: TranslatableDocument;
  glossary?: GlossaryEntry[];
  configuration?: EngineConfigurationInput;
  persistExchanges?: boolean;
}

export interface UnresolvedUnitReport {
  unitId: string;
  containerId: string;
  errorClass: Exclude<ErrorClass, "success">;
  reason: VerdictReason;
  lastText: string | null;
}

export interface DocumentTranslationJobResult {
  jobId: string;
  documentId: string;
  document: TranslatableDocument;
  unresolved: UnresolvedUnitReport[];
  stats: TranslationStats;
  persistedExchanges: number;
}

export type DocumentTranslationJob = Pick<
  Job<DocumentTranslationJobData>,
  "id" | "data" | "updateProgress"
>;

export interface DocumentTranslationDependencies {
  translate: typeof translateDocument;
  createClient: (model: EngineConfiguration["model"]) => TranslationCompletionClient;
  persistExchanges: typeof persistResponseLog;
}

export const defaultDocumentTranslationDependencies: DocumentTranslationDependencies = {
  translate: translateDocument,
  createClient: (model) =>
    new OpenAICompletionClient({
      model: model.name,
      maxOutputTokens: model.maxOutputTokens,
    }),
  persistExchanges: persistResponseLog,
};

export async function handleDocumentTranslationJob(
  job: DocumentTranslationJob,
  deps: DocumentTranslationDependencies = defaultDocumentTranslationDependencies,
): Promise<DocumentTranslationJobResult> {
  const { document } = job.data;
  const jobId = job.data.jobId || job.id || document.id;
  const configuration = resolveEngineConfiguration(job.data.configuration);

  console.log("[TRANSLATION WORKER] Job started", {
    jobId,
    documentId: document.id,
    containers: document.containers.length,
    model: configuration.model.name,
  });

  const unsubscribe = subscribeTranslationEvents(jobId, "round-completed", (event) => {
    job.updateProgress({ ...event.summary }).catch((error: unknown) => {
      console.warn("[TRANSLATION WORKER] Failed to report progress", {
        jobId,
        round: event.summary.round,
        error,
      });
    });
  });

  try {
    const outcome = await deps.translate(document, {
      client: deps.createClient(configuration.model),
      configuration: job.data.configuration,
      glossary: job.data.glossary,
      runId: jobId,
    });

    const persistedExchanges =
      job.data.persistExchanges === false
        ? 0
        : await deps.persistExchanges(jobId, document.id, outcome.responseLog.list());

    console.log("[TRANSLATION WORKER] Job finished", {
      jobId,
      documentId: document.id,
      unresolved: outcome.unresolved.length,
      requests: outcome.stats.requestCount,
      persistedExchanges,
    });

    return {
      jobId,
      documentId: document.id,
      document: outcome.document,
      unresolved: outcome.unresolved.map((error) => ({
        unitId: error.unitId,
        containerId: error.containerId,
        errorClass: error.errorClass,
        reason: error.reason,
        lastText: error.lastText,
      })),
      stats: outcome.stats,
      persistedExchanges,
    };
  } finally {
    unsubscribe();
  }
}
