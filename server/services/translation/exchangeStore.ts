import type { ResponseLogEntry } from "@chapterwise/translation-types";

import TranslationExchange from "../../models/TranslationExchange";

export interface TranslationExchangeRecord {
  job_id: string;
  document_id: string;
  sequence: number;
  task_id: string;
  variant: ResponseLogEntry["variant"];
  round: number;
  attempt: number;
  status: ResponseLogEntry["status"];
  raw_response: string | null;
  error: string | null;
  model: string | null;
  completed_at: Date;
}

/** Storage seam for response log exports; the worker persists through it. */
export interface ExchangeSink {
  insertMany(records: TranslationExchangeRecord[]): Promise<unknown>;
}

export function toExchangeDocuments(
  jobId: string,
  documentId: string,
  entries: readonly ResponseLogEntry[],
): TranslationExchangeRecord[] {
  return entries.map((entry) => ({
    job_id: jobId,
    document_id: documentId,
    sequence: entry.sequence,
    task_id: entry.taskId,
    variant: entry.variant,
    round: entry.round,
    attempt: entry.attempt,
    status: entry.status,
    raw_response: entry.rawResponse,
    error: entry.error ?? null,
    model: entry.model ?? null,
    completed_at: new Date(entry.completedAt),
  }));
}

export const mongooseExchangeSink: ExchangeSink = {
  insertMany: (records) => TranslationExchange.insertMany(records, { ordered: false }),
};

export async function persistResponseLog(
  jobId: string,
  documentId: string,
  entries: readonly ResponseLogEntry[],
  sink: ExchangeSink = mongooseExchangeSink,
): Promise<number> {
  const records = toExchangeDocuments(jobId, documentId, entries);
  if (!records.length) return 0;
  await sink.insertMany(records);
  return records.length;
}
