import { Queue, Worker, type Job, type JobsOptions } from "bullmq";
import { v4 as uuidv4 } from "uuid";

import { env } from "../config/env";
import { createRedisClient } from "./redis";
import {
  handleDocumentTranslationJob,
  type DocumentTranslationJobData,
  type DocumentTranslationJobResult,
} from "./translation/documentTranslationWorker";

export const DOCUMENT_TRANSLATION_QUEUE_NAME = "document_translation";

let queue: Queue<DocumentTranslationJobData, DocumentTranslationJobResult> | null = null;
let worker: Worker<DocumentTranslationJobData, DocumentTranslationJobResult> | null = null;

function getQueue() {
  if (!queue) {
    queue = new Queue<DocumentTranslationJobData, DocumentTranslationJobResult>(
      DOCUMENT_TRANSLATION_QUEUE_NAME,
      { connection: createRedisClient("document-translation-queue") },
    );
    queue.waitUntilReady().catch((error: unknown) => {
      console.error("[TRANSLATION QUEUE] Failed to initialize queue", error);
    });
  }
  return queue;
}

/** The part of a BullMQ queue the producer needs. */
export interface DocumentTranslationProducer {
  add(
    name: string,
    data: DocumentTranslationJobData,
    opts?: JobsOptions,
  ): Promise<unknown>;
}

export const DOCUMENT_TRANSLATION_JOB_NAME = "document-translation";

/** Adds a job and resolves with its id, generated when the caller gives none. */
export async function enqueueDocumentTranslation(
  data: Omit<DocumentTranslationJobData, "jobId"> & { jobId?: string },
  options?: JobsOptions,
  producer: DocumentTranslationProducer = getQueue(),
): Promise<string> {
  const jobId = data.jobId || uuidv4();
  await producer.add(
    DOCUMENT_TRANSLATION_JOB_NAME,
    { ...data, jobId },
    { jobId, removeOnComplete: 100, removeOnFail: 500, ...options },
  );
  console.log("[TRANSLATION QUEUE] Job enqueued", {
    jobId,
    documentId: data.document.id,
  });
  return jobId;
}

export function startDocumentTranslationWorker(
  processor: (
    job: Job<DocumentTranslationJobData, DocumentTranslationJobResult>,
  ) => Promise<DocumentTranslationJobResult> = (job) => handleDocumentTranslationJob(job),
) {
  if (worker) {
    return worker;
  }
  worker = new Worker<DocumentTranslationJobData, DocumentTranslationJobResult>(
    DOCUMENT_TRANSLATION_QUEUE_NAME,
    processor,
    {
      connection: createRedisClient("document-translation-worker"),
      concurrency: env.TRANSLATION_WORKER_CONCURRENCY,
    },
  );
  worker.on("failed", (job, error) => {
    console.error("[TRANSLATION QUEUE] Job failed", {
      jobId: job?.id,
      error: error.message,
    });
  });
  worker.on("completed", (job) => {
    console.log("[TRANSLATION QUEUE] Job completed", { jobId: job.id });
  });
  return worker;
}

export async function closeDocumentTranslationQueue() {
  await Promise.all([worker?.close(), queue?.close()]);
  worker = null;
  queue = null;
}
