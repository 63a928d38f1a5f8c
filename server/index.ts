import { env } from "./config/env";
import { connectMongo, disconnectMongo } from "./db/mongo";
import {
  closeDocumentTranslationQueue,
  startDocumentTranslationWorker,
} from "./services/translationJobQueue";

async function main() {
  await connectMongo();
  const worker = startDocumentTranslationWorker();
  await worker.waitUntilReady();
  console.log("[TRANSLATION WORKER] Listening for document translation jobs", {
    env: env.NODE_ENV,
    concurrency: env.TRANSLATION_WORKER_CONCURRENCY,
  });

  const shutdown = async (signal: string) => {
    console.log(`[TRANSLATION WORKER] ${signal} received, shutting down`);
    await closeDocumentTranslationQueue();
    await disconnectMongo();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error("[TRANSLATION WORKER] Shutdown failed", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error("[TRANSLATION WORKER] Failed to start", error);
  process.exit(1);
});
