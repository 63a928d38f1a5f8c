import { OpenAI } from "openai";

import { env } from "../config/env";

let cachedClient: OpenAI | null = null;

// Retries and per-request deadlines belong to the translation executor.
const SDK_TIMEOUT_MS = 600_000;

export const getOpenAIClient = (): OpenAI => {
  if (cachedClient) {
    return cachedClient;
  }

  const apiKey = process.env.OPENAI_API_KEY ?? env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY is not configured");
  }

  cachedClient = new OpenAI({
    apiKey,
    maxRetries: 0,
    timeout: SDK_TIMEOUT_MS,
  });

  return cachedClient;
};
