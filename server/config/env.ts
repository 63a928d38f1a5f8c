// server/config/env.ts
import "dotenv/config";
import { z } from "zod";

const schema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  OPENAI_API_KEY: z.string().optional(),
  REDIS_URL: z.string().url().optional(),
  MONGO_URI: z.string().optional(),
  TRANSLATION_ENGINE_CONFIG_PATH: z.string().optional(),
  TRANSLATION_ENGINE_DEBUG: z.string().optional(),
  TRANSLATION_MODEL: z.string().optional(),
  TRANSLATION_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export type Env = z.infer<typeof schema>;

export const env: Env = schema.parse(process.env);

export function isTranslationDebugEnabled(): boolean {
  const flag = process.env.TRANSLATION_ENGINE_DEBUG ?? env.TRANSLATION_ENGINE_DEBUG;
  if (!flag) return false;
  const normalized = flag.trim().toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes";
}
