import type {
  GlossaryEntry,
  TranslationTask,
  TranslationTaskVariant,
} from "@chapterwise/translation-types";

import type { PromptOverrides } from "../../config/engineConfiguration";
import type { CompletionRequest } from "../../services/translation/translationExecutor";
import { SHARED_TRANSLATION_GUIDELINES } from "../prompts/sharedGuidelines";
import { BATCH_SYSTEM_PROMPT, BATCH_USER_TEMPLATE } from "./prompts/batch";
import { FIX_SYSTEM_PROMPT, FIX_USER_TEMPLATE } from "./prompts/fix";
import { SPLIT_SYSTEM_PROMPT, SPLIT_USER_TEMPLATE } from "./prompts/split";

export interface PromptContext {
  title?: string | null;
  sourceLanguage?: string | null;
  targetLanguage?: string | null;
  glossary?: readonly GlossaryEntry[] | null;
}

export interface RequestBuilderOptions {
  templates?: PromptOverrides;
  maxOutputTokens?: number | null;
}

const FALLBACK_SOURCE_LANG = "the original language";
const FALLBACK_TARGET_LANG = "English";
const FALLBACK_TITLE = "this document";

const PLACEHOLDER = /\{\{\s*([a-z_]+)\s*\}\}/g;

const SYSTEM_PROMPTS: Record<TranslationTaskVariant, string> = {
  batch: BATCH_SYSTEM_PROMPT,
  split: SPLIT_SYSTEM_PROMPT,
  fix: FIX_SYSTEM_PROMPT,
};

const USER_TEMPLATES: Record<TranslationTaskVariant, string> = {
  batch: BATCH_USER_TEMPLATE,
  split: SPLIT_USER_TEMPLATE,
  fix: FIX_USER_TEMPLATE,
};

function formatLanguage(label: string | null | undefined, fallback: string) {
  const normalized = label?.trim();
  return normalized && normalized.length ? normalized : fallback;
}

export function formatGlossary(entries?: readonly GlossaryEntry[] | null): string {
  const usable = (entries ?? []).filter(
    (entry) => entry.term.trim() && entry.translation.trim(),
  );
  if (!usable.length) return "";
  const lines = usable.map((entry) => `* "${entry.term}": "${entry.translation}"`);
  return `Glossary (use these renderings consistently):\n${lines.join("\n")}`;
}

/**
 * Replaces `{{name}}` placeholders. Unknown placeholders stay as written; a
 * line holding nothing but an empty placeholder is dropped.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  let prepared = template;
  for (const [key, value] of Object.entries(values)) {
    if (value) continue;
    const emptyLine = new RegExp(`^[ \\t]*\\{\\{\\s*${key}\\s*\\}\\}[ \\t]*(?:\\r?\\n)?`, "gm");
    prepared = prepared.replace(emptyLine, "");
  }
  prepared = prepared.replace(/\n{3,}/g, "\n\n");

  return prepared.replace(PLACEHOLDER, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match,
  );
}

export function buildSystemPrompt(
  variant: TranslationTaskVariant,
  templates: PromptOverrides = {},
): string {
  const base = templates.system ?? SYSTEM_PROMPTS[variant];
  return `${base.trim()}\n\n${SHARED_TRANSLATION_GUIDELINES.trim()}`;
}

export function buildUserPrompt(
  task: TranslationTask,
  context: PromptContext,
  templates: PromptOverrides = {},
): string {
  const template = templates[task.variant] ?? USER_TEMPLATES[task.variant];
  return renderTemplate(template, {
    title: formatLanguage(context.title, FALLBACK_TITLE),
    source_language: formatLanguage(context.sourceLanguage, FALLBACK_SOURCE_LANG),
    target_language: formatLanguage(context.targetLanguage, FALLBACK_TARGET_LANG),
    glossary: formatGlossary(context.glossary),
    payload: task.payload,
  });
}

export function createRequestBuilder(
  context: PromptContext,
  options: RequestBuilderOptions = {},
): (task: TranslationTask) => CompletionRequest {
  const templates = options.templates ?? {};
  return (task) => ({
    taskId: task.taskId,
    variant: task.variant,
    round: task.round,
    instructions: buildSystemPrompt(task.variant, templates),
    input: buildUserPrompt(task, context, templates),
    maxOutputTokens: options.maxOutputTokens ?? null,
  });
}
