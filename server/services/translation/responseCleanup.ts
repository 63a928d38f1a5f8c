import { z } from "zod";

/**
 * Accepted wrapper patterns a model may put around the payload it was asked
 * to return. Each pattern either peels one layer off or returns null.
 */
export interface WrapperPattern {
  name: string;
  unwrap: (text: string) => string | null;
}

export interface CleanedResponse {
  text: string;
  applied: string[];
}

const MAX_UNWRAP_PASSES = 8;

const ENVELOPE_PREFERRED_KEYS = [
  "translated_html",
  "translation",
  "translated_text",
  "output",
  "content",
  "text",
];

const jsonEnvelopeSchema = z.record(z.string(), z.unknown());

const FENCE_WITH_INFO = /^```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?[ \t]*```$/;
const FENCE_INLINE = /^```([\s\S]*?)```$/;
const START_MARKER = /^-{3,}\s*START OF[^\n]*?-{3,}[ \t]*\r?\n/i;
const END_MARKER = /\r?\n[ \t]*-{3,}\s*END OF[^\n]*?-{3,}$/i;

export const WRAPPER_PATTERNS: readonly WrapperPattern[] = [
  {
    name: "outer-whitespace",
    unwrap: (text) => {
      const trimmed = text.replace(/^\uFEFF/, "").trim();
      return trimmed !== text ? trimmed : null;
    },
  },
  {
    name: "code-fence",
    unwrap: (text) => {
      const fenced = FENCE_WITH_INFO.exec(text) ?? FENCE_INLINE.exec(text);
      return fenced ? fenced[1] : null;
    },
  },
  {
    name: "json-envelope",
    unwrap: (text) => {
      if (!text.startsWith("{") || !text.endsWith("}")) return null;
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        return null;
      }
      const record = jsonEnvelopeSchema.safeParse(parsed);
      if (!record.success) return null;
      for (const key of ENVELOPE_PREFERRED_KEYS) {
        const value = record.data[key];
        if (typeof value === "string") return value;
      }
      const strings = Object.values(record.data).filter(
        (value): value is string => typeof value === "string",
      );
      return strings.length === 1 ? strings[0] : null;
    },
  },
  {
    name: "echoed-markers",
    unwrap: (text) => {
      const stripped = text.replace(START_MARKER, "").replace(END_MARKER, "");
      return stripped !== text ? stripped : null;
    },
  },
];

export function cleanModelResponse(
  raw: string,
  patterns: readonly WrapperPattern[] = WRAPPER_PATTERNS,
): CleanedResponse {
  let text = raw;
  const applied: string[] = [];

  for (let pass = 0; pass < MAX_UNWRAP_PASSES; pass += 1) {
    let changed = false;
    for (const pattern of patterns) {
      const next = pattern.unwrap(text);
      if (next !== null && next !== text) {
        text = next;
        applied.push(pattern.name);
        changed = true;
        break;
      }
    }
    if (!changed) break;
  }

  return { text, applied };
}
