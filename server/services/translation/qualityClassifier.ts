import type {
  ErrorClass,
  TranslationResult,
  UnitVerdict,
  VerdictReason,
} from "@chapterwise/translation-types";

export interface QualityOptions {
  /** Minimum number of consecutive copies that counts as degenerate output. */
  repetitionThreshold: number;
  failureSentinels: readonly string[];
}

export interface Classification {
  errorClass: ErrorClass;
  reason: VerdictReason;
}

export const DEFAULT_FAILURE_SENTINEL = "[TRANSLATION_FAILED]";

export const DEFAULT_QUALITY_OPTIONS: QualityOptions = {
  repetitionThreshold: 5,
  failureSentinels: [DEFAULT_FAILURE_SENTINEL],
};

const LETTER = /\p{L}/u;
const ESCAPE_MARKER = /^\[[\s\S]*\]$/;
const DIGITS_ONLY = /^\p{N}+$/u;

const repetitionPatterns = new Map<number, { char: RegExp; phrase: RegExp }>();

const patternsFor = (threshold: number) => {
  const cached = repetitionPatterns.get(threshold);
  if (cached) return cached;
  const copies = Math.max(1, threshold - 1);
  const built = {
    char: new RegExp(`([\\p{L}\\p{N}])\\1{${copies},}`, "gu"),
    phrase: new RegExp(`([\\s\\S]{2,10}?)\\1{${copies},}`, "gu"),
  };
  repetitionPatterns.set(threshold, built);
  return built;
};

export const normalizeForComparison = (value: string) =>
  value.normalize("NFKC").replace(/\s+/g, " ").trim().toLowerCase();

const countLetters = (value: string) => (value.match(/\p{L}/gu) ?? []).length;

/**
 * Finds a run that repeats at least `threshold` times in `text` but does not
 * already occur in the source, e.g. "哈哈哈哈哈" in a reply to plain prose.
 */
export function findRepetition(
  text: string,
  source: string,
  threshold: number,
): string | null {
  const { char, phrase } = patternsFor(threshold);
  let sourceDigits: string | null = null;
  for (const match of text.matchAll(char)) {
    if (source.includes(match[0])) continue;
    if (DIGITS_ONLY.test(match[0])) {
      // "1,000,000" may come back as "1000000".
      if (sourceDigits === null) sourceDigits = source.replace(/\P{N}/gu, "");
      if (sourceDigits.includes(match[0])) continue;
    }
    return match[0];
  }
  for (const match of text.matchAll(phrase)) {
    const unit = match[1] ?? "";
    if (LETTER.test(unit) && !source.includes(match[0])) return match[0];
  }
  return null;
}

export const isEscapeMarker = (value: string) => ESCAPE_MARKER.test(value.trim());

export function isIdenticalToSource(source: string, text: string): boolean {
  if (countLetters(source) < 2) return false;
  return normalizeForComparison(source) === normalizeForComparison(text);
}

export function classifyUnitText(
  source: string,
  text: string | null | undefined,
  options: QualityOptions = DEFAULT_QUALITY_OPTIONS,
): Classification {
  if (text === null || text === undefined || !text.trim()) {
    return { errorClass: "soft", reason: "absent" };
  }
  const trimmed = text.trim();
  if (options.failureSentinels.some((sentinel) => sentinel && trimmed.startsWith(sentinel))) {
    return { errorClass: "soft", reason: "failure-sentinel" };
  }
  if (findRepetition(trimmed, source, options.repetitionThreshold)) {
    return { errorClass: "hard", reason: "repetition" };
  }
  if (isEscapeMarker(trimmed) && !isEscapeMarker(source)) {
    return { errorClass: "hard", reason: "escape-marker" };
  }
  if (isIdenticalToSource(source, trimmed)) {
    return { errorClass: "hard", reason: "identical-to-source" };
  }
  return { errorClass: "success", reason: "ok" };
}

/** Verdicts for every unit of the result's task, in task order. */
export function classifyResult(
  result: TranslationResult,
  sources: ReadonlyMap<string, string>,
  options: QualityOptions = DEFAULT_QUALITY_OPTIONS,
): UnitVerdict[] {
  return result.task.units.map((unit) => {
    const verdict = classifyUnitText(
      sources.get(unit.id) ?? unit.sourceText,
      result.perUnit.get(unit.id),
      options,
    );
    return { unitId: unit.id, ...verdict };
  });
}
