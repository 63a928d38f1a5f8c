/**
 * Shared document-translation type definitions.
 * Format parsers, the orchestration engine and job consumers all exchange
 * documents through these contracts so unit ids stay stable end to end.
 */

export type ContentUnitKind =
  | "paragraph"
  | "heading"
  | "list-item"
  | "caption"
  | "timed-segment";

export interface ContentUnit {
  /** Assigned once by the format parser; never regenerated or reused. */
  readonly id: string;
  readonly sourceText: string;
  readonly kind: ContentUnitKind;
  /** Milliseconds from track start, timed segments only. */
  readonly startTime?: number;
  readonly endTime?: number;
  readonly targetText?: string;
  /** Planner-injected heading that only exists to give the model context. */
  readonly synthetic?: boolean;
}

export type ContainerKind = "chapter" | "track";

export interface DocumentContainer {
  readonly id: string;
  readonly kind: ContainerKind;
  /** Externally known title (spine/TOC metadata), not part of the body. */
  readonly title?: string | null;
  readonly derivedTitle?: string | null;
  readonly units: readonly ContentUnit[];
}

export interface NavigationEntry {
  readonly label: string;
  readonly containerId?: string | null;
  readonly href?: string | null;
  readonly children?: readonly NavigationEntry[];
}

export interface TranslatableDocument {
  readonly id: string;
  readonly title?: string | null;
  readonly sourceLanguage: string;
  readonly targetLanguage?: string | null;
  readonly containers: readonly DocumentContainer[];
  readonly navigation?: readonly NavigationEntry[];
}

export type TranslationTaskVariant = "batch" | "split" | "fix";

/** A unit as it travels inside a task, tagged with its owning container. */
export interface TaskUnit {
  readonly id: string;
  readonly containerId: string;
  readonly kind: ContentUnitKind;
  readonly sourceText: string;
  readonly synthetic?: boolean;
}

interface TranslationTaskBase {
  readonly taskId: string;
  readonly round: number;
  readonly units: readonly TaskUnit[];
  readonly payload: string;
  readonly estimatedTokens: number;
}

export interface BatchTask extends TranslationTaskBase {
  readonly variant: "batch";
  readonly containerIds: readonly string[];
}

export interface SplitTask extends TranslationTaskBase {
  readonly variant: "split";
  readonly containerId: string;
  readonly partIndex: number;
  readonly totalParts: number;
}

export interface FixTask extends TranslationTaskBase {
  readonly variant: "fix";
}

export type TranslationTask = BatchTask | SplitTask | FixTask;

export type TranslationResultStatus = "completed" | "malformed" | "failed";

export interface TranslationResult {
  readonly taskId: string;
  readonly variant: TranslationTaskVariant;
  readonly task: TranslationTask;
  readonly rawResponse: string | null;
  readonly status: TranslationResultStatus;
  /** Every requested unit id is a key; `undefined` marks an absent translation. */
  readonly perUnit: ReadonlyMap<string, string | undefined>;
  readonly attempts: number;
  readonly error?: string | null;
}

export type ErrorClass = "success" | "soft" | "hard";

export type VerdictReason =
  | "ok"
  | "absent"
  | "failure-sentinel"
  | "repetition"
  | "escape-marker"
  | "identical-to-source";

export interface UnitVerdict {
  readonly unitId: string;
  readonly errorClass: ErrorClass;
  readonly reason: VerdictReason;
}

export interface SyntheticHeadingMarker {
  readonly containerId: string;
  readonly unitId: string;
}

export interface ResponseLogEntry {
  readonly sequence: number;
  readonly taskId: string;
  readonly variant: TranslationTaskVariant;
  readonly round: number;
  readonly attempt: number;
  readonly status: "ok" | "error";
  readonly rawResponse: string | null;
  readonly error?: string | null;
  readonly model?: string | null;
  readonly completedAt: string;
}

export interface GlossaryEntry {
  readonly term: string;
  readonly translation: string;
}
