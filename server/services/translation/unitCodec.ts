import type {
  TaskUnit,
  TranslationTask,
} from "@chapterwise/translation-types";

import { MalformedResponseError } from "./errors";
import { cleanModelResponse } from "./responseCleanup";

export const BATCH_OPEN = "<batch>";
export const BATCH_CLOSE = "</batch>";
export const CONTAINER_CLOSE = "</chapter>";

const SEGMENT_PATTERN = /<seg\b([^>]*)>([\s\S]*?)<\/seg\s*>/gi;
const ID_ATTRIBUTE_PATTERN = /\bid\s*=\s*(?:"([^"]*)"|'([^']*)')/i;

export interface ParsedTaskResponse {
  /** Every unit id of the task is a key; `undefined` marks an absent unit. */
  perUnit: Map<string, string | undefined>;
  foundCount: number;
  unexpectedIds: string[];
  duplicateIds: string[];
  cleanup: string[];
}

export interface UnitGroup {
  containerId: string;
  units: TaskUnit[];
}

const escapeText = (value: string) =>
  value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

const escapeAttribute = (value: string) =>
  escapeText(value).replace(/"/g, "&quot;");

export function unescapeMarkup(value: string): string {
  return value
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&");
}

export function serializeUnit(unit: Pick<TaskUnit, "id" | "kind" | "sourceText">): string {
  return `<seg id="${escapeAttribute(unit.id)}" kind="${unit.kind}">${escapeText(
    unit.sourceText,
  )}</seg>`;
}

export function containerOpenTag(containerId: string): string {
  return `<chapter id="${escapeAttribute(containerId)}">`;
}

/** Contiguous runs of units sharing a container, in input order. */
export function groupUnitsByContainer(units: readonly TaskUnit[]): UnitGroup[] {
  const groups: UnitGroup[] = [];
  for (const unit of units) {
    const last = groups[groups.length - 1];
    if (last && last.containerId === unit.containerId) {
      last.units.push(unit);
    } else {
      groups.push({ containerId: unit.containerId, units: [unit] });
    }
  }
  return groups;
}

export function serializeBatchPayload(units: readonly TaskUnit[]): string {
  const lines = [BATCH_OPEN];
  for (const group of groupUnitsByContainer(units)) {
    lines.push(containerOpenTag(group.containerId));
    lines.push(...group.units.map(serializeUnit));
    lines.push(CONTAINER_CLOSE);
  }
  lines.push(BATCH_CLOSE);
  return lines.join("\n");
}

export function serializeFragments(units: readonly TaskUnit[]): string {
  return units.map(serializeUnit).join("\n");
}

const readSegmentId = (attributes: string): string | null => {
  const match = ID_ATTRIBUTE_PATTERN.exec(attributes);
  if (!match) return null;
  return unescapeMarkup(match[1] ?? match[2] ?? "");
};

export function parseTaskResponse(
  task: TranslationTask,
  raw: string,
): ParsedTaskResponse {
  const { text, applied } = cleanModelResponse(raw);
  if (!text) {
    throw new MalformedResponseError(task.taskId, "empty response");
  }
  if (
    task.variant === "batch" &&
    !(text.includes(BATCH_OPEN) && text.includes(BATCH_CLOSE))
  ) {
    throw new MalformedResponseError(task.taskId, "missing <batch> wrapper");
  }

  const perUnit = new Map<string, string | undefined>(
    task.units.map((unit) => [unit.id, undefined]),
  );
  const seen = new Set<string>();
  const unexpectedIds: string[] = [];
  const duplicateIds: string[] = [];
  let fragments = 0;

  for (const match of text.matchAll(SEGMENT_PATTERN)) {
    fragments += 1;
    const id = readSegmentId(match[1] ?? "");
    if (id === null || !perUnit.has(id)) {
      unexpectedIds.push(id ?? "(missing id)");
      continue;
    }
    if (seen.has(id)) {
      duplicateIds.push(id);
      continue;
    }
    seen.add(id);
    perUnit.set(id, unescapeMarkup((match[2] ?? "").trim()));
  }

  if (fragments === 0) {
    throw new MalformedResponseError(task.taskId, "no <seg> fragments found");
  }

  return {
    perUnit,
    foundCount: seen.size,
    unexpectedIds,
    duplicateIds,
    cleanup: applied,
  };
}
