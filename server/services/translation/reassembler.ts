import type {
  ContentUnit,
  DocumentContainer,
  SyntheticHeadingMarker,
  TranslatableDocument,
  TranslationResult,
} from "@chapterwise/translation-types";

import { SplitReassemblyError } from "./errors";
import { patchNavigationTitles } from "./navigationPatch";

export interface SplitPartRecord {
  containerId: string;
  partIndex: number;
  totalParts: number;
  unitIds: readonly string[];
}

export interface ReassemblyInput {
  document: TranslatableDocument;
  /** Final text per unit id, unresolved units already resolved by policy. */
  translations: ReadonlyMap<string, string>;
  syntheticHeadings: readonly SyntheticHeadingMarker[];
  splitParts: readonly SplitPartRecord[];
}

export function collectSplitParts(
  results: readonly TranslationResult[],
): SplitPartRecord[] {
  const parts: SplitPartRecord[] = [];
  for (const result of results) {
    const task = result.task;
    if (task.variant !== "split") continue;
    parts.push({
      containerId: task.containerId,
      partIndex: task.partIndex,
      totalParts: task.totalParts,
      unitIds: task.units.map((unit) => unit.id),
    });
  }
  return parts;
}

/**
 * Sorts the parts of one container and checks that indexes 0..totalParts-1
 * are each present exactly once with a consistent totalParts.
 */
export function orderSplitParts(
  containerId: string,
  parts: readonly SplitPartRecord[],
): SplitPartRecord[] {
  const ordered = [...parts].sort((a, b) => a.partIndex - b.partIndex);
  if (!ordered.length) {
    throw new SplitReassemblyError(containerId, "no parts recorded");
  }
  const totalParts = ordered[0].totalParts;
  if (ordered.some((part) => part.totalParts !== totalParts)) {
    throw new SplitReassemblyError(containerId, "parts disagree on totalParts");
  }
  if (ordered.length !== totalParts) {
    throw new SplitReassemblyError(
      containerId,
      `expected ${totalParts} parts, received ${ordered.length}`,
    );
  }
  ordered.forEach((part, index) => {
    if (part.partIndex !== index) {
      throw new SplitReassemblyError(containerId, `part ${index} is missing`);
    }
  });
  return ordered;
}

const verifySplitCoverage = (
  container: DocumentContainer,
  parts: readonly SplitPartRecord[],
  syntheticUnitId: string | undefined,
) => {
  const covered = orderSplitParts(container.id, parts)
    .flatMap((part) => part.unitIds)
    .filter((unitId) => unitId !== syntheticUnitId);
  const expected = container.units.map((unit) => unit.id);
  const matches =
    covered.length === expected.length &&
    covered.every((unitId, index) => unitId === expected[index]);
  if (!matches) {
    throw new SplitReassemblyError(
      container.id,
      "parts do not cover the container's units exactly once",
    );
  }
};

const firstHeadingTranslation = (
  container: DocumentContainer,
  translations: ReadonlyMap<string, string>,
) => {
  const heading = container.units.find((unit) => unit.kind === "heading");
  return heading ? translations.get(heading.id) : undefined;
};

export function reassembleDocument(input: ReassemblyInput): TranslatableDocument {
  const { document, translations } = input;
  const syntheticByContainer = new Map(
    input.syntheticHeadings.map((marker) => [marker.containerId, marker.unitId]),
  );
  const partsByContainer = new Map<string, SplitPartRecord[]>();
  for (const part of input.splitParts) {
    const list = partsByContainer.get(part.containerId) ?? [];
    list.push(part);
    partsByContainer.set(part.containerId, list);
  }

  const derivedTitles = new Map<string, string>();

  const containers = document.containers.map((container): DocumentContainer => {
    const syntheticUnitId = syntheticByContainer.get(container.id);
    const parts = partsByContainer.get(container.id);
    if (parts) verifySplitCoverage(container, parts, syntheticUnitId);

    const units = container.units.map((unit): ContentUnit => {
      const targetText = translations.get(unit.id);
      return targetText === undefined ? { ...unit } : { ...unit, targetText };
    });

    const translatedTitle =
      (syntheticUnitId ? translations.get(syntheticUnitId) : undefined) ??
      firstHeadingTranslation(container, translations);
    if (translatedTitle) derivedTitles.set(container.id, translatedTitle);

    return {
      ...container,
      derivedTitle: translatedTitle || container.title || null,
      units,
    };
  });

  return {
    ...document,
    containers,
    ...(document.navigation
      ? { navigation: patchNavigationTitles(document.navigation, derivedTitles) }
      : {}),
  };
}
