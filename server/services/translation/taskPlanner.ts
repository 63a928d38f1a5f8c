import type {
  BatchTask,
  DocumentContainer,
  FixTask,
  SplitTask,
  SyntheticHeadingMarker,
  TaskUnit,
  TranslatableDocument,
  TranslationTask,
} from "@chapterwise/translation-types";

import { estimateTokens, type TokenEstimator } from "./tokenEstimator";
import {
  BATCH_CLOSE,
  BATCH_OPEN,
  CONTAINER_CLOSE,
  containerOpenTag,
  serializeBatchPayload,
  serializeFragments,
  serializeUnit,
} from "./unitCodec";

export const SYNTHETIC_HEADING_SUFFIX = "::synthetic-heading";

export interface PlannerOptions {
  budget: number;
  estimate?: TokenEstimator;
}

export interface RepairPlannerOptions extends PlannerOptions {
  round: number;
}

export interface TranslationPlan {
  tasks: TranslationTask[];
  syntheticHeadings: SyntheticHeadingMarker[];
  skippedContainerIds: string[];
}

interface CostModel {
  unit: (unit: TaskUnit) => number;
  group: (containerId: string) => number;
  batch: number;
}

const createCostModel = (estimate: TokenEstimator): CostModel => ({
  unit: (unit) => estimate(`${serializeUnit(unit)}\n`),
  group: (containerId) =>
    estimate(`${containerOpenTag(containerId)}\n`) + estimate(`${CONTAINER_CLOSE}\n`),
  batch: estimate(`${BATCH_OPEN}\n`) + estimate(`${BATCH_CLOSE}\n`),
});

const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);

const collectUnitIds = (document: TranslatableDocument) => {
  const ids = new Set<string>();
  for (const container of document.containers) {
    for (const unit of container.units) ids.add(unit.id);
  }
  return ids;
};

const uniqueSyntheticId = (containerId: string, taken: Set<string>) => {
  const base = `${containerId}${SYNTHETIC_HEADING_SUFFIX}`;
  let candidate = base;
  let counter = 1;
  while (taken.has(candidate)) {
    candidate = `${base}-${counter}`;
    counter += 1;
  }
  taken.add(candidate);
  return candidate;
};

const needsSyntheticHeading = (container: DocumentContainer) =>
  container.kind === "chapter" &&
  container.units.length > 0 &&
  Boolean(container.title?.trim()) &&
  !container.units.some((unit) => unit.kind === "heading");

const toTaskUnits = (container: DocumentContainer): TaskUnit[] =>
  container.units.map((unit) => ({
    id: unit.id,
    containerId: container.id,
    kind: unit.kind,
    sourceText: unit.sourceText,
  }));

const buildBatchTask = (
  taskId: string,
  round: number,
  units: TaskUnit[],
  estimate: TokenEstimator,
): BatchTask => {
  const payload = serializeBatchPayload(units);
  const containerIds: string[] = [];
  for (const unit of units) {
    if (containerIds[containerIds.length - 1] !== unit.containerId) {
      containerIds.push(unit.containerId);
    }
  }
  return {
    variant: "batch",
    taskId,
    round,
    containerIds,
    units,
    payload,
    estimatedTokens: estimate(payload),
  };
};

/**
 * Cuts a container that does not fit one request into ordered parts. A part
 * closes when the next unit would push it past the budget; a unit that is
 * larger than the budget on its own travels alone.
 */
const splitContainer = (
  containerId: string,
  units: TaskUnit[],
  budget: number,
  costs: CostModel,
  estimate: TokenEstimator,
): SplitTask[] => {
  const parts: TaskUnit[][] = [];
  let current: TaskUnit[] = [];
  let running = 0;

  for (const unit of units) {
    const cost = costs.unit(unit);
    if (cost > budget) {
      if (current.length) parts.push(current);
      parts.push([unit]);
      current = [];
      running = 0;
      continue;
    }
    if (current.length && running + cost > budget) {
      parts.push(current);
      current = [];
      running = 0;
    }
    current.push(unit);
    running += cost;
  }
  if (current.length) parts.push(current);

  return parts.map((partUnits, partIndex) => {
    const payload = serializeFragments(partUnits);
    return {
      variant: "split",
      taskId: `split::${containerId}::part_${partIndex}`,
      round: 0,
      containerId,
      partIndex,
      totalParts: parts.length,
      units: partUnits,
      payload,
      estimatedTokens: estimate(payload),
    };
  });
};

export function planTranslationTasks(
  document: TranslatableDocument,
  options: PlannerOptions,
): TranslationPlan {
  const estimate = options.estimate ?? estimateTokens;
  const budget = options.budget;
  const costs = createCostModel(estimate);
  const takenIds = collectUnitIds(document);

  const tasks: TranslationTask[] = [];
  const syntheticHeadings: SyntheticHeadingMarker[] = [];
  const skippedContainerIds: string[] = [];

  let openUnits: TaskUnit[] = [];
  let openContainers: string[] = [];
  let openCost = costs.batch;

  const flushBatch = () => {
    if (!openUnits.length) return;
    const first = openContainers[0];
    const last = openContainers[openContainers.length - 1];
    tasks.push(buildBatchTask(`batch::${first}::to::${last}`, 0, openUnits, estimate));
    openUnits = [];
    openContainers = [];
    openCost = costs.batch;
  };

  for (const container of document.containers) {
    if (!container.units.length) {
      skippedContainerIds.push(container.id);
      continue;
    }

    const units = toTaskUnits(container);
    if (needsSyntheticHeading(container)) {
      const unitId = uniqueSyntheticId(container.id, takenIds);
      units.unshift({
        id: unitId,
        containerId: container.id,
        kind: "heading",
        sourceText: (container.title ?? "").trim(),
        synthetic: true,
      });
      syntheticHeadings.push({ containerId: container.id, unitId });
    }

    const containerCost = costs.group(container.id) + sum(units.map(costs.unit));

    if (containerCost + costs.batch > budget) {
      flushBatch();
      tasks.push(...splitContainer(container.id, units, budget, costs, estimate));
      continue;
    }

    if (openUnits.length && openCost + containerCost > budget) {
      flushBatch();
    }
    openUnits.push(...units);
    openContainers.push(container.id);
    openCost += containerCost;
  }
  flushBatch();

  return { tasks, syntheticHeadings, skippedContainerIds };
}

/**
 * Repacks units that came back absent into fresh batches. Units from different
 * containers may share a batch; each contiguous container run gets its own
 * group inside the payload.
 */
export function packRepairBatches(
  units: readonly TaskUnit[],
  options: RepairPlannerOptions,
): BatchTask[] {
  const estimate = options.estimate ?? estimateTokens;
  const costs = createCostModel(estimate);
  const batches: TaskUnit[][] = [];
  let current: TaskUnit[] = [];
  let running = costs.batch;

  for (const unit of units) {
    const previous = current[current.length - 1];
    const opensGroup = !previous || previous.containerId !== unit.containerId;
    const cost = costs.unit(unit) + (opensGroup ? costs.group(unit.containerId) : 0);

    if (current.length && running + cost > options.budget) {
      batches.push(current);
      current = [];
      running = costs.batch + costs.group(unit.containerId) + costs.unit(unit);
      current.push(unit);
      continue;
    }
    current.push(unit);
    running += cost;
  }
  if (current.length) batches.push(current);

  return batches.map((batchUnits, index) =>
    buildBatchTask(`r${options.round}::batch::${index}`, options.round, batchUnits, estimate),
  );
}

export function buildFixTask(
  unit: TaskUnit,
  round: number,
  estimate: TokenEstimator = estimateTokens,
): FixTask {
  const payload = serializeFragments([unit]);
  return {
    variant: "fix",
    taskId: `r${round}::fix::${unit.id}`,
    round,
    units: [unit],
    payload,
    estimatedTokens: estimate(payload),
  };
}
