import { EventEmitter } from "node:events";
import type {
  TranslationResultStatus,
  TranslationTaskVariant,
} from "@chapterwise/translation-types";

import type { RoundSummary } from "./translation/repairLoop";

export interface TranslationRoundStartedEvent {
  runId: string;
  documentId: string;
  round: number;
  taskCount: number;
}

export interface TranslationTaskSettledEvent {
  runId: string;
  documentId: string;
  round: number;
  taskId: string;
  variant: TranslationTaskVariant;
  status: TranslationResultStatus;
  attempts: number;
}

export interface TranslationRoundCompletedEvent {
  runId: string;
  documentId: string;
  summary: RoundSummary;
}

export interface TranslationCompleteEvent {
  runId: string;
  documentId: string;
  unresolvedCount: number;
  roundCount: number;
  requestCount: number;
  completedAt: string;
}

type TranslationListener<T> = (event: T) => void;

type TranslationEventMap = {
  "round-started": TranslationRoundStartedEvent;
  "task-settled": TranslationTaskSettledEvent;
  "round-completed": TranslationRoundCompletedEvent;
  complete: TranslationCompleteEvent;
};

const emitter = new EventEmitter();
emitter.setMaxListeners(0);

function channelFor(runId: string, type: keyof TranslationEventMap): string {
  return `translation:${type}:${runId}`;
}

export function emitTranslationRoundStarted(event: TranslationRoundStartedEvent): void {
  emitter.emit(channelFor(event.runId, "round-started"), event);
}

export function emitTranslationTaskSettled(event: TranslationTaskSettledEvent): void {
  emitter.emit(channelFor(event.runId, "task-settled"), event);
}

export function emitTranslationRoundCompleted(
  event: TranslationRoundCompletedEvent,
): void {
  emitter.emit(channelFor(event.runId, "round-completed"), event);
}

export function emitTranslationComplete(event: TranslationCompleteEvent): void {
  emitter.emit(channelFor(event.runId, "complete"), event);
}

export function subscribeTranslationEvents<TName extends keyof TranslationEventMap>(
  runId: string,
  type: TName,
  listener: TranslationListener<TranslationEventMap[TName]>,
): () => void {
  const channel = channelFor(runId, type);
  emitter.on(channel, listener);
  return () => emitter.off(channel, listener);
}
