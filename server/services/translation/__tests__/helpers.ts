import type {
  ContentUnit,
  DocumentContainer,
  TaskUnit,
  TranslationResult,
  TranslationTask,
} from "@chapterwise/translation-types";

import type { TokenEstimator } from "../tokenEstimator";
import type {
  CompletionRequest,
  CompletionResponse,
  TranslationCompletionClient,
} from "../translationExecutor";
import { serializeUnit, unescapeMarkup } from "../unitCodec";

/** Counts "■" as 1000 tokens each and everything else as free. */
export const blockEstimator: TokenEstimator = (text) =>
  (text.match(/■/g) ?? []).length * 1000;

export const paragraph = (id: string, sourceText: string): ContentUnit => ({
  id,
  sourceText,
  kind: "paragraph",
});

export const heading = (id: string, sourceText: string): ContentUnit => ({
  id,
  sourceText,
  kind: "heading",
});

export const chapter = (
  id: string,
  units: ContentUnit[],
  title: string | null = null,
): DocumentContainer => ({ id, kind: "chapter", title, units });

export const taskUnit = (
  id: string,
  containerId: string,
  sourceText: string,
): TaskUnit => ({ id, containerId, kind: "paragraph", sourceText });

export function completedResult(
  task: TranslationTask,
  textFor: (unit: TaskUnit) => string | undefined,
): TranslationResult {
  return {
    taskId: task.taskId,
    variant: task.variant,
    task,
    rawResponse: "",
    status: "completed",
    perUnit: new Map(task.units.map((unit) => [unit.id, textFor(unit)])),
    attempts: 1,
  };
}

export interface RequestedSegment {
  id: string;
  text: string;
}

const REQUEST_SEGMENT = /<seg id="([^"]*)" kind="[^"]*">([\s\S]*?)<\/seg>/g;

export function requestedSegments(request: CompletionRequest): RequestedSegment[] {
  return [...request.input.matchAll(REQUEST_SEGMENT)].map((match) => ({
    id: unescapeMarkup(match[1]),
    text: unescapeMarkup(match[2]),
  }));
}

export type Translator = (
  segment: RequestedSegment,
  request: CompletionRequest,
) => string | undefined;

export const dictionaryTranslator =
  (dictionary: Record<string, string>): Translator =>
  (segment) =>
    dictionary[segment.text];

export function renderResponse(request: CompletionRequest, translate: Translator): string {
  const lines: string[] = [];
  for (const segment of requestedSegments(request)) {
    const text = translate(segment, request);
    if (text === undefined) continue;
    lines.push(serializeUnit({ id: segment.id, kind: "paragraph", sourceText: text }));
  }
  return request.variant === "batch"
    ? ["<batch>", ...lines, "</batch>"].join("\n")
    : lines.join("\n");
}

export class FakeCompletionClient implements TranslationCompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(
    private readonly translate: Translator,
    private readonly delayFor: (request: CompletionRequest) => number = () => 0,
  ) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const delay = this.delayFor(request);
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    return { text: renderResponse(request, this.translate), model: "fake-model" };
  }
}

export const noSleep = async (): Promise<void> => {};
