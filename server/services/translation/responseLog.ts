import type {
  ResponseLogEntry,
  TranslationTaskVariant,
} from "@chapterwise/translation-types";

export interface ResponseLogRecord {
  taskId: string;
  variant: TranslationTaskVariant;
  round: number;
  attempt: number;
  status: "ok" | "error";
  rawResponse: string | null;
  error?: string | null;
  model?: string | null;
}

/**
 * Append-only record of every raw model exchange, in completion order.
 * Owned by the caller of a translation run and shared by its workers.
 */
export class ResponseLog {
  private readonly entries: ResponseLogEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  append(record: ResponseLogRecord): ResponseLogEntry {
    const entry: ResponseLogEntry = {
      ...record,
      error: record.error ?? null,
      model: record.model ?? null,
      sequence: this.entries.length,
      completedAt: this.now().toISOString(),
    };
    this.entries.push(entry);
    return entry;
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly ResponseLogEntry[] {
    return [...this.entries];
  }

  forTask(taskId: string): ResponseLogEntry[] {
    return this.entries.filter((entry) => entry.taskId === taskId);
  }

  /** Latest entry per task id. */
  byTaskId(): Map<string, ResponseLogEntry> {
    const latest = new Map<string, ResponseLogEntry>();
    for (const entry of this.entries) latest.set(entry.taskId, entry);
    return latest;
  }
}
