import pino from "pino";

import type {
  DerivedViews,
  DeskPresenter,
  ListedHomework,
  NoticeSeverity,
} from "../homework/types.js";
import type { HomeworkDocument } from "../pipeline/document.js";
import { serializeDocument } from "../pipeline/document.js";
import type { DocumentSink, DocumentSource } from "../pipeline/document-store.js";

export function createTestLogger(): pino.Logger {
  return pino({ level: "silent" });
}

export interface ListPresentation {
  items: ListedHomework[];
  progressFraction?: number;
}

export class RecordingPresenter implements DeskPresenter {
  readonly notices: { message: string; severity: NoticeSeverity }[] = [];
  readonly lists: ListPresentation[] = [];
  readonly aggregates: DerivedViews[] = [];

  notifyUser(message: string, severity: NoticeSeverity): void {
    this.notices.push({ message, severity });
  }

  presentList(items: readonly ListedHomework[], progressFraction?: number): void {
    this.lists.push(
      progressFraction === undefined
        ? { items: [...items] }
        : { items: [...items], progressFraction }
    );
  }

  presentAggregates(views: DerivedViews): void {
    this.aggregates.push(views);
  }

  lastList(): ListedHomework[] | undefined {
    return this.lists.at(-1)?.items;
  }

  lastAggregates(): DerivedViews | undefined {
    return this.aggregates.at(-1);
  }

  errors(): string[] {
    return this.notices.filter((n) => n.severity === "error").map((n) => n.message);
  }
}

/** In-memory document; `raw` is exactly what a file would hold. */
export class MemoryDocumentStore implements DocumentSource, DocumentSink {
  raw: string | null;
  writes = 0;
  failWrites: Error | null = null;

  /** Strings are stored verbatim; anything else is serialized as JSON. */
  constructor(initial: unknown = null) {
    this.raw =
      initial === null || typeof initial === "string" ? initial : JSON.stringify(initial);
  }

  describe(): string {
    return "memory://homework_data.json";
  }

  async read(): Promise<string | null> {
    return this.raw;
  }

  async write(document: HomeworkDocument): Promise<void> {
    if (this.failWrites) {
      throw this.failWrites;
    }
    this.writes += 1;
    this.raw = serializeDocument(document);
  }

  parsed(): unknown {
    return this.raw === null ? null : JSON.parse(this.raw);
  }
}
