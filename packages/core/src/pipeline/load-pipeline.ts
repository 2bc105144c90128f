import type { Logger } from "pino";

import { DocumentNotFoundError, PipelineError, errorMessage } from "../errors.js";
import type { DeskSettings, Homework } from "../homework/types.js";
import { BoundedChannel } from "./channel.js";
import {
  HomeworkRecordSchema,
  detectDocumentShape,
  fromRecord,
  parseDocumentSettings,
  toRecord,
} from "./document.js";
import type { DocumentSource } from "./document-store.js";

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_CHANNEL_CAPACITY = 50;
export const DEFAULT_EAGER_BATCHES = 3;

export interface BatchInfo {
  sequence: number; // 1-based
  totalBatches: number;
  totalCount: number;
  isLast: boolean;
}

export interface RawBatch extends BatchInfo {
  records: unknown[];
}

/** A record kept out of the collection, with where it came from and why. */
export interface SetAsideRecord {
  record: unknown;
  reason: string;
}

export interface HomeworkBatch extends BatchInfo {
  items: Homework[];
  setAside: SetAsideRecord[];
}

type ControlMessage =
  | { type: "complete"; totalCount: number; settings: DeskSettings | null }
  | { type: "error"; error: PipelineError }
  | { type: "end" };

export type ReaderMessage = { type: "batch"; batch: RawBatch } | ControlMessage;
export type NormalizedMessage = { type: "batch"; batch: HomeworkBatch } | ControlMessage;

export type LoadResult =
  | {
      ok: true;
      items: Homework[];
      settings: DeskSettings | null;
      batches: number;
      setAside: SetAsideRecord[];
    }
  | { ok: false; error: PipelineError };

export interface LoadPipelineOptions {
  source: DocumentSource;
  logger: Logger;
  batchSize?: number;
  channelCapacity?: number;
  /** How many leading batches are surfaced as partial results. */
  eagerBatches?: number;
  onPartial?: (items: readonly Homework[], progressFraction: number) => void;
  onBatch?: (batch: HomeworkBatch) => void;
}

/**
 * Stage 1: reads the document and slices it into batches. Always finishes with
 * `end`, preceded by either `complete` or `error`.
 */
export async function runReader(
  source: DocumentSource,
  output: BoundedChannel<ReaderMessage>,
  batchSize: number
): Promise<void> {
  const fail = async (error: PipelineError | string): Promise<void> => {
    const pipelineError = typeof error === "string" ? new PipelineError("reader", error) : error;
    if (await output.send({ type: "error", error: pipelineError })) {
      await output.send({ type: "end" });
    }
  };

  try {
    let raw: string | null;
    try {
      raw = await source.read();
    } catch (error) {
      await fail(`Failed to read ${source.describe()}: ${errorMessage(error)}`);
      return;
    }
    if (raw === null) {
      await fail(new DocumentNotFoundError(source.describe()));
      return;
    }

    let records: unknown[];
    let settings: DeskSettings | null = null;
    try {
      const shape = detectDocumentShape(JSON.parse(raw));
      records = shape.records;
      if (shape.kind === "wrapped") {
        settings = parseDocumentSettings(shape.settings);
      }
    } catch (error) {
      await fail(`Invalid document ${source.describe()}: ${errorMessage(error)}`);
      return;
    }

    const totalCount = records.length;
    const totalBatches = Math.ceil(totalCount / batchSize);
    for (let start = 0, sequence = 1; start < totalCount; start += batchSize, sequence++) {
      const accepted = await output.send({
        type: "batch",
        batch: {
          sequence,
          totalBatches,
          totalCount,
          isLast: sequence === totalBatches,
          records: records.slice(start, start + batchSize),
        },
      });
      if (!accepted) {
        return;
      }
    }

    if (await output.send({ type: "complete", totalCount, settings })) {
      await output.send({ type: "end" });
    }
  } finally {
    output.close();
  }
}

function describeItem(batch: BatchInfo, index: number): string {
  return `Batch ${batch.sequence}/${batch.totalBatches}, item ${index}`;
}

function normalizeBatch(batch: RawBatch): HomeworkBatch {
  const items: Homework[] = [];
  const setAside: SetAsideRecord[] = [];

  batch.records.forEach((record, index) => {
    const parsed = HomeworkRecordSchema.safeParse(record);
    if (parsed.success) {
      items.push(fromRecord(parsed.data));
      return;
    }
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid record";
    setAside.push({ record, reason: `${describeItem(batch, index)}: ${where}` });
  });

  return {
    sequence: batch.sequence,
    totalBatches: batch.totalBatches,
    totalCount: batch.totalCount,
    isLast: batch.isLast,
    items,
    setAside,
  };
}

/**
 * Stage 2: upgrades records to the current schema (a missing `status` becomes
 * `pending`) and forwards control messages untouched. Records it cannot read
 * travel with their batch as set-aside entries.
 */
export async function runNormalizer(
  input: BoundedChannel<ReaderMessage>,
  output: BoundedChannel<NormalizedMessage>
): Promise<void> {
  try {
    for await (const message of input) {
      if (message.type !== "batch") {
        if (!(await output.send(message))) return;
        if (message.type === "end") return;
        if (message.type === "error") {
          await output.send({ type: "end" });
          return;
        }
        continue;
      }

      let normalized: HomeworkBatch;
      try {
        normalized = normalizeBatch(message.batch);
      } catch (error) {
        const pipelineError =
          error instanceof PipelineError
            ? error
            : new PipelineError("normalizer", errorMessage(error));
        if (await output.send({ type: "error", error: pipelineError })) {
          await output.send({ type: "end" });
        }
        return;
      }
      if (!(await output.send({ type: "batch", batch: normalized }))) return;
    }
  } finally {
    input.cancel();
    output.close();
  }
}

export interface SinkOptions {
  logger: Logger;
  eagerBatches: number;
  onPartial?: (items: readonly Homework[], progressFraction: number) => void;
  onBatch?: (batch: HomeworkBatch) => void;
}

/**
 * Stage 3: accumulates batches into a private collection. The result is handed
 * back to the caller; nothing shared is touched here. The first record for a
 * code wins and later ones are set aside.
 */
export async function runSink(
  input: BoundedChannel<NormalizedMessage>,
  options: SinkOptions
): Promise<LoadResult> {
  const items: Homework[] = [];
  const setAside: SetAsideRecord[] = [];
  const seen = new Set<string>();
  let batches = 0;
  let outcome: LoadResult | null = null;

  try {
    for await (const message of input) {
      if (message.type === "end") {
        break;
      }
      if (message.type === "error") {
        outcome = { ok: false, error: message.error };
        continue;
      }
      if (message.type === "complete") {
        const received = items.length + setAside.length;
        if (received !== message.totalCount) {
          outcome = {
            ok: false,
            error: new PipelineError(
              "sink",
              `Expected ${message.totalCount} items, received ${received}`
            ),
          };
        } else {
          outcome = { ok: true, items, settings: message.settings, batches, setAside };
        }
        continue;
      }

      const { batch } = message;
      for (const item of batch.items) {
        if (seen.has(item.code)) {
          setAside.push({
            record: toRecord(item),
            reason: `Batch ${batch.sequence}/${batch.totalBatches}: duplicate code '${item.code}'`,
          });
          continue;
        }
        seen.add(item.code);
        items.push(item);
      }
      setAside.push(...batch.setAside);
      batches += 1;
      options.onBatch?.(batch);
      options.logger.debug(
        {
          batch: `${batch.sequence}/${batch.totalBatches}`,
          loaded: items.length,
          setAside: setAside.length,
          total: batch.totalCount,
        },
        "Loaded batch"
      );
      if (batches <= options.eagerBatches && options.onPartial) {
        options.onPartial([...items], (items.length + setAside.length) / batch.totalCount);
      }
    }
  } finally {
    input.cancel();
  }

  return (
    outcome ?? {
      ok: false,
      error: new PipelineError("sink", "Pipeline ended without a completion message"),
    }
  );
}

/** Runs the reader, normalizer and sink concurrently over two bounded channels. */
export async function runLoadPipeline(options: LoadPipelineOptions): Promise<LoadResult> {
  const capacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
  const rawChannel = new BoundedChannel<ReaderMessage>(capacity);
  const normalizedChannel = new BoundedChannel<NormalizedMessage>(capacity);

  const [, , result] = await Promise.all([
    runReader(options.source, rawChannel, options.batchSize ?? DEFAULT_BATCH_SIZE),
    runNormalizer(rawChannel, normalizedChannel),
    runSink(normalizedChannel, {
      logger: options.logger,
      eagerBatches: options.eagerBatches ?? DEFAULT_EAGER_BATCHES,
      onPartial: options.onPartial,
      onBatch: options.onBatch,
    }),
  ]);

  return result;
}
