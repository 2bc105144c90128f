import type { Logger } from "pino";
import { z } from "zod";

import { DocumentNotFoundError, IoError, ValidationError, errorMessage } from "../errors.js";
import { computeDerivedViews } from "../homework/aggregates.js";
import { formatCalendarDate, parseCalendarDate } from "../homework/dates.js";
import { buildDisplayList, sortByUrgency, withTags } from "../homework/ordering.js";
import { classify } from "../homework/status-classifier.js";
import type { Homework, ListedHomework, StatusTag } from "../homework/types.js";
import { buildDocument } from "../pipeline/document.js";
import type { DocumentSink, DocumentSource } from "../pipeline/document-store.js";
import { runLoadPipeline, type LoadResult, type SetAsideRecord } from "../pipeline/load-pipeline.js";
import {
  failed,
  succeeded,
  suspend,
  type AddHomeworkParams,
  type HandlerContext,
  type TaskHandler,
  type TaskHandlerTable,
} from "./tasks.js";

export interface PipelineTuning {
  batchSize: number;
  channelCapacity: number;
  eagerBatches: number;
}

export interface TaskHandlerDeps {
  documents: DocumentSource & DocumentSink;
  pipeline: PipelineTuning;
  logger: Logger;
}

const REQUIRED_FIELDS: readonly (keyof AddHomeworkParams)[] = [
  "code",
  "subject",
  "content",
  "createDate",
  "dueDate",
];

const SettingsPatchSchema = z
  .object({
    remindDays: z.number().int().min(0).optional(),
    chartDays: z.number().int().min(1).optional(),
  })
  .strict();

// Every mutation is followed by a save and a redraw of both views.
function cascadeAfterMutation(context: HandlerContext): void {
  context.submit("save", {});
  context.submit("refresh", {});
  context.submit("updateDerivedViews", {});
}

function describeSetAside(setAside: readonly SetAsideRecord[]): string {
  const [first] = setAside;
  const more = setAside.length > 1 ? ` (and ${setAside.length - 1} more)` : "";
  return (
    `${setAside.length} homework record(s) left out of the list and kept in the document as is: ` +
    `${first?.reason ?? "unreadable record"}${more}`
  );
}

function tagged(context: HandlerContext, items: readonly Homework[]): ListedHomework[] {
  return withTags(items, (code) => context.state.statuses.get(code));
}

function createLoadHandler(deps: TaskHandlerDeps): TaskHandler<"load"> {
  const logger = deps.logger.child({ module: "load-pipeline" });

  return (_params, context) => {
    const { settings, presenter } = context;
    const startedAt = context.now();

    return suspend(
      () =>
        runLoadPipeline({
          source: deps.documents,
          logger,
          ...deps.pipeline,
          onPartial: (items, progressFraction) => {
            const partial = items.map((item) => ({
              ...item,
              tag: classify(item.dueDate, item.status, startedAt, settings.remindDays),
            }));
            presenter.presentList(sortByUrgency(partial), progressFraction);
          },
        }),
      (result) => {
        const { state } = context;
        const loaded: LoadResult | { ok: false; error: unknown } = result.ok
          ? result.value
          : { ok: false, error: result.error };
        if (!loaded.ok) {
          const cause = loaded.error;
          const error = new IoError(`Failed to load homework: ${errorMessage(cause)}`, { cause });
          state.applyFailedLoad(cause instanceof DocumentNotFoundError ? null : error);
          return failed(error);
        }

        const { items, settings: loadedSettings, batches, setAside } = loaded;
        state.applyLoad(
          items,
          loadedSettings,
          context.now(),
          setAside.map((entry) => entry.record)
        );
        logger.debug(
          { items: items.length, setAside: setAside.length, batches },
          "Homework document loaded"
        );
        if (setAside.length > 0) {
          logger.warn({ reasons: setAside.map((entry) => entry.reason) }, "Records set aside");
          presenter.notifyUser(describeSetAside(setAside), "warning");
        }

        context.submit("refresh", {});
        context.submit("updateDerivedViews", {});
        return succeeded(
          items.length > 0 ? `Loaded ${items.length} homework records` : undefined
        );
      }
    );
  };
}

function createSaveHandler(deps: TaskHandlerDeps): TaskHandler<"save"> {
  return (_params, context) => {
    const { state } = context;
    const blockedBy = state.saveBlockedBy;
    if (blockedBy) {
      return failed(
        new IoError(
          `Not saving ${deps.documents.describe()}: it failed to load and would be overwritten`,
          { cause: blockedBy }
        )
      );
    }

    const document = buildDocument(state.snapshot(), context.settings, state.setAside);
    return suspend(
      () => deps.documents.write(document),
      (result) => {
        if (!result.ok) {
          return failed(
            new IoError(
              `Failed to save ${deps.documents.describe()}: ${errorMessage(result.error)}`,
              { cause: result.error }
            )
          );
        }
        return succeeded();
      }
    );
  };
}

const handleAdd: TaskHandler<"add"> = (params, context) => {
  const { state, settings } = context;
  const fields: AddHomeworkParams = {
    code: params.code.trim(),
    subject: params.subject.trim(),
    content: params.content.trim(),
    createDate: params.createDate.trim(),
    dueDate: params.dueDate.trim(),
  };

  const missing = REQUIRED_FIELDS.filter((field) => fields[field].length === 0);
  if (missing.length > 0) {
    return failed(new ValidationError(`Missing required fields: ${missing.join(", ")}`));
  }

  const created = state.dates.parse(fields.createDate);
  const due = state.dates.parse(fields.dueDate);
  if (!created || !due) {
    return failed(
      new ValidationError("Invalid date format; use DD/MM/YYYY or D/M/YYYY")
    );
  }

  if (state.has(fields.code)) {
    return failed(new ValidationError(`Homework code '${fields.code}' already exists`));
  }

  const item: Homework = {
    code: fields.code,
    subject: fields.subject,
    content: fields.content,
    createDate: formatCalendarDate(created),
    dueDate: formatCalendarDate(due),
    status: "pending",
  };
  state.append(item);
  state.statuses.set(
    item.code,
    classify(item.dueDate, item.status, context.now(), settings.remindDays, (input) =>
      state.dates.parse(input)
    )
  );

  cascadeAfterMutation(context);
  return succeeded(`Homework '${item.code}' added`);
};

const handleQuery: TaskHandler<"query"> = (params, context) => {
  const { state } = context;
  const target = state.dates.parse(params.date);
  if (!target) {
    return failed(new ValidationError(`Invalid query date '${params.date}'`));
  }

  const wanted = formatCalendarDate(target);
  const matches = state.homeworks.filter((item) => {
    const value = params.field === "due" ? item.dueDate : item.createDate;
    return state.dates.normalize(value) === wanted;
  });

  context.presenter.presentList(
    sortByUrgency(tagged(context, matches), (input) => state.dates.parse(input))
  );
  return succeeded();
};

const handleDelete: TaskHandler<"delete"> = (params, context) => {
  const codes = new Set(params.codes.map((code) => code.trim()).filter(Boolean));
  if (codes.size === 0) {
    return failed(new ValidationError("No homework selected for deletion"));
  }

  const removed = context.state.removeCodes(codes);
  cascadeAfterMutation(context);
  return succeeded(`${removed} homework deleted`);
};

const handleClearAll: TaskHandler<"clearAll"> = (_params, context) => {
  context.state.clear();
  cascadeAfterMutation(context);
  return succeeded("All homework cleared");
};

const handleMarkCompleted: TaskHandler<"markCompleted"> = (params, context) => {
  if (!context.state.markCompleted(params.code)) {
    return failed(new ValidationError(`Homework '${params.code}' not found`));
  }
  cascadeAfterMutation(context);
  return succeeded(`Homework '${params.code}' marked as completed`);
};

const handleRefresh: TaskHandler<"refresh"> = (params, context) => {
  const { state } = context;
  const now = context.now();
  if (params.recomputeStatuses) {
    state.recomputeStatuses(now);
  }

  // Tags are read here; filtering and sorting run on a private copy.
  const snapshot = state.snapshot();
  const tags = new Map<string, StatusTag>(
    snapshot.map((item) => [item.code, state.statuses.get(item.code)])
  );
  return suspend(
    async () =>
      buildDisplayList(snapshot, (code) => tags.get(code) ?? "pending", now, parseCalendarDate),
    (result) => {
      if (!result.ok) {
        return failed(
          new IoError(`Failed to build homework list: ${errorMessage(result.error)}`, {
            cause: result.error,
          })
        );
      }
      context.presenter.presentList(result.value);
      return succeeded();
    }
  );
};

const handleUpdateDerivedViews: TaskHandler<"updateDerivedViews"> = (_params, context) => {
  const { state, settings } = context;
  context.presenter.presentAggregates(
    computeDerivedViews({
      items: state.homeworks,
      tagOf: (code) => state.statuses.get(code),
      now: context.now(),
      chartDays: settings.chartDays,
      parse: (input) => state.dates.parse(input),
    })
  );
  return succeeded();
};

const handleUpdateSettings: TaskHandler<"updateSettings"> = (params, context) => {
  const parsed = SettingsPatchSchema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
      .join("; ");
    return failed(new ValidationError(`Invalid settings: ${issues}`));
  }

  const patch = parsed.data;
  if (patch.remindDays === undefined && patch.chartDays === undefined) {
    return failed(new ValidationError("No settings to update"));
  }

  const { state, settings } = context;
  state.updateSettings(patch);
  if (patch.remindDays !== undefined && patch.remindDays !== settings.remindDays) {
    state.recomputeStatuses(context.now());
  }

  cascadeAfterMutation(context);
  return succeeded("Settings updated");
};

export function createTaskHandlers(deps: TaskHandlerDeps): TaskHandlerTable {
  return {
    load: createLoadHandler(deps),
    save: createSaveHandler(deps),
    add: handleAdd,
    refresh: handleRefresh,
    updateDerivedViews: handleUpdateDerivedViews,
    query: handleQuery,
    delete: handleDelete,
    clearAll: handleClearAll,
    markCompleted: handleMarkCompleted,
    updateSettings: handleUpdateSettings,
  };
}
