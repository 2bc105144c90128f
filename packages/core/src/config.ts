import os from "node:os";
import path from "node:path";

import { DEFAULT_DATE_CACHE_CAPACITY } from "./homework/dates.js";
import type { PersistedConfig } from "./persisted-config.js";
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CHANNEL_CAPACITY,
  DEFAULT_EAGER_BATCHES,
} from "./pipeline/load-pipeline.js";
import { DEFAULT_TICK_INTERVAL_MS } from "./queue/coordinator.js";
import {
  DEFAULT_STATUS_CHECK_INTERVAL_MS,
  DEFAULT_STATUS_REFRESH_INTERVAL_MS,
} from "./queue/status-refresh-timer.js";

export const DEFAULT_DOCUMENT_FILENAME = "homework_data.json";

type Env = Record<string, string | undefined>;

export interface DeskConfig {
  home: string;
  documentPath: string;
  tickIntervalMs: number;
  statusRefreshIntervalMs: number;
  statusCheckIntervalMs: number;
  batchSize: number;
  channelCapacity: number;
  eagerBatches: number;
  dateCacheCapacity: number;
}

export function expandHomeDir(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  if (input === "~") {
    return os.homedir();
  }
  return input;
}

export function resolveDeskHome(env: Env = process.env): string {
  const raw = env.DUEDESK_HOME ?? "~/.duedesk";
  return path.resolve(expandHomeDir(raw));
}

function parsePositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Env overrides config.json, which overrides the built-in defaults. A relative
 * document path in config.json is taken relative to the desk home.
 */
export function resolveDeskConfig(
  home: string,
  persisted: PersistedConfig | undefined,
  env: Env = process.env
): DeskConfig {
  const configuredDocument = env.DUEDESK_DOCUMENT ?? persisted?.document?.path;
  const documentPath = configuredDocument
    ? path.resolve(home, expandHomeDir(configuredDocument))
    : path.join(home, DEFAULT_DOCUMENT_FILENAME);

  return {
    home,
    documentPath,
    tickIntervalMs:
      parsePositiveInt(env.DUEDESK_TICK_MS) ??
      persisted?.scheduler?.tickIntervalMs ??
      DEFAULT_TICK_INTERVAL_MS,
    statusRefreshIntervalMs:
      persisted?.scheduler?.statusRefreshIntervalMs ?? DEFAULT_STATUS_REFRESH_INTERVAL_MS,
    statusCheckIntervalMs:
      persisted?.scheduler?.statusCheckIntervalMs ?? DEFAULT_STATUS_CHECK_INTERVAL_MS,
    batchSize: persisted?.pipeline?.batchSize ?? DEFAULT_BATCH_SIZE,
    channelCapacity: persisted?.pipeline?.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY,
    eagerBatches: persisted?.pipeline?.eagerBatches ?? DEFAULT_EAGER_BATCHES,
    dateCacheCapacity: persisted?.dates?.cacheCapacity ?? DEFAULT_DATE_CACHE_CAPACITY,
  };
}
