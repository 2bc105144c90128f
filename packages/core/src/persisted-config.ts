import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
export const LogFormatSchema = z.enum(["pretty", "json"]);

const LogConfigSchema = z
  .object({
    level: LogLevelSchema.optional(),
    format: LogFormatSchema.optional(),
  })
  .strict();

const PositiveInt = z.number().int().positive();

export const PersistedConfigSchema = z
  .object({
    version: z.literal(1).optional(),

    document: z
      .object({
        path: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    scheduler: z
      .object({
        tickIntervalMs: PositiveInt.optional(),
        statusRefreshIntervalMs: PositiveInt.optional(),
        statusCheckIntervalMs: PositiveInt.optional(),
      })
      .strict()
      .optional(),

    pipeline: z
      .object({
        batchSize: PositiveInt.optional(),
        channelCapacity: PositiveInt.optional(),
        eagerBatches: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),

    dates: z
      .object({
        cacheCapacity: PositiveInt.optional(),
      })
      .strict()
      .optional(),

    log: LogConfigSchema.optional(),
  })
  .strict();

export type PersistedConfig = z.infer<typeof PersistedConfigSchema>;

const CONFIG_FILENAME = "config.json";
const DEFAULT_PERSISTED_CONFIG: PersistedConfig = PersistedConfigSchema.parse({ version: 1 });

function getConfigPath(deskHome: string): string {
  return path.join(deskHome, CONFIG_FILENAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function loadPersistedConfig(deskHome: string, logger?: Logger): PersistedConfig {
  const log = logger?.child({ module: "config" });
  const configPath = getConfigPath(deskHome);

  if (!existsSync(configPath)) {
    try {
      mkdirSync(path.dirname(configPath), { recursive: true });
      writeFileSync(configPath, JSON.stringify(DEFAULT_PERSISTED_CONFIG, null, 2) + "\n");
      log?.info(`Initialized config file at ${configPath}`);
    } catch (err) {
      throw new Error(`[Config] Failed to initialize ${configPath}: ${messageOf(err)}`);
    }
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new Error(`[Config] Failed to read ${configPath}: ${messageOf(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`[Config] Invalid JSON in ${configPath}: ${messageOf(err)}`);
  }

  const result = PersistedConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`[Config] Invalid config in ${configPath}:\n${formatIssues(result.error)}`);
  }

  log?.debug(`Loaded from ${configPath}`);
  return result.data;
}

export function savePersistedConfig(
  deskHome: string,
  config: PersistedConfig,
  logger?: Logger
): void {
  const log = logger?.child({ module: "config" });
  const configPath = getConfigPath(deskHome);

  const result = PersistedConfigSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`[Config] Invalid config to save:\n${formatIssues(result.error)}`);
  }

  try {
    mkdirSync(deskHome, { recursive: true });
    writeFileSync(configPath, JSON.stringify(result.data, null, 2) + "\n");
    log?.info(`Saved to ${configPath}`);
  } catch (err) {
    throw new Error(`[Config] Failed to write ${configPath}: ${messageOf(err)}`);
  }
}
