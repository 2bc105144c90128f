import pino from "pino";

import { LogFormatSchema, LogLevelSchema, type PersistedConfig } from "./persisted-config.js";

export type LogLevel = pino.LevelWithSilent;
export type LogFormat = "pretty" | "json";

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

type Env = Record<string, string | undefined>;

export function resolveLogConfig(
  persistedConfig: PersistedConfig | undefined,
  env: Env = process.env
): ResolvedLogConfig {
  // Unrecognised env values fall through to config.json.
  const envLevel = LogLevelSchema.safeParse(env.DUEDESK_LOG);
  const envFormat = LogFormatSchema.safeParse(env.DUEDESK_LOG_FORMAT);

  const level: LogLevel =
    (envLevel.success ? envLevel.data : undefined) ?? persistedConfig?.log?.level ?? "info";
  const format: LogFormat =
    (envFormat.success ? envFormat.data : undefined) ?? persistedConfig?.log?.format ?? "pretty";

  return { level, format };
}

export function createRootLogger(
  persistedConfig: PersistedConfig | undefined,
  env: Env = process.env
): pino.Logger {
  const config = resolveLogConfig(persistedConfig, env);

  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
            destination: 2,
          },
        }
      : undefined;

  // Logs go to stderr; stdout belongs to command output.
  return transport
    ? pino({ level: config.level, transport })
    : pino({ level: config.level }, pino.destination(2));
}
