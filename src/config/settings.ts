export const DEFAULT_SNAPSHOT_SECONDS = 5;
export const DEFAULT_SHEET_NAME = "Data";
export const DEFAULT_LOG_LEVEL = "info";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ScanStatsSettings {
  snapshotSeconds: number;
  sheetName: string;
  logLevel: LogLevel;
  logPretty: boolean;
}

type Env = Record<string, string | undefined>;

function positiveIntegerFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function logLevelFromEnv(env: Env): LogLevel {
  const raw = env.SCAN_STATS_LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

function flagFromEnv(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function loadSettings(env: Env = process.env): ScanStatsSettings {
  return {
    snapshotSeconds:
      positiveIntegerFromEnv(env, "SCAN_STATS_SNAPSHOT_SECONDS") ?? DEFAULT_SNAPSHOT_SECONDS,
    sheetName: env.SCAN_STATS_SHEET?.trim() || DEFAULT_SHEET_NAME,
    logLevel: logLevelFromEnv(env),
    logPretty: flagFromEnv(env, "SCAN_STATS_LOG_PRETTY"),
  };
}
