/**
 * Configuration management for worklog-reports
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import type { ReportConfig, ReportIdentity } from "../types.ts";
import { ConfigError } from "../utils/errors.ts";
import { createLogger, formatError } from "../utils/logger.ts";
import {
  isValidTimeZone,
  offsetSecondsAt,
  resolveTimeZone,
  systemTimeZone,
} from "../utils/time.ts";

const log = createLogger({ scope: "config" });

/** Environment variable naming the config file */
export const CONFIG_ENV = "WORKLOG_CONFIG";

const DEFAULT_CONFIG_FILE = join(process.cwd(), "data", "report-config.json");

/** Largest UTC offset any zone uses, in seconds */
const MAX_OFFSET_SECONDS = 18 * 3600;

/** Default configuration */
export const DEFAULT_CONFIG: ReportConfig = {
  timeZone: systemTimeZone(),
  includeTitles: true,
  hourGroupBy: "app",
  periodGroupBy: "app",
  tzOffsetSeconds: null,
  machineId: "",
  username: "",
  uid: 0,
};

const groupBy = z.enum(["app", "tag", "appWindow"]);

/** Shape of the config file; every key is optional */
const ConfigFileSchema = z
  .object({
    timeZone: z.string(),
    includeTitles: z.boolean(),
    hourGroupBy: groupBy,
    periodGroupBy: groupBy,
    tzOffsetSeconds: z.number().nullable(),
    machineId: z.string(),
    username: z.string(),
    uid: z.number(),
  })
  .partial();

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Path of the config file: WORKLOG_CONFIG, else ./data/report-config.json
 */
export function configFilePath(): string {
  return process.env[CONFIG_ENV] ?? DEFAULT_CONFIG_FILE;
}

/**
 * Load configuration from file or return defaults
 */
export async function loadConfig(
  path: string = configFilePath()
): Promise<ReportConfig> {
  try {
    const raw = await readFile(path, "utf8");
    const parsed = ConfigFileSchema.safeParse(JSON.parse(raw));

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      log.error(`Invalid config in ${path}, using defaults: ${issues}`);
      return { ...DEFAULT_CONFIG };
    }

    const config: ReportConfig = { ...DEFAULT_CONFIG, ...parsed.data };
    const problems = validateConfig(config);
    if (problems.length > 0) {
      log.error(`Invalid config in ${path}, using defaults: ${problems.join("; ")}`);
      return { ...DEFAULT_CONFIG };
    }

    log.debug(`Loaded config from ${path}`);
    return config;
  } catch (error) {
    if (isMissingFile(error)) {
      log.debug(`No config at ${path}, using defaults`);
    } else {
      log.error(`Error loading config, using defaults: ${formatError(error)}`);
    }
  }
  return { ...DEFAULT_CONFIG };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Partial<ReportConfig>): string[] {
  const errors: string[] = [];

  if (config.timeZone !== undefined && !isValidTimeZone(config.timeZone)) {
    errors.push(`Unknown time zone "${config.timeZone}"`);
  }

  if (
    config.tzOffsetSeconds !== undefined &&
    config.tzOffsetSeconds !== null &&
    (!Number.isInteger(config.tzOffsetSeconds / 60) ||
      Math.abs(config.tzOffsetSeconds) > MAX_OFFSET_SECONDS)
  ) {
    errors.push("Time zone offset must be whole minutes within ±18 hours");
  }

  if (
    config.uid !== undefined &&
    (!Number.isInteger(config.uid) || config.uid < 0)
  ) {
    errors.push("uid must be a non-negative integer");
  }

  return errors;
}

/**
 * Throw a ConfigError listing every problem, if any
 */
export function assertValidConfig(config: Partial<ReportConfig>): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

/**
 * Defaults with overrides applied, validated
 */
export function resolveConfig(
  overrides: Partial<ReportConfig> = {}
): ReportConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  assertValidConfig(config);
  return config;
}

/**
 * Offset for local CSV timestamps: the configured one, or the zone's offset
 * at the given instant
 */
export function resolveTzOffsetSeconds(
  config: ReportConfig,
  atUs: number
): number {
  if (config.tzOffsetSeconds !== null) {
    return config.tzOffsetSeconds;
  }
  return offsetSecondsAt(resolveTimeZone(config.timeZone), atUs);
}

export function identityFromConfig(config: ReportConfig): ReportIdentity {
  return {
    machineId: config.machineId,
    username: config.username,
    uid: config.uid,
  };
}
