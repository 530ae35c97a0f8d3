import { z } from "zod";

import { createLogger, type Logger } from "./logger";

export type CollisionMode = "corners" | "overlap";

export type TableCoreConfig = {
  logLevel: string;
  /**
   * Predicate used to reject colliding cells and to detect straddling cells in a merge.
   *
   * - `"corners"`: a corner of either box lies in the other ({@link Box.intersect})
   * - `"overlap"`: the rectangles share at least one cell ({@link Box.overlaps})
   */
  collisionMode: CollisionMode;
};

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  TABLE_CORE_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .optional()
    .default("warn"),
  TABLE_CORE_COLLISION_MODE: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["corners", "overlap"]))
    .optional()
    .default("corners")
});

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TableCoreConfig {
  const parsed = EnvSchema.parse({
    TABLE_CORE_LOG_LEVEL: env.TABLE_CORE_LOG_LEVEL || undefined,
    TABLE_CORE_COLLISION_MODE: env.TABLE_CORE_COLLISION_MODE || undefined
  });

  return {
    logLevel: parsed.TABLE_CORE_LOG_LEVEL,
    collisionMode: parsed.TABLE_CORE_COLLISION_MODE
  };
}

let cachedConfig: TableCoreConfig | null = null;
let cachedLogger: Logger | null = null;

/** Process-wide configuration, read from the environment on first use. */
export function getConfig(): TableCoreConfig {
  if (!cachedConfig) cachedConfig = loadConfigFromEnv();
  return cachedConfig;
}

export function getDefaultLogger(): Logger {
  if (!cachedLogger) cachedLogger = createLogger({ level: getConfig().logLevel });
  return cachedLogger;
}
