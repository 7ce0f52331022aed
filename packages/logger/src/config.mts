import { z } from "zod";

import type { LevelWithSilent } from "pino";

/**
 * Environment variables read by the logger.
 */
export const loggerConfigSchema = z.object({
  BLOCKWISE_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  BLOCKWISE_LOG_NAME: z.string().trim().min(1).default("blockwise"),
});

export interface LoggerConfig {
  level: LevelWithSilent;
  name: string;
}

/**
 * Reads logger settings from an environment record.
 * Throws TypeError listing every invalid variable.
 */
export const resolveLoggerConfig = (
  env: Record<string, string | undefined> = process.env,
): LoggerConfig => {
  const parsed = loggerConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new TypeError(`[logger] invalid configuration: ${issues}`);
  }
  return {
    level: parsed.data.BLOCKWISE_LOG_LEVEL,
    name: parsed.data.BLOCKWISE_LOG_NAME,
  };
};
