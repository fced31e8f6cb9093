import pino from "pino";
import { z } from "zod";

export const logLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Picks the configured level when pino knows it, so a typo in LOG_LEVEL falls
 * back to the NODE_ENV default instead of failing at import.
 */
export const resolveLogLevel = (
  source: Record<string, string | undefined>,
): LogLevel => {
  const configured = logLevelSchema.safeParse(source.LOG_LEVEL);
  if (configured.success) {
    return configured.data;
  }

  return source.NODE_ENV === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "fimfic-api-client",
  level: resolveLogLevel(process.env),
});
