import "dotenv/config";
import { z } from "zod";
import type { ClientCredentials } from "../../core/ports/inboundPorts";
import { logLevelSchema } from "../logger/logger";

const supportedTokenEncodings = ["form", "json"] as const;

export type TokenEncoding = (typeof supportedTokenEncodings)[number];

export const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: logLevelSchema.optional(),
  FIMFICTION_CLIENT_ID: z.string().default(""),
  FIMFICTION_CLIENT_SECRET: z.string().default(""),
  // A stored token skips the client-credentials exchange.
  FIMFICTION_ACCESS_TOKEN: z.string().default(""),
  FIMFICTION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FIMFICTION_TOKEN_ENCODING: z.enum(supportedTokenEncodings).default("form"),
});

export type AppEnv = z.infer<typeof envSchema>;

export const env: AppEnv = envSchema.parse(process.env);

/**
 * Returns configured client credentials, or null when either half is missing.
 */
export const clientCredentials = (
  appEnv: AppEnv = env,
): ClientCredentials | null => {
  const clientId = appEnv.FIMFICTION_CLIENT_ID.trim();
  const clientSecret = appEnv.FIMFICTION_CLIENT_SECRET.trim();

  if (!clientId || !clientSecret) {
    return null;
  }

  return { clientId, clientSecret };
};
