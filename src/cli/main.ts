import { Command } from "commander";
import { ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  decodeErrorCode,
  describeErrorKind,
  errorFamilyStatus,
} from "../core/entities/apiError";
import type { ClientError } from "../core/entities/appError";
import { allScopes, scopeToWire } from "../core/entities/scope";
import { FimfictionClient } from "../application/services/fimfictionClient";
import { clientCredentials, env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const clientOptions = () => ({
  timeoutMs: env.FIMFICTION_TIMEOUT_MS,
  tokenEncoding: env.FIMFICTION_TOKEN_ENCODING,
});

/**
 * Formats a numeric upstream error code as a short terminal report.
 */
export const formatErrorCodeReport = (code: number): string => {
  const decoded = decodeErrorCode(code);
  if (decoded.isErr()) {
    return `${code}: ${decoded.error.message}`;
  }

  const kind = decoded.value;
  const lines = [
    `${code}: ${kind.family} (HTTP ${errorFamilyStatus(kind.family)})`,
  ];
  if (kind.family !== "rate_limited") {
    lines.push(`kind: ${kind.kind}`);
  }
  lines.push(`description: ${describeErrorKind(kind)}`);

  return lines.join("\n");
};

const connect = async (): Promise<Result<FimfictionClient, ClientError>> => {
  const storedToken = env.FIMFICTION_ACCESS_TOKEN.trim();
  if (storedToken) {
    return ok(FimfictionClient.fromToken(storedToken, clientOptions()));
  }

  const credentials = clientCredentials();
  if (!credentials) {
    throw new Error(
      "Set FIMFICTION_ACCESS_TOKEN, or FIMFICTION_CLIENT_ID and FIMFICTION_CLIENT_SECRET.",
    );
  }

  return FimfictionClient.fromCredentials(credentials, clientOptions());
};

const reportFailure = (error: ClientError, message: string): void => {
  logger.error({ error }, message);
  process.exitCode = 1;
};

/**
 * Defines the command surface so token, decoding and ad-hoc calls share one
 * configuration path.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("fimfic-api").description("FimFiction v2 API client CLI");

  cli
    .command("token")
    .description("Exchange configured client credentials for a bearer token")
    .action(async () => {
      const client = await connect();
      if (client.isErr()) {
        reportFailure(client.error, "Could not obtain a token");
        return;
      }

      console.log(client.value.bearerToken());
    });

  cli
    .command("explain")
    .description("Decode a numeric API error code")
    .argument("<code>", "Error code from an API error response")
    .action((code: string) => {
      console.log(formatErrorCodeReport(Number(code)));
    });

  cli
    .command("scopes")
    .description("List OAuth scope names")
    .action(() => {
      allScopes.forEach((scope) => console.log(scopeToWire(scope)));
    });

  cli
    .command("get")
    .description("Perform an authenticated GET and print the JSON response")
    .argument("<path>", "Path relative to the API base URL")
    .action(async (path: string) => {
      const client = await connect();
      if (client.isErr()) {
        reportFailure(client.error, "Could not obtain a token");
        return;
      }

      const payload = await client.value.request(
        { method: "GET", path },
        z.unknown(),
      );
      if (payload.isErr()) {
        reportFailure(payload.error, "Request failed");
        return;
      }

      console.log(JSON.stringify(payload.value, null, 2));
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  await buildCli().parseAsync(argv);
};
