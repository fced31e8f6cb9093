import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { ClientError } from "../../core/entities/appError";
import type {
  ApiClientPort,
  ApiRequest,
  ClientCredentials,
} from "../../core/ports/inboundPorts";
import type { HttpTransportPort } from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { extractApiResponse } from "../../infra/response/extractApiResponse";
import { logger } from "../../shared/logger/logger";

export const API_BASE_URL = "https://www.fimfiction.net/api/v2/";
export const TOKEN_URL = "https://www.fimfiction.net/api/v2/token";

const BEARER_PREFIX = "Bearer ";

export type ClientOptions = {
  transport?: HttpTransportPort;
  timeoutMs?: number;
  /** How the token exchange body is sent; the API accepts both. */
  tokenEncoding?: "form" | "json";
};

const tokenResponseSchema = z.object({ access_token: z.string() });

const apiBase = new URL(API_BASE_URL);

const parseUrl = Result.fromThrowable(
  (path: string) => new URL(path, API_BASE_URL),
  () => undefined,
);

/**
 * Resolves a caller path against the API base and refuses anything that
 * lands outside it, so the bearer token never leaves the API origin.
 */
const resolveApiUrl = (path: string): Result<URL, ClientError> => {
  const rejected: ClientError = {
    code: "invalid_request",
    message: `Path ${path} does not resolve inside ${API_BASE_URL}.`,
    retryable: false,
  };

  const parsed = parseUrl(path.replace(/^\/+/, ""));
  if (parsed.isErr()) {
    return err(rejected);
  }

  const url = parsed.value;
  if (
    url.origin !== apiBase.origin ||
    !url.pathname.startsWith(apiBase.pathname)
  ) {
    return err(rejected);
  }

  return ok(url);
};

/**
 * Authenticated handle on the FimFiction v2 API. Holds a bearer token and a
 * transport; both are shared by clones.
 */
export class FimfictionClient implements ApiClientPort {
  private constructor(
    private readonly bearer: string,
    private readonly transport: HttpTransportPort,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Exchanges client credentials for an access token.
   */
  static async fromCredentials(
    credentials: ClientCredentials,
    options: ClientOptions = {},
  ): Promise<Result<FimfictionClient, ClientError>> {
    const transport = options.transport ?? new HttpJsonClient();
    const timeoutMs = options.timeoutMs ?? 10_000;
    const fields = {
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      grant_type: "client_credentials",
    };

    const response = await transport.send({
      url: TOKEN_URL,
      method: "POST",
      body:
        options.tokenEncoding === "json"
          ? { kind: "json", value: fields }
          : { kind: "form", fields },
      timeoutMs,
    });
    if (response.isErr()) {
      return err(response.error);
    }

    const payload = extractApiResponse(response.value, z.unknown());
    if (payload.isErr()) {
      logger.debug(
        { clientId: credentials.clientId, code: payload.error.code },
        "Token exchange rejected",
      );
      return err(payload.error);
    }

    const token = tokenResponseSchema.safeParse(payload.value);
    if (!token.success) {
      return err({
        code: "protocol_violation",
        message: "Token response did not contain a string access_token.",
        httpStatus: response.value.status,
        retryable: false,
        cause: payload.value,
      });
    }

    logger.debug({ clientId: credentials.clientId }, "Obtained access token");
    return ok(
      new FimfictionClient(
        `${BEARER_PREFIX}${token.data.access_token}`,
        transport,
        timeoutMs,
      ),
    );
  }

  /**
   * Wraps a previously obtained token without contacting the API. An invalid
   * token only shows up as a forbidden/invalid_token error on the first call.
   */
  static fromToken(token: string, options: ClientOptions = {}): FimfictionClient {
    const bearer = token.startsWith(BEARER_PREFIX)
      ? token
      : `${BEARER_PREFIX}${token}`;

    return new FimfictionClient(
      bearer,
      options.transport ?? new HttpJsonClient(),
      options.timeoutMs ?? 10_000,
    );
  }

  /**
   * Exposes the `Bearer <token>` value so callers can persist it and skip the
   * exchange next time.
   */
  bearerToken(): string {
    return this.bearer;
  }

  /**
   * Shares token and transport so concurrent callers reuse one connection pool.
   */
  clone(): FimfictionClient {
    return new FimfictionClient(this.bearer, this.transport, this.timeoutMs);
  }

  /**
   * Sends an authenticated call relative to the API base and decodes the
   * payload with `schema`, keeping API rejections as typed errors.
   */
  async request<T>(
    request: ApiRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, ClientError>> {
    const resolved = resolveApiUrl(request.path);
    if (resolved.isErr()) {
      logger.debug({ path: request.path }, "Rejected request outside the API");
      return err(resolved.error);
    }

    const url = resolved.value;
    Object.entries(request.query ?? {}).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });

    const response = await this.transport.send({
      url: url.toString(),
      method: request.method,
      headers: { Authorization: this.bearer },
      body:
        request.body === undefined
          ? undefined
          : { kind: "json", value: request.body },
      timeoutMs: this.timeoutMs,
    });

    const payload = response.andThen((value) =>
      extractApiResponse(value, schema),
    );
    if (payload.isErr()) {
      logger.debug(
        {
          method: request.method,
          path: url.pathname,
          code: payload.error.code,
        },
        "API request failed",
      );
    }

    return payload;
  }
}
