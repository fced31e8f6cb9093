import type { Result } from "neverthrow";
import type { z } from "zod";
import type { ClientError } from "../entities/appError";
import type { HttpMethod } from "./outboundPorts";

export type ClientCredentials = {
  clientId: string;
  clientSecret: string;
};

export type ApiRequest = {
  method: HttpMethod;
  /** Path relative to the API base URL, e.g. `stories/123`. */
  path: string;
  query?: Record<string, string>;
  body?: unknown;
};

export interface ApiClientPort {
  /** `Bearer <token>`, ready to be persisted and handed back later. */
  bearerToken(): string;
  request<T>(
    request: ApiRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, ClientError>>;
}
