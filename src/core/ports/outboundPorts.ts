import type { Result } from "neverthrow";
import type { ClientError } from "../entities/appError";

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

export type TransportBody =
  | { kind: "json"; value: unknown }
  | { kind: "form"; fields: Record<string, string> };

export type TransportRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: TransportBody;
  timeoutMs: number;
};

/**
 * A fully read HTTP response. The body is consumed once by the transport and
 * handed over as text.
 */
export type TransportResponse = {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
};

export interface HttpTransportPort {
  send(
    request: TransportRequest,
  ): Promise<Result<TransportResponse, ClientError>>;
}
