import { err, ok, type Result } from "neverthrow";
import type { ClientError } from "../../core/entities/appError";
import type {
  HttpTransportPort,
  TransportBody,
  TransportRequest,
  TransportResponse,
} from "../../core/ports/outboundPorts";

const encodeBody = (
  body: TransportBody | undefined,
): { contentType?: string; payload?: string } => {
  if (!body) {
    return {};
  }

  if (body.kind === "form") {
    return {
      contentType: "application/x-www-form-urlencoded",
      payload: new URLSearchParams(body.fields).toString(),
    };
  }

  return {
    contentType: "application/json",
    payload: JSON.stringify(body.value),
  };
};

/**
 * Default transport over the global fetch: one attempt per call, bounded by
 * the request timeout. Status handling is left to the response pipeline.
 */
export class HttpJsonClient implements HttpTransportPort {
  async send(
    request: TransportRequest,
  ): Promise<Result<TransportResponse, ClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const { contentType, payload } = encodeBody(request.body);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: {
          Accept: "application/json",
          ...(contentType ? { "Content-Type": contentType } : {}),
          ...request.headers,
        },
        body: payload,
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return ok({
        status: response.status,
        statusText: response.statusText,
        headers,
        body: await response.text(),
      });
    } catch (error) {
      const isTimeoutError =
        error instanceof Error && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
