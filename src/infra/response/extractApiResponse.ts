import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import {
  apiErrorFromEntry,
  isRetryableKind,
  type InvalidErrorCode,
} from "../../core/entities/apiError";
import type { ClientError } from "../../core/entities/appError";
import type { TransportResponse } from "../../core/ports/outboundPorts";

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error) => error,
);

const errorEnvelopeSchema = z.object({
  errors: z.array(z.unknown()).min(1),
});

const invalidErrorCode = (
  httpStatus: number,
  invalid: InvalidErrorCode,
): ClientError => ({
  code: "invalid_error_code",
  message: invalid.message,
  httpStatus,
  invalid,
  retryable: false,
});

/**
 * Reads the first entry of a 4xx error envelope into a typed API error.
 * Every outcome is an error; the variant says whether the body could be
 * understood.
 */
const extractClientError = (response: TransportResponse): ClientError => {
  const httpStatus = response.status;
  const body = parseJson(response.body);
  if (body.isErr()) {
    return invalidErrorCode(httpStatus, {
      reason: "invalid",
      value: response.body,
      message: "Error response body was not valid JSON.",
    });
  }

  const envelope = errorEnvelopeSchema.safeParse(body.value);
  if (!envelope.success) {
    return invalidErrorCode(httpStatus, {
      reason: "invalid",
      value: body.value,
      message: "Error response did not contain an errors array.",
    });
  }

  const [entry] = envelope.data.errors;
  const apiError = apiErrorFromEntry(entry);
  if (apiError.isErr()) {
    return invalidErrorCode(httpStatus, apiError.error);
  }

  return {
    code: "api_error",
    message: `Error from API: ${apiError.value.message}`,
    httpStatus,
    apiError: apiError.value,
    retryable: isRetryableKind(apiError.value.kind),
  };
};

/**
 * Turns a raw response into the payload described by `schema`, or the reason
 * the server refused the request.
 */
export const extractApiResponse = <T>(
  response: TransportResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, ClientError> => {
  if (response.status >= 500) {
    return err({
      code: "server_error",
      message: `HTTP request failed with status ${response.status}.`,
      httpStatus: response.status,
      retryable: true,
    });
  }

  if (response.status >= 400) {
    return err(extractClientError(response));
  }

  const body = parseJson(response.body);
  if (body.isErr()) {
    return err({
      code: "malformed_response",
      message: "HTTP response body was not valid JSON.",
      httpStatus: response.status,
      retryable: false,
      cause: body.error,
    });
  }

  const payload = schema.safeParse(body.value);
  if (!payload.success) {
    return err({
      code: "malformed_response",
      message: "HTTP response body did not match the expected shape.",
      httpStatus: response.status,
      retryable: false,
      cause: payload.error.issues,
    });
  }

  return ok(payload.data);
};
