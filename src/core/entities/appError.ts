import type { ApiError, InvalidErrorCode } from "./apiError";

/**
 * Describes every way a client call can fail, from the socket up to the
 * decoded API rejection.
 */
export type ClientError =
  | {
      code: "timeout" | "transport_error";
      message: string;
      retryable: boolean;
      cause?: unknown;
    }
  | {
      code: "invalid_request";
      message: string;
      retryable: boolean;
    }
  | {
      code: "server_error";
      message: string;
      httpStatus: number;
      retryable: boolean;
    }
  | {
      code: "api_error";
      message: string;
      httpStatus: number;
      apiError: ApiError;
      retryable: boolean;
    }
  | {
      code: "invalid_error_code";
      message: string;
      httpStatus: number;
      invalid: InvalidErrorCode;
      retryable: boolean;
    }
  | {
      code: "malformed_response" | "protocol_violation";
      message: string;
      httpStatus: number;
      retryable: boolean;
      cause?: unknown;
    };

export type ClientErrorCode = ClientError["code"];

/**
 * Failures below the API's own error contract: the request never produced a
 * response, or the server answered with a 5xx.
 */
export const isTransportFailure = (error: ClientError): boolean =>
  error.code === "timeout" ||
  error.code === "transport_error" ||
  error.code === "server_error";
