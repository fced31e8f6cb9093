export {
  API_BASE_URL,
  FimfictionClient,
  TOKEN_URL,
  type ClientOptions,
} from "./application/services/fimfictionClient";
export {
  apiErrorFromEntry,
  decodeErrorCode,
  describeErrorKind,
  errorFamilyStatus,
  isRetryableKind,
  jsonValueSchema,
  type ApiError,
  type ApiErrorKind,
  type ErrorFamily,
  type ForbiddenKind,
  type InvalidErrorCode,
  type JsonValue,
  type MalformedKind,
  type NotFoundKind,
  type UnprocessableKind,
} from "./core/entities/apiError";
export {
  isTransportFailure,
  type ClientError,
  type ClientErrorCode,
} from "./core/entities/appError";
export {
  allScopes,
  parseScopeList,
  scopeFromWire,
  scopeToWire,
  type ParseScopeError,
  type Scope,
} from "./core/entities/scope";
export type {
  ApiClientPort,
  ApiRequest,
  ClientCredentials,
} from "./core/ports/inboundPorts";
export type {
  HttpMethod,
  HttpTransportPort,
  TransportBody,
  TransportRequest,
  TransportResponse,
} from "./core/ports/outboundPorts";
export { HttpJsonClient } from "./infra/http/httpJsonClient";
export { extractApiResponse } from "./infra/response/extractApiResponse";
