import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const malformedKinds = ["body", "include"] as const;

const forbiddenKinds = [
  "invalid_permission",
  "missing_scope",
  "invalid_token",
] as const;

const notFoundKinds = [
  "resource_not_found",
  "invalid_application",
  "endpoint_missing",
] as const;

const unprocessableKinds = [
  "missing_parameter",
  "invalid_argument",
  "incorrect_secret",
  "invalid_grant_type",
  "missing_auth_header",
  "invalid_attributes",
  "unsupported_attribute",
  "invalid_filter",
  "invalid_pagination",
  "malformed_auth_header",
  "invalid_attribute",
  "invalid_sort_field",
  "malformed_sort_field",
] as const;

export type MalformedKind = (typeof malformedKinds)[number];
export type ForbiddenKind = (typeof forbiddenKinds)[number];
export type NotFoundKind = (typeof notFoundKinds)[number];
export type UnprocessableKind = (typeof unprocessableKinds)[number];

export type ErrorFamily =
  | "malformed"
  | "forbidden"
  | "not_found"
  | "unprocessable"
  | "rate_limited";

/**
 * Decoded cause of an API rejection: the family matches the HTTP status the
 * upstream uses for it, the kind is the specific reason within that family.
 */
export type ApiErrorKind =
  | { family: "malformed"; kind: MalformedKind }
  | { family: "forbidden"; kind: ForbiddenKind }
  | { family: "not_found"; kind: NotFoundKind }
  | { family: "unprocessable"; kind: UnprocessableKind }
  | { family: "rate_limited" };

export type InvalidErrorCode =
  | { reason: "bad_code"; code: number; message: string }
  | { reason: "invalid"; value: unknown; message: string };

export type ApiError = {
  kind: ApiErrorKind;
  code: number;
  meta: JsonValue;
  message: string;
};

const familyStatuses: Record<ErrorFamily, number> = {
  malformed: 400,
  forbidden: 403,
  not_found: 404,
  unprocessable: 422,
  rate_limited: 429,
};

const kindDescriptions: Record<
  MalformedKind | ForbiddenKind | NotFoundKind | UnprocessableKind,
  string
> = {
  body: "The body of the request was not valid JSON.",
  include: "The requested included resource was not valid.",
  invalid_permission:
    "The authenticated user is not allowed to perform that action.",
  missing_scope: "The token is missing the scope required for that action.",
  invalid_token: "The token used for the request was not valid.",
  resource_not_found: "The requested resource was not found.",
  invalid_application: "The requested application does not exist.",
  endpoint_missing: "The requested endpoint does not exist.",
  missing_parameter: "A parameter required for the request was not present.",
  invalid_argument: "An argument was invalid.",
  incorrect_secret: "The secret submitted for the token exchange was incorrect.",
  invalid_grant_type:
    "The grant type submitted for the token exchange is not permitted.",
  missing_auth_header: "The Authorization header was missing.",
  invalid_attributes:
    "Some or all of the submitted attributes of a PATCH/POST request were not valid.",
  unsupported_attribute: "One of the submitted attributes is not supported.",
  invalid_filter: "The provided filter is not supported.",
  invalid_pagination: "One or more of the pagination properties was not valid.",
  malformed_auth_header:
    "The Authorization header was malformed; expected `Bearer <token>`.",
  invalid_attribute:
    "One or more of the attributes of a PATCH/POST request was not valid.",
  invalid_sort_field: "The provided sort field is not valid.",
  malformed_sort_field: "The provided sort field was malformed.",
};

// Unprocessable codes switch from family*10+i to family*100+i at this size.
const LARGE_CODE_THRESHOLD = 10_000;

/**
 * Gives the HTTP status the upstream answers with for a family, so callers can
 * cross-check it against the response they received.
 */
export const errorFamilyStatus = (family: ErrorFamily): number =>
  familyStatuses[family];

/**
 * Produces a human-readable cause for logs and CLI reports.
 */
export const describeErrorKind = (kind: ApiErrorKind): string =>
  kind.family === "rate_limited"
    ? "You are being rate limited."
    : kindDescriptions[kind.kind];

/**
 * Only rate limiting is worth retrying unchanged; every other rejection needs
 * a different request or different credentials.
 */
export const isRetryableKind = (kind: ApiErrorKind): boolean =>
  kind.family === "rate_limited";

const badCode = (code: number): InvalidErrorCode => ({
  reason: "bad_code",
  code,
  message: `Invalid error code: ${code}`,
});

const lookup = <K extends string>(
  kinds: readonly K[],
  index: number,
): K | undefined => kinds[index];

const decodeUnprocessable = (
  code: number,
  index: number,
): Result<ApiErrorKind, InvalidErrorCode> => {
  const kind = lookup(unprocessableKinds, index);
  return kind ? ok({ family: "unprocessable", kind }) : err(badCode(code));
};

/**
 * Maps an upstream numeric error code to its family and kind.
 *
 * 400, 403, 404 and 429 codes are `status * 10 + index` (malformed indexes
 * start at 1). 422 codes use the same shape below 10000 and
 * `422 * 100 + index` from 10000 up; both forms are in use upstream.
 */
export const decodeErrorCode = (
  code: number,
): Result<ApiErrorKind, InvalidErrorCode> => {
  if (!Number.isSafeInteger(code) || code < 0) {
    return err(badCode(code));
  }

  const index = code % 10;

  switch (Math.floor(code / 10)) {
    case 400: {
      const kind = lookup(malformedKinds, index - 1);
      return kind ? ok({ family: "malformed", kind }) : err(badCode(code));
    }
    case 403: {
      const kind = lookup(forbiddenKinds, index);
      return kind ? ok({ family: "forbidden", kind }) : err(badCode(code));
    }
    case 404: {
      const kind = lookup(notFoundKinds, index);
      return kind ? ok({ family: "not_found", kind }) : err(badCode(code));
    }
    case 422:
      return decodeUnprocessable(code, index);
    case 429:
      return ok({ family: "rate_limited" });
  }

  if (code >= LARGE_CODE_THRESHOLD && Math.floor(code / 100) === 422) {
    return decodeUnprocessable(code, code % 100);
  }

  return err(badCode(code));
};

const envelopeEntrySchema = z.object({
  code: z.number().int().nonnegative(),
  meta: jsonValueSchema.optional(),
});

/**
 * Builds an ApiError from one element of an error envelope's `errors` array.
 */
export const apiErrorFromEntry = (
  value: unknown,
): Result<ApiError, InvalidErrorCode> => {
  const parsed = envelopeEntrySchema.safeParse(value);
  if (!parsed.success) {
    return err({
      reason: "invalid",
      value,
      message: "Could not read an error code from the received value.",
    });
  }

  const { code, meta } = parsed.data;
  return decodeErrorCode(code).map((kind) => ({
    kind,
    code,
    meta: meta ?? null,
    message: describeErrorKind(kind),
  }));
};
