import type { APIGatewayProxyStructuredResultV2 } from "aws-lambda";
import { isApiError, errorMessage, type ErrorCode } from "./errors";

export type ApiResponse = APIGatewayProxyStructuredResultV2 & {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

const baseHeaders = {
  "content-type": "application/json",
  "access-control-allow-origin": "*",
  "access-control-allow-methods": "GET,POST,PUT,DELETE,OPTIONS",
  "access-control-allow-headers": "authorization,content-type,x-file-name",
  "access-control-expose-headers": "content-disposition,x-export-truncated",
};

const CODE_LABEL: Record<ErrorCode, string> = {
  NotFound: "not_found",
  InvalidQuantity: "invalid_quantity",
  InsufficientStock: "insufficient_stock",
  Denied: "forbidden",
  RowRejected: "row_rejected",
  Conflict: "conflict",
  DuplicateName: "duplicate_name",
  ValidationError: "validation_error",
  Unauthorized: "unauthorized",
  InternalError: "internal_error",
};

const respond = (statusCode: number, body: unknown): ApiResponse => ({
  statusCode,
  headers: baseHeaders,
  body: typeof body === "string" ? body : JSON.stringify(body),
});

// Inject requestId into error payloads when provided
const withRequestId = <T extends Record<string, unknown>>(body: T, requestId?: string) =>
  requestId ? { ...body, requestId } : body;

export const ok = (data: unknown, status = 200) => respond(status, data);
export const created = (data: unknown) => respond(201, data);

// CORS preflight (OPTIONS)
export const preflight = (): ApiResponse => ({
  statusCode: 204,
  headers: { ...baseHeaders, "access-control-max-age": "86400" },
  body: "",
});

/** Binary download (API Gateway expects base64 with isBase64Encoded). */
export const file = (content: Buffer, contentType: string, fileName: string, headers: Record<string, string> = {}): ApiResponse => ({
  statusCode: 200,
  headers: {
    ...baseHeaders,
    "content-type": contentType,
    "content-disposition": `attachment; filename="${fileName}"`,
    ...headers,
  },
  body: content.toString("base64"),
  isBase64Encoded: true,
});

export function errorBody(code: ErrorCode, message: string, details?: Record<string, unknown>, requestId?: string) {
  return withRequestId(
    {
      code: CODE_LABEL[code],
      error: code,
      message,
      ...(details && { details }),
    },
    requestId
  );
}

export const notFoundRoute = (route: string, requestId?: string) =>
  respond(404, errorBody("NotFound", `Unsupported route ${route}`, undefined, requestId));

export const methodNotAllowed = (requestId?: string) =>
  respond(405, withRequestId({ code: "method_not_allowed", error: "MethodNotAllowed", message: "Method Not Allowed" }, requestId));

/** ApiError → its status and envelope; anything else → 500. */
export function fromError(err: unknown, requestId?: string): ApiResponse {
  if (isApiError(err)) {
    return respond(err.statusCode, errorBody(err.code, err.message, err.details, requestId));
  }
  return respond(500, errorBody("InternalError", errorMessage(err), undefined, requestId));
}
