// apps/api/src/common/errors.ts

export type ErrorCode =
  | "NotFound"
  | "InvalidQuantity"
  | "InsufficientStock"
  | "Denied"
  | "RowRejected"
  | "Conflict"
  | "DuplicateName"
  | "ValidationError"
  | "Unauthorized"
  | "InternalError";

/** Error carrying its HTTP status; the router turns it into a JSON envelope. */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(statusCode: number, code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

export const notFound = (what: string, id?: string) =>
  new ApiError(404, "NotFound", id ? `${what} not found: ${id}` : `${what} not found`, id ? { id } : undefined);

export const invalidQuantity = (message: string, details?: Record<string, unknown>) =>
  new ApiError(400, "InvalidQuantity", message, details);

export const insufficientStock = (available: number, requested: number, unit: string) =>
  new ApiError(409, "InsufficientStock", `Not enough stock. Available: ${available} ${unit}`, {
    available,
    requested,
    unit,
  });

export const denied = (role: string, operation: string) =>
  new ApiError(403, "Denied", `Role ${role} may not ${operation}`, { role, operation });

export const conflict = (message: string, details?: Record<string, unknown>) =>
  new ApiError(409, "Conflict", message, details);

export const duplicateName = (name: string) =>
  new ApiError(409, "DuplicateName", `An item named "${name}" already exists`, { name });

export const validationError = (message: string, details?: Record<string, unknown>) =>
  new ApiError(400, "ValidationError", message, details);

export const unauthorized = (message = "Unauthorized") => new ApiError(401, "Unauthorized", message);

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : "Internal error";
}
