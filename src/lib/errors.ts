// src/lib/errors.ts
import type { ApiError } from "../middleware/errorHandler";

export class AppError extends Error implements ApiError {
  statusCode: number;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

// Malformed or missing marks, IDs or request fields.
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message);
  }
}

export type DenialReason = "invalid" | "wrong-term" | "used-by-other" | "missing";

export class AccessDeniedError extends AppError {
  readonly reason: DenialReason;

  constructor(reason: DenialReason, message: string) {
    super(403, message);
    this.reason = reason;
  }
}

// Double redemption, duplicate unique keys, payments already processed.
export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
  }
}

export class GatewayError extends AppError {
  constructor(message: string, details?: unknown) {
    super(502, message, details);
  }
}
