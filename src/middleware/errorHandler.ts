// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import { MulterError } from "multer";
import { ZodError } from "zod";
import { AccessDeniedError } from "../lib/errors";

export interface ApiError extends Error {
  statusCode?: number;
  details?: unknown;
}

const isApiError = (err: unknown): err is ApiError => err instanceof Error;

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ZodError) {
    res.status(400).json({ success: false, message: "Invalid request", details: err.issues });
    return;
  }

  if (err instanceof MulterError) {
    res.status(400).json({ success: false, message: err.message });
    return;
  }

  const apiErr: ApiError = isApiError(err) ? err : new Error(String(err));
  const status = apiErr.statusCode || 500;

  if (status >= 500) {
    console.error(`[ERROR] ${req.method} ${req.url}`, err);
  } else {
    console.warn(`[${status}] ${req.method} ${req.url}: ${apiErr.message}`);
  }

  res.status(status).json({
    success: false,
    message: status >= 500 && !apiErr.statusCode ? "Internal Server Error" : apiErr.message,
    ...(apiErr.details !== undefined ? { details: apiErr.details } : {}),
    ...(err instanceof AccessDeniedError ? { reason: err.reason } : {}),
  });
}
