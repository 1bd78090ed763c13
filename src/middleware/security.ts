import rateLimit from "express-rate-limit";
import sanitize from "mongo-sanitize";
import { Request, Response, NextFunction } from "express";

// Built per app so each instance keeps its own counters
export const createLoginRateLimiter = () =>
  rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 5, // 5 attempts per IP
    message: {
      message: "Too many attempts. Access locked for 15m.",
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

export const createApiRateLimiter = () =>
  rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    standardHeaders: true,
    legacyHeaders: false,
    message: { message: "Too many requests from this IP. Please try again later." },
  });

export const createUploadRateLimiter = () => rateLimit({ windowMs: 60 * 60 * 1000, max: 50 }); // 50 uploads/hour

// Strips $-prefixed keys so request input cannot smuggle query operators
export const sanitizeInput = (req: Request, res: Response, next: NextFunction) => {
  if (req.body) {
    req.body = sanitize(req.body);
  }

  // Query and params are cleaned key by key; the objects themselves are getters
  Object.keys(req.query).forEach((key) => {
    req.query[key] = sanitize(req.query[key]);
  });

  Object.keys(req.params).forEach((key) => {
    req.params[key] = sanitize(req.params[key]);
  });

  next();
};
