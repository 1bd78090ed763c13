// src/app.ts
import express, { Express } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import helmet from "helmet";
import config from "./config/config";
import type { AppContext } from "./context";
import { errorHandler } from "./middleware/errorHandler";
import { createApiRateLimiter, sanitizeInput } from "./middleware/security";

// Routes
import authRoutes from "./routes/auth";
import adminRoutes from "./routes/admin";
import auditLogsRoutes from "./routes/auditLogs";
import academicsRoutes from "./routes/academics";
import marksRoutes from "./routes/marks";
import resultsRoutes from "./routes/results";
import pinsRoutes from "./routes/pins";
import paymentsRoutes from "./routes/payments";
import attendanceRoutes from "./routes/attendance";
import settingsRoutes from "./routes/settings";

export function buildApp(ctx: AppContext): Express {
  const app = express();

  // Security & Performance Middleware
  app.use(
    helmet({
      contentSecurityPolicy: false,
    })
  );

  app.use(
    cors({
      origin: [config.frontendUrl, "http://127.0.0.1:3000"],
      credentials: true,
    })
  );

  app.use(cookieParser());
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));
  app.use(sanitizeInput);

  // Rate limiting (per IP)
  app.use("/auth/", createApiRateLimiter());

  // Health check
  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use("/auth", authRoutes(ctx));
  app.use("/admin", adminRoutes(ctx));
  app.use("/audit-logs", auditLogsRoutes(ctx));
  app.use("/academics", academicsRoutes(ctx));
  app.use("/marks", marksRoutes(ctx));
  app.use("/results", resultsRoutes(ctx));
  app.use("/pins", pinsRoutes(ctx));
  app.use("/payments", paymentsRoutes(ctx));
  app.use("/attendance", attendanceRoutes(ctx));
  app.use("/settings", settingsRoutes(ctx));

  app.use((req, res) => {
    res.status(404).json({
      message: `Route ${req.originalUrl} not found`,
      method: req.method,
    });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
