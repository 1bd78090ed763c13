// lib/auditLogger.ts
import { Request } from "express";
import type { AuditLogRepository } from "../repositories/types";

export interface AuditInput {
  action: string;
  actor?: string;
  targetUser?: string;
  details?: Record<string, unknown>;
}

export type AuditLogger = (req: Request, input: AuditInput) => Promise<void>;

/** Audit writes never fail the request; failures are only logged. */
export function createAuditLogger(auditLogs: AuditLogRepository): AuditLogger {
  return async (req, { action, actor, targetUser, details = {} }) => {
    const forwarded = req.headers["x-forwarded-for"];
    const ip = (Array.isArray(forwarded) ? forwarded[0] : forwarded) || req.socket.remoteAddress || req.ip;

    const actorId = actor || req.user?.id;
    try {
      await auditLogs.create({
        action,
        actor: actorId,
        targetUser: targetUser || actorId,
        details,
        ip,
        userAgent: req.headers["user-agent"],
      });
    } catch (err) {
      console.error("Audit log failed:", err);
    }
  };
}
