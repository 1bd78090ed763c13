// src/middleware/auth.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import "../types/express";
import type { AuthUser } from "../types/express";
import type { Role, UserRecord } from "../repositories/types";
import type { AppContext } from "../context";
import { verifyToken, clearAuthCookie } from "../lib/jwt";
import { AppError } from "../lib/errors";

export const toAuthUser = (user: UserRecord): AuthUser => ({
  id: user.id,
  username: user.username,
  name: user.name,
  email: user.email,
  role: user.role,
  classId: user.classId,
  admissionNumber: user.admissionNumber,
});

export function createRequireAuth({ repos, logAudit }: Pick<AppContext, "repos" | "logAudit">): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const token: unknown = req.cookies?.token;

    if (typeof token !== "string" || !token) {
      await logAudit(req, { action: "unauthenticated_access", details: { path: req.originalUrl } });
      res.status(401).json({ message: "Not authenticated" });
      return;
    }

    let payload;
    try {
      payload = verifyToken(token);
    } catch (err: unknown) {
      await logAudit(req, {
        action: "token_verification_failed",
        details: { error: err instanceof Error ? err.message : String(err) },
      });
      res.status(401).json({ message: "Invalid token" });
      return;
    }

    try {
      const user = await repos.users.findById(payload.id);
      if (!user) {
        res.status(401).json({ message: "User not found" });
        return;
      }

      // Re-checked on every request so suspensions apply mid-session
      if (user.status === "suspended") {
        clearAuthCookie(res);
        res.status(403).json({ message: "Account suspended" });
        return;
      }

      if (payload.version !== user.tokenVersion) {
        clearAuthCookie(res);
        res.status(401).json({ message: "Session expired due to security update." });
        return;
      }

      req.user = toAuthUser(user);
      next();
    } catch (err) {
      next(err);
    }
  };
}

export function requireRole(...roles: Role[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = req.user;

    if (!user) {
      res.status(401).json({ message: "Not authenticated" });
      return;
    }

    if (user.role === "admin") return next();

    if (!roles.includes(user.role)) {
      res.status(403).json({ message: "Forbidden: insufficient role" });
      return;
    }

    next();
  };
}

/** The signed-in user; only valid behind requireAuth. */
export function currentUser(req: Request): AuthUser {
  if (!req.user) throw new AppError(401, "Not authenticated");
  return req.user;
}
