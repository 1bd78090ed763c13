// src/routes/auth.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { setAuthCookie, clearAuthCookie } from "../lib/jwt";
import { checkPassword, hashPassword, publicUser } from "../lib/users";
import { AppError } from "../lib/errors";
import { createRequireAuth, currentUser } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { createLoginRateLimiter } from "../middleware/security";

// Credentials are coerced to strings so sanitized operator objects never reach a query
const loginBody = z
  .object({
    username: z.unknown(),
    email: z.unknown(),
    password: z.unknown(),
  })
  .transform(({ username, email, password }) => ({
    login: String(username || email || "").toLowerCase().trim(),
    password: String(password ?? ""),
  }));

const changePasswordBody = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(8, "New password must be at least 8 characters"),
});

export default function authRoutes(ctx: AppContext): Router {
  const router = Router();
  const requireAuth = createRequireAuth(ctx);
  const { users } = ctx.repos;

  // 🔑 Login
  router.post(
    "/login",
    createLoginRateLimiter(),
    asyncHandler(async (req: Request, res: Response) => {
      const { login, password } = loginBody.parse(req.body);
      if (!login || !password) throw new AppError(400, "Missing credentials");

      const user = await users.findByLogin(login);
      const isPasswordValid = await checkPassword(password, user);

      if (!user || !isPasswordValid) {
        await ctx.logAudit(req, { action: "login_failed", details: { login } });
        throw new AppError(401, "Invalid credentials");
      }

      if (user.status === "suspended") {
        throw new AppError(403, "Account suspended. Contact administration.");
      }

      setAuthCookie(res, user);

      await ctx.logAudit(req, {
        action: "login_success",
        actor: user.id,
        details: { username: user.username, role: user.role },
      });

      res.json({ message: "Login successful", user: publicUser(user) });
    })
  );

  // 👤 Current user
  router.get("/me", requireAuth, (req: Request, res: Response) => {
    res.json(currentUser(req));
  });

  // 🚪 Logout
  router.post(
    "/logout",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const actor = currentUser(req);
      clearAuthCookie(res);
      await ctx.logAudit(req, { action: "logout", actor: actor.id });
      res.json({ message: "Logged out" });
    })
  );

  // 🔒 Change password; other sessions are invalidated through the token version
  router.post(
    "/change-password",
    requireAuth,
    asyncHandler(async (req: Request, res: Response) => {
      const { currentPassword, newPassword } = changePasswordBody.parse(req.body);
      const user = await users.findById(currentUser(req).id);
      if (!user) throw new AppError(401, "User not found");

      if (!(await checkPassword(currentPassword, user))) {
        throw new AppError(400, "Current password is incorrect");
      }

      const updated = await users.update(user.id, {
        passwordHash: await hashPassword(newPassword),
        tokenVersion: user.tokenVersion + 1,
      });
      if (!updated) throw new AppError(401, "User not found");

      setAuthCookie(res, updated);
      await ctx.logAudit(req, { action: "password_changed", actor: user.id });
      res.json({ message: "Password updated" });
    })
  );

  return router;
}
