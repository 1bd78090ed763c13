// src/routes/admin.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { ROLES } from "../repositories/types";
import { AppError, ConflictError, NotFoundError } from "../lib/errors";
import { hashPassword, publicUser } from "../lib/users";
import { createRequireAuth, currentUser, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";

const createUserBody = z.object({
  username: z.string().trim().toLowerCase().min(3),
  password: z.string().min(8),
  name: z.string().trim().min(1),
  email: z.string().trim().toLowerCase().email().optional(),
  role: z.enum(ROLES),
  admissionNumber: z.string().trim().toUpperCase().min(1).optional(),
  classId: z.string().min(1).optional(),
});

const listQuery = z.object({
  role: z.enum(ROLES).optional(),
  classId: z.string().optional(),
});

const roleBody = z.object({ role: z.enum(ROLES) });
const statusBody = z.object({ status: z.enum(["active", "suspended"]) });
const profileBody = z.object({
  classId: z.string().min(1).nullable().optional(),
  admissionNumber: z.string().trim().toUpperCase().min(1).nullable().optional(),
});

export default function adminRoutes(ctx: AppContext): Router {
  const router = Router();
  const { users, classes } = ctx.repos;

  router.use(createRequireAuth(ctx), requireRole("admin"));

  async function requireClass(classId: string | null | undefined) {
    if (!classId) return;
    if (!(await classes.findById(classId))) throw new NotFoundError(`Class not found: ${classId}`);
  }

  // Demoting or suspending the last active admin would lock everyone out
  async function guardLastAdmin(userRole: string) {
    if (userRole !== "admin") return;
    const adminCount = await users.count({ role: "admin", status: "active" });
    if (adminCount <= 1) throw new AppError(403, "Cannot remove the last admin");
  }

  // ➕ Create user
  router.post(
    "/users",
    asyncHandler(async (req: Request, res: Response) => {
      const body = createUserBody.parse(req.body);
      if (await users.findByLogin(body.username)) throw new ConflictError(`Username ${body.username} is taken`);
      await requireClass(body.classId);

      const isStudent = body.role === "student";
      const user = await users.create({
        username: body.username,
        name: body.name,
        email: body.email ?? null,
        passwordHash: await hashPassword(body.password),
        role: body.role,
        admissionNumber: isStudent ? body.admissionNumber ?? null : null,
        classId: isStudent ? body.classId ?? null : null,
      });

      await ctx.logAudit(req, {
        action: "user_created",
        targetUser: user.id,
        details: { username: user.username, role: user.role },
      });
      res.status(201).json(publicUser(user));
    })
  );

  // 👥 List users
  router.get(
    "/users",
    asyncHandler(async (req: Request, res: Response) => {
      const filter = listQuery.parse(req.query);
      res.json((await users.list(filter)).map(publicUser));
    })
  );

  // 🔄 Update role
  router.put(
    "/users/:id/role",
    asyncHandler(async (req: Request, res: Response) => {
      const { role } = roleBody.parse(req.body);
      const { id } = req.params;

      if (currentUser(req).id === id) throw new AppError(403, "You cannot change your own role");

      const user = await users.findById(id);
      if (!user) throw new NotFoundError("User not found");
      if (role !== "admin" && user.status === "active") await guardLastAdmin(user.role);

      const updated = await users.update(id, { role });
      if (!updated) throw new NotFoundError("User not found");

      await ctx.logAudit(req, {
        action: "role_changed",
        targetUser: id,
        details: { from: user.role, to: role },
      });
      res.json({ message: "Role updated", user: publicUser(updated) });
    })
  );

  // 🚦 Suspend or reactivate
  router.put(
    "/users/:id/status",
    asyncHandler(async (req: Request, res: Response) => {
      const { status } = statusBody.parse(req.body);
      const { id } = req.params;

      const user = await users.findById(id);
      if (!user) throw new NotFoundError("User not found");
      if (status === "suspended") {
        if (currentUser(req).id === id) throw new AppError(403, "You cannot suspend yourself");
        if (user.status === "active") await guardLastAdmin(user.role);
      }

      const updated = await users.update(id, { status });
      if (!updated) throw new NotFoundError("User not found");

      await ctx.logAudit(req, {
        action: "status_toggled",
        targetUser: id,
        details: { from: user.status, to: status },
      });
      res.json({ message: "Status updated", user: publicUser(updated) });
    })
  );

  // 🎓 Student class and admission number
  router.put(
    "/users/:id/profile",
    asyncHandler(async (req: Request, res: Response) => {
      const body = profileBody.parse(req.body);
      const user = await users.findById(req.params.id);
      if (!user) throw new NotFoundError("User not found");
      if (user.role !== "student") throw new AppError(400, "Only students have a class and admission number");

      if (body.admissionNumber) {
        const holder = await users.findByAdmissionNumber(body.admissionNumber);
        if (holder && holder.id !== user.id) {
          throw new ConflictError(`Admission number ${body.admissionNumber} is already assigned`);
        }
      }
      await requireClass(body.classId);

      const updated = await users.update(user.id, {
        ...(body.classId !== undefined ? { classId: body.classId } : {}),
        ...(body.admissionNumber !== undefined ? { admissionNumber: body.admissionNumber } : {}),
      });
      if (!updated) throw new NotFoundError("User not found");

      await ctx.logAudit(req, {
        action: "student_profile_updated",
        targetUser: user.id,
        details: { classId: updated.classId, admissionNumber: updated.admissionNumber },
      });
      res.json(publicUser(updated));
    })
  );

  return router;
}
