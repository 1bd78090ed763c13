// src/routes/auditLogs.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { createRequireAuth, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";

const listQuery = z.object({
  action: z.string().optional(),
  actor: z.string().optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(10),
});

export default function auditLogsRoutes(ctx: AppContext): Router {
  const router = Router();

  router.get(
    "/",
    createRequireAuth(ctx),
    requireRole("admin"),
    asyncHandler(async (req: Request, res: Response) => {
      const { page, limit, ...filter } = listQuery.parse(req.query);

      const { data, total } = await ctx.repos.auditLogs.list({ ...filter, skip: (page - 1) * limit, limit });

      res.json({
        data,
        total,
        page,
        pages: Math.ceil(total / limit),
      });
    })
  );

  return router;
}
