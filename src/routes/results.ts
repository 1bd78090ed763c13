// src/routes/results.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { AccessDeniedError } from "../lib/errors";
import { createRequireAuth, currentUser, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { buildBroadsheet, viewResults } from "../services/resultService";

const pinQuery = z.object({ pin: z.string().optional() });

export default function resultsRoutes(ctx: AppContext): Router {
  const router = Router();

  router.use(createRequireAuth(ctx));

  // 🎟️ A student's own results, behind the result checker PIN
  router.get(
    "/:termId",
    requireRole("student"),
    asyncHandler(async (req: Request, res: Response) => {
      const { pin } = pinQuery.parse(req.query);
      const viewer = currentUser(req);
      const { termId } = req.params;

      try {
        const { sheet, access } = await viewResults(ctx, viewer, viewer.id, termId, pin);
        if (access === "redeemed") {
          await ctx.logAudit(req, { action: "pin_redeemed", details: { termId } });
        }
        res.json({ access, ...sheet });
      } catch (err) {
        if (err instanceof AccessDeniedError) {
          await ctx.logAudit(req, { action: "pin_denied", details: { termId, reason: err.reason } });
        }
        throw err;
      }
    })
  );

  router.get(
    "/:termId/students/:studentId",
    requireRole("staff"),
    asyncHandler(async (req: Request, res: Response) => {
      const { sheet, access } = await viewResults(ctx, currentUser(req), req.params.studentId, req.params.termId);
      res.json({ access, ...sheet });
    })
  );

  router.get(
    "/:termId/broadsheet/:classId",
    requireRole("teacher", "staff"),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await buildBroadsheet(ctx, req.params.termId, req.params.classId));
    })
  );

  return router;
}
