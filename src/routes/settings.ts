// src/routes/settings.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { createRequireAuth, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { describeGrading, updateGrading } from "../services/settingsService";

const gradingBody = z.union([
  z.object({ preset: z.string().min(1) }),
  z.object({
    bands: z.array(
      z.object({
        min: z.number(),
        grade: z.string(),
        remark: z.string().default(""),
      })
    ),
  }),
]);

export default function settingsRoutes(ctx: AppContext): Router {
  const router = Router();

  router.use(createRequireAuth(ctx));

  router.get(
    "/grading",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await describeGrading(ctx.repos, ctx.defaultScale));
    })
  );

  router.put(
    "/grading",
    requireRole("admin"),
    asyncHandler(async (req: Request, res: Response) => {
      const policy = await updateGrading(ctx.repos, ctx.defaultScale, gradingBody.parse(req.body));

      await ctx.logAudit(req, {
        action: "grading_scale_updated",
        details: { source: policy.source, preset: policy.preset, bands: policy.bands.length },
      });
      res.json(policy);
    })
  );

  return router;
}
