// src/routes/pins.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { createRequireAuth, currentUser, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { generatePins } from "../services/pinService";

const generateBody = z.object({
  termId: z.string().min(1),
  count: z.coerce.number().int(),
});

const listQuery = z.object({
  termId: z.string().optional(),
  status: z.enum(["active", "used"]).optional(),
  bound: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export default function pinsRoutes(ctx: AppContext): Router {
  const router = Router();
  const { pins } = ctx.repos;

  router.use(createRequireAuth(ctx));

  router.post(
    "/generate",
    requireRole("staff"),
    asyncHandler(async (req: Request, res: Response) => {
      const { termId, count } = generateBody.parse(req.body);
      const created = await generatePins(ctx.repos, termId, count);

      await ctx.logAudit(req, { action: "pins_generated", details: { termId, count: created.length } });
      res.status(201).json({ count: created.length, pins: created });
    })
  );

  router.get(
    "/",
    requireRole("staff"),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await pins.list(listQuery.parse(req.query)));
    })
  );

  router.get(
    "/mine",
    requireRole("student"),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await pins.list({ studentId: currentUser(req).id }));
    })
  );

  return router;
}
