// src/routes/attendance.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { AppError, NotFoundError } from "../lib/errors";
import { createRequireAuth, currentUser, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { attendanceSummary, recordRegister } from "../services/attendanceService";

const registerBody = z.object({
  classId: z.string().min(1),
  date: z.string(),
  termId: z.string().min(1).optional(),
  entries: z
    .array(
      z.object({
        studentId: z.string().min(1),
        status: z.enum(["present", "absent", "late"]),
      })
    )
    .min(1, "At least one entry is required"),
});

const registerQuery = z.object({ classId: z.string().min(1), date: z.string().min(1) });
const summaryQuery = z.object({ termId: z.string().min(1).optional() });

export default function attendanceRoutes(ctx: AppContext): Router {
  const router = Router();
  const { repos } = ctx;

  router.use(createRequireAuth(ctx));

  router.post(
    "/",
    requireRole("teacher", "staff"),
    asyncHandler(async (req: Request, res: Response) => {
      const body = registerBody.parse(req.body);
      const result = await recordRegister(repos, { ...body, recordedBy: currentUser(req).id });

      await ctx.logAudit(req, {
        action: "attendance_recorded",
        details: { classId: body.classId, date: body.date, recorded: result.recorded, skipped: result.skipped.length },
      });
      res.json(result);
    })
  );

  router.get(
    "/",
    requireRole("teacher", "staff"),
    asyncHandler(async (req: Request, res: Response) => {
      const { classId, date } = registerQuery.parse(req.query);
      res.json(await repos.attendance.findForClassOnDate(classId, date));
    })
  );

  router.get(
    "/summary/:studentId",
    asyncHandler(async (req: Request, res: Response) => {
      const viewer = currentUser(req);
      const { studentId } = req.params;
      if (viewer.role === "student" && viewer.id !== studentId) {
        throw new AppError(403, "Students can only view their own attendance");
      }

      const query = summaryQuery.parse(req.query);
      const term = query.termId ? await repos.terms.findById(query.termId) : await repos.terms.findCurrent();
      if (!term) throw new NotFoundError(query.termId ? `Term not found: ${query.termId}` : "No current term is set");

      res.json({ studentId, termId: term.id, ...(await attendanceSummary(repos, studentId, term.id)) });
    })
  );

  return router;
}
