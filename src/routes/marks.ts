// src/routes/marks.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { ValidationError } from "../lib/errors";
import { createRequireAuth, currentUser, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { createUploadRateLimiter } from "../middleware/security";
import { uploadMarksFile } from "../middleware/upload";
import { recordMarks } from "../services/resultService";
import { importMarksFromBuffer } from "../services/marksImporter";

const entryBody = z.object({
  studentId: z.string().min(1),
  subjectId: z.string().min(1),
  termId: z.string().min(1),
  ca1: z.unknown(),
  ca2: z.unknown(),
  ca3: z.unknown(),
  ca4: z.unknown(),
  exam: z.unknown(),
});

const uploadFields = z.object({ termId: z.string().min(1, "termId is required") });

export default function marksRoutes(ctx: AppContext): Router {
  const router = Router();

  router.use(createRequireAuth(ctx), requireRole("teacher", "staff"));

  // ✍️ Single entry
  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const body = entryBody.parse(req.body);
      const actor = currentUser(req);

      const result = await recordMarks(ctx, {
        studentId: body.studentId,
        subjectId: body.subjectId,
        termId: body.termId,
        marks: { ca1: body.ca1, ca2: body.ca2, ca3: body.ca3, ca4: body.ca4, exam: body.exam },
        recordedBy: actor.id,
      });

      await ctx.logAudit(req, {
        action: "marks_recorded",
        targetUser: result.studentId,
        details: { subjectId: result.subjectId, termId: result.termId, total: result.total, grade: result.grade },
      });
      res.json(result);
    })
  );

  // 📤 CSV upload
  router.post(
    "/upload",
    createUploadRateLimiter(),
    uploadMarksFile.single("file"),
    asyncHandler(async (req: Request, res: Response) => {
      if (!req.file) throw new ValidationError("No file uploaded");
      const { termId } = uploadFields.parse(req.body);
      const actor = currentUser(req);

      const summary = await importMarksFromBuffer(ctx, req.file.buffer, { termId, recordedBy: actor.id });

      await ctx.logAudit(req, {
        action: "marks_uploaded",
        details: {
          termId,
          fileName: req.file.originalname,
          total: summary.total,
          success: summary.success,
          skipped: summary.skipped.length,
        },
      });
      res.json(summary);
    })
  );

  return router;
}
