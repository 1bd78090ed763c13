// src/routes/academics.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { NotFoundError } from "../lib/errors";
import { createRequireAuth, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import {
  activateSession,
  activateTerm,
  createClass,
  createSession,
  createSubject,
  createTerm,
} from "../services/academicService";

const optionalDate = z.coerce.date().nullable().optional();

const sessionBody = z.object({
  name: z.string().trim().min(1),
  startDate: optionalDate,
  endDate: optionalDate,
});

const termBody = z.object({
  name: z.string().trim().min(1),
  sessionId: z.string().min(1),
});

const classBody = z.object({
  name: z.string().trim().min(1),
  level: z.string().trim().min(1).optional(),
});

const subjectBody = z.object({
  name: z.string().trim().min(1),
  code: z.string().trim().min(1),
  isElective: z.boolean().default(false),
});

export default function academicsRoutes(ctx: AppContext): Router {
  const router = Router();
  const { repos } = ctx;
  const manage = requireRole("staff");

  router.use(createRequireAuth(ctx));

  // Sessions
  router.get(
    "/sessions",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await repos.sessions.list());
    })
  );

  router.post(
    "/sessions",
    manage,
    asyncHandler(async (req: Request, res: Response) => {
      const body = sessionBody.parse(req.body);
      const session = await createSession(repos, {
        name: body.name,
        startDate: body.startDate ?? null,
        endDate: body.endDate ?? null,
      });
      res.status(201).json(session);
    })
  );

  router.post(
    "/sessions/:id/activate",
    manage,
    asyncHandler(async (req: Request, res: Response) => {
      const session = await activateSession(repos, req.params.id);
      await ctx.logAudit(req, { action: "session_activated", details: { sessionId: session.id, name: session.name } });
      res.json(session);
    })
  );

  // Terms
  router.get(
    "/terms",
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId } = z.object({ sessionId: z.string().optional() }).parse(req.query);
      res.json(await repos.terms.list(sessionId));
    })
  );

  router.get(
    "/terms/current",
    asyncHandler(async (_req: Request, res: Response) => {
      const term = await repos.terms.findCurrent();
      if (!term) throw new NotFoundError("No current term is set");
      res.json(term);
    })
  );

  router.post(
    "/terms",
    manage,
    asyncHandler(async (req: Request, res: Response) => {
      res.status(201).json(await createTerm(repos, termBody.parse(req.body)));
    })
  );

  router.post(
    "/terms/:id/activate",
    manage,
    asyncHandler(async (req: Request, res: Response) => {
      const term = await activateTerm(repos, req.params.id);
      await ctx.logAudit(req, { action: "term_activated", details: { termId: term.id, name: term.name } });
      res.json(term);
    })
  );

  // Classes
  router.get(
    "/classes",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await repos.classes.list());
    })
  );

  router.post(
    "/classes",
    manage,
    asyncHandler(async (req: Request, res: Response) => {
      const body = classBody.parse(req.body);
      res.status(201).json(await createClass(repos, { name: body.name, level: body.level ?? null }));
    })
  );

  // Subjects
  router.get(
    "/subjects",
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await repos.subjects.list());
    })
  );

  router.post(
    "/subjects",
    manage,
    asyncHandler(async (req: Request, res: Response) => {
      res.status(201).json(await createSubject(repos, subjectBody.parse(req.body)));
    })
  );

  return router;
}
