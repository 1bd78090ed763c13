// src/routes/payments.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { AppError, NotFoundError } from "../lib/errors";
import { createRequireAuth, currentUser, requireRole } from "../middleware/auth";
import { asyncHandler } from "../middleware/asyncHandler";
import { approvePayment, createPayment, declinePayment, verifyGatewayPayment } from "../services/paymentService";

const paymentBody = z.object({
  termId: z.string().min(1),
  method: z.enum(["gateway", "manual"]),
  purpose: z.enum(["result-pin", "school-fees"]).default("result-pin"),
  amount: z.coerce.number().optional(),
  reference: z.string().trim().min(1).optional(),
  note: z.string().trim().max(500).optional(),
});

const declineBody = z.object({ note: z.string().trim().max(500).optional() });

const listQuery = z.object({ status: z.enum(["pending", "approved", "declined"]).optional() });

export default function paymentsRoutes(ctx: AppContext): Router {
  const router = Router();
  const { repos } = ctx;

  router.use(createRequireAuth(ctx));

  // 💳 Submit a payment for approval or gateway verification
  router.post(
    "/",
    requireRole("student"),
    asyncHandler(async (req: Request, res: Response) => {
      const body = paymentBody.parse(req.body);
      // Result checker purchases always cost the configured PIN price
      const amount = body.purpose === "result-pin" ? ctx.pinPrice : body.amount ?? 0;

      const payment = await createPayment(repos, {
        studentId: currentUser(req).id,
        termId: body.termId,
        amount,
        method: body.method,
        purpose: body.purpose,
        reference: body.reference,
        note: body.note,
      });

      await ctx.logAudit(req, {
        action: "payment_submitted",
        details: { paymentId: payment.id, reference: payment.reference, amount: payment.amount },
      });
      res.status(201).json(payment);
    })
  );

  router.get(
    "/",
    requireRole("staff"),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await repos.payments.list(listQuery.parse(req.query)));
    })
  );

  router.get(
    "/mine",
    requireRole("student"),
    asyncHandler(async (req: Request, res: Response) => {
      res.json(await repos.payments.list({ studentId: currentUser(req).id }));
    })
  );

  router.post(
    "/:id/verify",
    asyncHandler(async (req: Request, res: Response) => {
      const actor = currentUser(req);
      const payment = await repos.payments.findById(req.params.id);
      if (!payment) throw new NotFoundError(`Payment not found: ${req.params.id}`);
      if (actor.role === "student" && payment.studentId !== actor.id) {
        throw new AppError(403, "You can only verify your own payments");
      }

      const outcome = await verifyGatewayPayment(
        repos,
        ctx.gateway,
        payment.id,
        actor.role === "student" ? null : actor.id
      );

      await ctx.logAudit(req, {
        action: outcome.payment.status === "approved" ? "payment_approved" : "payment_declined",
        targetUser: payment.studentId,
        details: { paymentId: payment.id, via: "gateway", note: outcome.payment.note },
      });
      res.json(outcome);
    })
  );

  router.post(
    "/:id/approve",
    requireRole("staff"),
    asyncHandler(async (req: Request, res: Response) => {
      const outcome = await approvePayment(repos, req.params.id, currentUser(req).id);

      await ctx.logAudit(req, {
        action: "payment_approved",
        targetUser: outcome.payment.studentId,
        details: { paymentId: outcome.payment.id, pinId: outcome.pin?.id ?? null },
      });
      res.json(outcome);
    })
  );

  router.post(
    "/:id/decline",
    requireRole("staff"),
    asyncHandler(async (req: Request, res: Response) => {
      const { note } = declineBody.parse(req.body);
      const payment = await declinePayment(repos, req.params.id, currentUser(req).id, note);

      await ctx.logAudit(req, {
        action: "payment_declined",
        targetUser: payment.studentId,
        details: { paymentId: payment.id, note: payment.note },
      });
      res.json(payment);
    })
  );

  return router;
}
