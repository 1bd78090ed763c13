// src/services/paymentService.ts
import crypto from "crypto";
import type {
  PaymentMethod,
  PaymentPatch,
  PaymentPurpose,
  PaymentRecord,
  PaymentStatus,
  PinRecord,
  Repositories,
} from "../repositories/types";
import { ConflictError, NotFoundError, ValidationError } from "../lib/errors";
import type { PaymentGateway } from "./paymentGateway";
import { issueBoundPin } from "./pinService";

export interface PaymentRequest {
  studentId: string;
  termId: string;
  amount: number;
  method: PaymentMethod;
  purpose: PaymentPurpose;
  reference?: string;
  note?: string;
}

export interface PaymentOutcome {
  payment: PaymentRecord;
  pin: PinRecord | null;
}

const manualReference = () => `MAN-${crypto.randomBytes(6).toString("hex").toUpperCase()}`;

export async function createPayment(repos: Repositories, request: PaymentRequest): Promise<PaymentRecord> {
  if (!(request.amount > 0)) throw new ValidationError("Amount must be greater than zero");

  const term = await repos.terms.findById(request.termId);
  if (!term) throw new NotFoundError(`Term not found: ${request.termId}`);

  let reference = request.reference?.trim();
  if (request.method === "gateway" && !reference) {
    throw new ValidationError("A gateway payment needs the gateway transaction reference");
  }
  reference = reference || manualReference();

  if (await repos.payments.findByReference(reference)) {
    throw new ConflictError(`Payment reference ${reference} has already been submitted`);
  }

  return repos.payments.create({
    studentId: request.studentId,
    termId: term.id,
    sessionId: term.sessionId,
    amount: request.amount,
    method: request.method,
    purpose: request.purpose,
    reference,
    note: request.note ?? null,
  });
}

async function settle(
  repos: Repositories,
  paymentId: string,
  to: Exclude<PaymentStatus, "pending">,
  processedBy: string | null,
  extra: PaymentPatch = {}
): Promise<PaymentRecord> {
  const updated = await repos.payments.transition(paymentId, "pending", to, {
    processedBy,
    processedAt: new Date(),
    ...extra,
  });
  if (updated) return updated;

  const existing = await repos.payments.findById(paymentId);
  if (!existing) throw new NotFoundError(`Payment not found: ${paymentId}`);
  throw new ConflictError(`Payment already processed (${existing.status})`);
}

/**
 * pending -> approved. For result-checker purchases the code bound to the
 * paying student is minted first and linked in the same status update, so a
 * failed mint leaves the payment pending. A code minted for an approval that
 * loses the race is removed again.
 */
export async function approvePayment(
  repos: Repositories,
  paymentId: string,
  processedBy: string | null
): Promise<PaymentOutcome> {
  const payment = await repos.payments.findById(paymentId);
  if (!payment) throw new NotFoundError(`Payment not found: ${paymentId}`);
  if (payment.status !== "pending") throw new ConflictError(`Payment already processed (${payment.status})`);

  if (payment.purpose !== "result-pin") {
    return { payment: await settle(repos, payment.id, "approved", processedBy), pin: null };
  }

  const pin = await issueBoundPin(repos, {
    studentId: payment.studentId,
    termId: payment.termId,
    sessionId: payment.sessionId,
    paymentId: payment.id,
  });
  try {
    return { payment: await settle(repos, payment.id, "approved", processedBy, { pinId: pin.id }), pin };
  } catch (err) {
    await repos.pins.remove(pin.id);
    throw err;
  }
}

export async function declinePayment(
  repos: Repositories,
  paymentId: string,
  processedBy: string | null,
  note?: string
): Promise<PaymentRecord> {
  return settle(repos, paymentId, "declined", processedBy, note ? { note } : {});
}

/**
 * Confirms a gateway payment with the gateway and settles it. Gateway
 * outages propagate as GatewayError and leave the payment pending.
 */
export async function verifyGatewayPayment(
  repos: Repositories,
  gateway: PaymentGateway,
  paymentId: string,
  processedBy: string | null
): Promise<PaymentOutcome> {
  const payment = await repos.payments.findById(paymentId);
  if (!payment) throw new NotFoundError(`Payment not found: ${paymentId}`);
  if (payment.method !== "gateway") throw new ValidationError("Only gateway payments can be verified online");
  if (payment.status !== "pending") throw new ConflictError(`Payment already processed (${payment.status})`);

  const verification = await gateway.verify(payment.reference);

  if (verification.status === "success" && verification.amount >= payment.amount) {
    return approvePayment(repos, payment.id, processedBy);
  }

  const reason =
    verification.status === "failure"
      ? verification.reason
      : `Amount paid (${verification.amount}) is less than amount due (${payment.amount})`;
  return { payment: await declinePayment(repos, payment.id, processedBy, reason), pin: null };
}
