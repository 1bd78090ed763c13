// src/services/accessGate.ts
import type { PinRecord, PinRepository, Role, TermRepository } from "../repositories/types";
import { AccessDeniedError, type DenialReason } from "../lib/errors";
import { normalizePinCode } from "../lib/pinCode";

export const PRIVILEGED_ROLES: readonly Role[] = ["admin", "staff"];

export type AccessDecision =
  | { granted: true; via: "privileged" | "owned" | "redeemed"; pin: PinRecord | null }
  | { granted: false; reason: DenialReason; message: string };

interface GateDeps {
  pins: PinRepository;
  terms: TermRepository;
}

interface Viewer {
  id: string;
  role: Role;
}

const deny = (reason: DenialReason, message: string): AccessDecision => ({ granted: false, reason, message });

function evaluateBinding(pin: PinRecord, studentId: string): AccessDecision | null {
  if (pin.studentId === null) return null;
  if (pin.studentId === studentId) return { granted: true, via: "redeemed", pin };
  return deny("used-by-other", "This PIN has already been used by another student");
}

/**
 * Decides whether `viewer` may see results for `termId`. Only a first-time
 * redemption writes (binds the code to the student); denials leave the code
 * untouched.
 */
export async function checkAccess(
  { pins, terms }: GateDeps,
  viewer: Viewer,
  termId: string,
  suppliedCode?: string | null
): Promise<AccessDecision> {
  if (PRIVILEGED_ROLES.includes(viewer.role)) return { granted: true, via: "privileged", pin: null };

  const owned = await pins.findOwned(viewer.id, termId);
  if (owned) return { granted: true, via: "owned", pin: owned };

  if (!suppliedCode || !suppliedCode.trim()) {
    return deny("missing", "A result checker PIN is required to view results for this term");
  }

  const code = normalizePinCode(suppliedCode);
  const pin = await pins.findByCode(code);
  if (!pin) return deny("invalid", "Invalid PIN");

  if (pin.termId !== termId) {
    const issuedFor = await terms.findById(pin.termId);
    return deny(
      "wrong-term",
      `This PIN is for ${issuedFor?.name ?? "a different term"}, not the term you selected`
    );
  }

  if (pin.status !== "active") return deny("invalid", "This PIN is no longer active");

  const existing = evaluateBinding(pin, viewer.id);
  if (existing) return existing;

  const bound = await pins.bindIfUnbound(pin.id, viewer.id);
  if (bound) return { granted: true, via: "redeemed", pin: bound };

  // Lost the race to another redemption: judge against whoever holds it now.
  const current = await pins.findById(pin.id);
  return (current && evaluateBinding(current, viewer.id)) ?? deny("invalid", "Invalid PIN");
}

export function assertAccess(decision: AccessDecision): asserts decision is Extract<AccessDecision, { granted: true }> {
  if (!decision.granted) throw new AccessDeniedError(decision.reason, decision.message);
}
