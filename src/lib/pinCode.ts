// src/lib/pinCode.ts
import crypto from "crypto";

export const PIN_LENGTH = 12;
const GROUP = 4;

const group = (compact: string) => compact.match(new RegExp(`.{1,${GROUP}}`, "g"))?.join("-") ?? compact;

/**
 * Canonical form of a user-typed code: separators and spaces dropped,
 * upper-cased, regrouped as XXXX-XXXX-XXXX. Input that does not reduce to
 * 12 characters is returned compacted and will not match a stored code.
 */
export function normalizePinCode(raw: string): string {
  const compact = raw.replace(/[^a-zA-Z0-9]/g, "").toUpperCase();
  return compact.length === PIN_LENGTH ? group(compact) : compact;
}

export function generatePinCode(): string {
  let digits = "";
  for (let i = 0; i < PIN_LENGTH; i++) digits += crypto.randomInt(0, 10).toString();
  return group(digits);
}
