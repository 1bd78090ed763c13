// src/services/pinService.ts
import type { NewPin, PinRecord, PinRepository, Repositories } from "../repositories/types";
import { ConflictError, NotFoundError, ValidationError } from "../lib/errors";
import { generatePinCode } from "../lib/pinCode";

export const MAX_PINS_PER_BATCH = 500;
const MAX_ROUNDS = 5;

/** Fresh codes that collide neither with each other nor with stored codes. */
export async function uniqueCodes(pins: PinRepository, count: number, generate = generatePinCode): Promise<string[]> {
  const codes = new Set<string>();
  for (let round = 0; round < MAX_ROUNDS && codes.size < count; round++) {
    const candidates = new Set<string>();
    while (candidates.size < count - codes.size) {
      const code = generate();
      if (!codes.has(code)) candidates.add(code);
    }
    const taken = new Set(await pins.findExistingCodes([...candidates]));
    for (const code of candidates) if (!taken.has(code)) codes.add(code);
  }
  if (codes.size < count) throw new ConflictError("Could not generate enough unique PIN codes, try again");
  return [...codes];
}

/** Pre-generates unbound codes for a term; the first student to redeem one owns it. */
export async function generatePins(repos: Repositories, termId: string, count: number): Promise<PinRecord[]> {
  if (!Number.isInteger(count) || count < 1 || count > MAX_PINS_PER_BATCH) {
    throw new ValidationError(`count must be between 1 and ${MAX_PINS_PER_BATCH}`);
  }
  const term = await repos.terms.findById(termId);
  if (!term) throw new NotFoundError(`Term not found: ${termId}`);

  const codes = await uniqueCodes(repos.pins, count);
  const pins: NewPin[] = codes.map((code) => ({
    code,
    studentId: null,
    termId: term.id,
    sessionId: term.sessionId,
    paymentId: null,
  }));
  return repos.pins.createMany(pins);
}

/** A code already owned by the student, as issued on an approved payment. */
export async function issueBoundPin(
  repos: Repositories,
  { studentId, termId, sessionId, paymentId }: { studentId: string; termId: string; sessionId: string; paymentId: string }
): Promise<PinRecord> {
  const [code] = await uniqueCodes(repos.pins, 1);
  return repos.pins.create({ code, studentId, termId, sessionId, paymentId });
}
