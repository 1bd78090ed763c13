// src/tests/accessGate.test.ts
import { AccessDeniedError } from "../lib/errors";
import type { PinRecord } from "../repositories/types";
import { assertAccess, checkAccess } from "../services/accessGate";
import { createWorld, type TestWorld } from "./helpers/testApp";

describe("access gate", () => {
  let world: TestWorld;
  let pin: PinRecord;

  beforeEach(async () => {
    world = await createWorld();
    pin = await world.repos.pins.create({
      code: "1111-2222-3333",
      studentId: null,
      termId: world.firstTerm.id,
      sessionId: world.session.id,
      paymentId: null,
    });
  });

  const stored = () => world.repos.tables.pins.get(pin.id);
  const gate = () => world.repos;

  it("grants staff and admins without a code or any PIN lookup", async () => {
    const findOwned = jest.spyOn(world.repos.pins, "findOwned");

    await expect(checkAccess(gate(), world.staff, world.firstTerm.id)).resolves.toEqual({
      granted: true,
      via: "privileged",
      pin: null,
    });
    await expect(checkAccess(gate(), world.admin, world.firstTerm.id)).resolves.toMatchObject({ via: "privileged" });
    expect(findOwned).not.toHaveBeenCalled();
  });

  it("denies a student with no owned code and no code supplied", async () => {
    for (const supplied of [undefined, null, "", "   "]) {
      await expect(checkAccess(gate(), world.alice, world.firstTerm.id, supplied)).resolves.toEqual({
        granted: false,
        reason: "missing",
        message: "A result checker PIN is required to view results for this term",
      });
    }
  });

  it("denies an unknown code", async () => {
    await expect(checkAccess(gate(), world.alice, world.firstTerm.id, "9999-9999-9999")).resolves.toEqual({
      granted: false,
      reason: "invalid",
      message: "Invalid PIN",
    });
  });

  it("denies a code issued for another term without touching it", async () => {
    const decision = await checkAccess(gate(), world.alice, world.secondTerm.id, "1111-2222-3333");

    expect(decision).toEqual({
      granted: false,
      reason: "wrong-term",
      message: "This PIN is for First Term, not the term you selected",
    });
    expect(stored()).toMatchObject({ studentId: null, usageCount: 0 });
  });

  it("binds an unbound code on first use, whatever the typed format", async () => {
    const decision = await checkAccess(gate(), world.alice, world.firstTerm.id, " 1111 2222 3333 ");

    expect(decision).toMatchObject({ granted: true, via: "redeemed" });
    expect(stored()).toMatchObject({ studentId: world.alice.id, usageCount: 1, status: "active" });
  });

  it("grants the owner later without asking for the code again", async () => {
    await checkAccess(gate(), world.alice, world.firstTerm.id, "111122223333");

    const decision = await checkAccess(gate(), world.alice, world.firstTerm.id);
    expect(decision).toMatchObject({ granted: true, via: "owned" });
    expect(stored()?.usageCount).toBe(1);
  });

  it("denies a code already used by another student", async () => {
    await checkAccess(gate(), world.alice, world.firstTerm.id, "1111-2222-3333");

    const decision = await checkAccess(gate(), world.bob, world.firstTerm.id, "1111-2222-3333");
    expect(decision).toEqual({
      granted: false,
      reason: "used-by-other",
      message: "This PIN has already been used by another student",
    });
    expect(stored()).toMatchObject({ studentId: world.alice.id, usageCount: 1 });
  });

  it("treats a retired code as invalid", async () => {
    const record = stored();
    if (record) record.status = "used";

    await expect(checkAccess(gate(), world.alice, world.firstTerm.id, "1111-2222-3333")).resolves.toEqual({
      granted: false,
      reason: "invalid",
      message: "This PIN is no longer active",
    });
    expect(stored()?.studentId).toBeNull();
  });

  it("re-evaluates when another student wins the bind", async () => {
    jest.spyOn(world.repos.pins, "bindIfUnbound").mockImplementationOnce(async (pinId) => {
      const raced = world.repos.tables.pins.get(pinId);
      if (raced) {
        raced.studentId = world.bob.id;
        raced.usageCount += 1;
      }
      return null;
    });

    const decision = await checkAccess(gate(), world.alice, world.firstTerm.id, "1111-2222-3333");
    expect(decision).toMatchObject({ granted: false, reason: "used-by-other" });
    expect(stored()).toMatchObject({ studentId: world.bob.id, usageCount: 1 });
  });

  it("grants when a concurrent request by the same student bound it first", async () => {
    jest.spyOn(world.repos.pins, "bindIfUnbound").mockImplementationOnce(async (pinId) => {
      const raced = world.repos.tables.pins.get(pinId);
      if (raced) raced.studentId = world.alice.id;
      return null;
    });

    await expect(checkAccess(gate(), world.alice, world.firstTerm.id, "1111-2222-3333")).resolves.toMatchObject({
      granted: true,
      via: "redeemed",
    });
  });

  it("assertAccess raises the denial reason", async () => {
    const decision = await checkAccess(gate(), world.alice, world.firstTerm.id, "0000-0000-0000");

    expect(() => assertAccess(decision)).toThrow(AccessDeniedError);
    try {
      assertAccess(decision);
    } catch (err) {
      expect(err).toMatchObject({ statusCode: 403, reason: "invalid", message: "Invalid PIN" });
    }
  });
});
