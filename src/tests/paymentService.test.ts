// src/tests/paymentService.test.ts
import { ConflictError, GatewayError, NotFoundError, ValidationError } from "../lib/errors";
import type { PaymentRecord } from "../repositories/types";
import { checkAccess } from "../services/accessGate";
import { approvePayment, createPayment, declinePayment, verifyGatewayPayment } from "../services/paymentService";
import { createWorld, PIN_PRICE, type TestWorld } from "./helpers/testApp";

describe("payment service", () => {
  let world: TestWorld;

  beforeEach(async () => {
    world = await createWorld();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const submit = (overrides: Partial<Parameters<typeof createPayment>[1]> = {}) =>
    createPayment(world.repos, {
      studentId: world.alice.id,
      termId: world.firstTerm.id,
      amount: PIN_PRICE,
      method: "manual",
      purpose: "result-pin",
      ...overrides,
    });

  describe("createPayment", () => {
    it("records a pending manual payment with a generated reference", async () => {
      const payment = await submit();

      expect(payment).toMatchObject({
        studentId: world.alice.id,
        sessionId: world.session.id,
        amount: PIN_PRICE,
        status: "pending",
        pinId: null,
      });
      expect(payment.reference).toMatch(/^MAN-[0-9A-F]{12}$/);
    });

    it("requires a reference for gateway payments and rejects duplicates", async () => {
      await expect(submit({ method: "gateway" })).rejects.toThrow(ValidationError);

      await submit({ method: "gateway", reference: "PSK-001" });
      await expect(submit({ method: "gateway", reference: " PSK-001 " })).rejects.toThrow(ConflictError);
    });

    it("rejects non-positive amounts and unknown terms", async () => {
      await expect(submit({ amount: 0 })).rejects.toThrow("Amount must be greater than zero");
      await expect(submit({ termId: "missing" })).rejects.toThrow(NotFoundError);
    });
  });

  describe("approval", () => {
    it("mints exactly one code bound to the student and links it", async () => {
      const payment = await submit();
      const { payment: approved, pin } = await approvePayment(world.repos, payment.id, world.staff.id);

      expect(approved).toMatchObject({ status: "approved", processedBy: world.staff.id, pinId: pin?.id });
      expect(approved.processedAt).toBeInstanceOf(Date);
      expect(pin).toMatchObject({
        studentId: world.alice.id,
        termId: world.firstTerm.id,
        sessionId: world.session.id,
        paymentId: payment.id,
      });
      expect(world.repos.tables.pins.size).toBe(1);

      await expect(checkAccess(world.repos, world.alice, world.firstTerm.id)).resolves.toMatchObject({
        granted: true,
        via: "owned",
      });
    });

    it("refuses to process a payment twice", async () => {
      const payment = await submit();
      await approvePayment(world.repos, payment.id, world.staff.id);

      await expect(approvePayment(world.repos, payment.id, world.staff.id)).rejects.toThrow(
        "Payment already processed (approved)"
      );
      await expect(declinePayment(world.repos, payment.id, world.staff.id)).rejects.toThrow(ConflictError);
      expect(world.repos.tables.pins.size).toBe(1);
    });

    it("keeps a declined payment declined", async () => {
      const payment = await submit();
      const declined = await declinePayment(world.repos, payment.id, world.staff.id, "Teller not found");

      expect(declined).toMatchObject({ status: "declined", note: "Teller not found" });
      await expect(approvePayment(world.repos, payment.id, world.staff.id)).rejects.toThrow(
        "Payment already processed (declined)"
      );
      expect(world.repos.tables.pins.size).toBe(0);
    });

    it("leaves the payment pending when the code cannot be minted", async () => {
      const payment = await submit();
      jest.spyOn(world.repos.pins, "create").mockRejectedValueOnce(new Error("db down"));

      await expect(approvePayment(world.repos, payment.id, world.staff.id)).rejects.toThrow("db down");
      expect(world.repos.tables.payments.get(payment.id)).toMatchObject({ status: "pending", pinId: null, processedBy: null });
      expect(world.repos.tables.pins.size).toBe(0);

      const { payment: approved, pin } = await approvePayment(world.repos, payment.id, world.staff.id);
      expect(approved.status).toBe("approved");
      expect(approved.pinId).toBe(pin?.id);
      expect(world.repos.tables.pins.size).toBe(1);
    });

    it("removes the minted code when the payment is settled elsewhere first", async () => {
      const payment = await submit();
      jest.spyOn(world.repos.payments, "transition").mockImplementationOnce(async (id) => {
        await declinePayment(world.repos, id, world.staff.id, "Declined at the bank");
        return null;
      });

      await expect(approvePayment(world.repos, payment.id, world.staff.id)).rejects.toThrow(
        "Payment already processed (declined)"
      );
      expect(world.repos.tables.pins.size).toBe(0);
      expect(world.repos.tables.payments.get(payment.id)?.note).toBe("Declined at the bank");
    });

    it("mints nothing for fee payments", async () => {
      const payment = await submit({ purpose: "school-fees", amount: 25000 });
      const outcome = await approvePayment(world.repos, payment.id, world.staff.id);

      expect(outcome.pin).toBeNull();
      expect(outcome.payment.status).toBe("approved");
    });

    it("404s for an unknown payment", async () => {
      await expect(approvePayment(world.repos, "missing", world.staff.id)).rejects.toThrow("Payment not found: missing");
    });
  });

  describe("gateway verification", () => {
    let payment: PaymentRecord;

    beforeEach(async () => {
      payment = await submit({ method: "gateway", reference: "PSK-100" });
    });

    it("approves when the gateway confirms the full amount", async () => {
      world.gateway.respondWith({ status: "success", amount: PIN_PRICE });

      const outcome = await verifyGatewayPayment(world.repos, world.gateway, payment.id, null);
      expect(world.gateway.calls).toEqual(["PSK-100"]);
      expect(outcome.payment.status).toBe("approved");
      expect(outcome.pin?.studentId).toBe(world.alice.id);
    });

    it("declines an underpayment", async () => {
      world.gateway.respondWith({ status: "success", amount: 500 });

      const outcome = await verifyGatewayPayment(world.repos, world.gateway, payment.id, null);
      expect(outcome.payment).toMatchObject({
        status: "declined",
        note: `Amount paid (500) is less than amount due (${PIN_PRICE})`,
      });
      expect(outcome.pin).toBeNull();
    });

    it("declines a definitive failure with the gateway's reason", async () => {
      world.gateway.respondWith({ status: "failure", reason: "Insufficient funds" });

      const outcome = await verifyGatewayPayment(world.repos, world.gateway, payment.id, null);
      expect(outcome.payment).toMatchObject({ status: "declined", note: "Insufficient funds" });
    });

    it("leaves the payment pending when the gateway is unavailable", async () => {
      world.gateway.respondWith(new GatewayError("Payment gateway unavailable, the payment is still pending"));

      await expect(verifyGatewayPayment(world.repos, world.gateway, payment.id, null)).rejects.toThrow(GatewayError);
      expect(world.repos.tables.payments.get(payment.id)?.status).toBe("pending");
    });

    it("only verifies pending gateway payments", async () => {
      const manual = await submit();
      await expect(verifyGatewayPayment(world.repos, world.gateway, manual.id, null)).rejects.toThrow(
        "Only gateway payments can be verified online"
      );

      await approvePayment(world.repos, payment.id, world.staff.id);
      await expect(verifyGatewayPayment(world.repos, world.gateway, payment.id, null)).rejects.toThrow(ConflictError);
      expect(world.gateway.calls).toEqual([]);
    });
  });
});
