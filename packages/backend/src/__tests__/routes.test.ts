import request from "supertest";
import type { Express } from "express";

import { createApp } from "../app.js";
import { DAY_MS, NATIVE_ASSET } from "../models/escrow.js";
import { ADMIN, OTHER_TOKEN, OWNER, PRIMARY_TOKEN, RECIPIENT, STRANGER, buildHarness, type Harness } from "./harness.js";

const nativeBody = {
  caller: OWNER,
  amount: "1000000",
  asset: "native",
  durationDays: 1,
  descriptionRef: "ref1",
  nativeValue: "1000000",
};

describe("http routes", () => {
  let h: Harness;
  let app: Express;

  beforeEach(() => {
    h = buildHarness();
    h.ledger.mint(OWNER, NATIVE_ASSET, 5_000_000n);
    app = createApp({ escrowService: h.service, notificationLog: h.notificationLog, logger: h.logger });
  });

  it("reports health", async () => {
    const response = await request(app).get("/health");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: "ok" });
  });

  describe("POST /escrows", () => {
    it("creates an escrow and serializes amounts as strings", async () => {
      const response = await request(app).post("/escrows").send(nativeBody);

      expect(response.status).toBe(201);
      expect(response.body.escrow).toEqual({
        id: 0,
        owner: OWNER,
        recipient: null,
        amount: "1000000",
        asset: "native",
        deadline: "2026-01-02T00:00:00.000Z",
        descriptionRef: "ref1",
        status: "OPEN",
        createdAt: "2026-01-01T00:00:00.000Z",
        settledAt: null,
        fundingRef: "ledger-1",
        pendingSettlement: null,
      });
    });

    it("maps a value mismatch to 400 with its code", async () => {
      const response = await request(app)
        .post("/escrows")
        .send({ ...nativeBody, nativeValue: "5" });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: "AMOUNT_MISMATCH",
        message: "Attached value 5 does not equal amount 1000000",
      });
    });

    it("rejects a malformed body before reaching the service", async () => {
      const response = await request(app)
        .post("/escrows")
        .send({ ...nativeBody, amount: "-1" });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe("VALIDATION_FAILED");
      expect(response.body.issues[0].path).toEqual(["amount"]);
      expect(await h.store.nextId()).toBe(0);
    });

    it("rejects a duration past the supported range before reaching the service", async () => {
      const response = await request(app)
        .post("/escrows")
        .send({ ...nativeBody, durationDays: 36_501 });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe("VALIDATION_FAILED");
      expect(response.body.issues[0].path).toEqual(["durationDays"]);
      expect(await h.store.nextId()).toBe(0);
      expect(h.ledger.balanceOf(OWNER, NATIVE_ASSET)).toBe(5_000_000n);
    });

    it("rejects unparseable JSON", async () => {
      const response = await request(app)
        .post("/escrows")
        .set("Content-Type", "application/json")
        .send("{\"caller\":");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: "MALFORMED_JSON" });
    });

    it("resolves the primary token keyword", async () => {
      h.ledger.mint(OWNER, { kind: "TOKEN", address: PRIMARY_TOKEN }, 10n);
      h.ledger.approve(OWNER, PRIMARY_TOKEN, 10n);

      const response = await request(app).post("/escrows").send({
        caller: OWNER,
        amount: "10",
        asset: "primary",
        durationDays: 2,
        descriptionRef: "token-ref",
      });

      expect(response.status).toBe(201);
      expect(response.body.escrow.asset).toBe(PRIMARY_TOKEN);
    });

    it("maps a refused token pull to 502", async () => {
      const response = await request(app).post("/escrows").send({
        caller: OWNER,
        amount: "10",
        asset: OTHER_TOKEN,
        durationDays: 2,
        descriptionRef: "token-ref",
      });

      expect(response.status).toBe(502);
      expect(response.body.error).toBe("TRANSFER_FAILED");
    });
  });

  describe("escrow lifecycle", () => {
    beforeEach(async () => {
      await request(app).post("/escrows").send(nativeBody).expect(201);
    });

    it("fetches a record by id and 404s on unknown ids", async () => {
      const found = await request(app).get("/escrows/0");
      expect(found.status).toBe(200);
      expect(found.body.escrow.owner).toBe(OWNER);

      const missing = await request(app).get("/escrows/1");
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: "NOT_FOUND", message: "Escrow 1 not found" });

      const garbage = await request(app).get("/escrows/zero");
      expect(garbage.status).toBe(404);
    });

    it("completes for the owner only", async () => {
      const denied = await request(app).post("/escrows/0/complete").send({ caller: STRANGER, recipient: RECIPIENT });
      expect(denied.status).toBe(403);
      expect(denied.body.error).toBe("UNAUTHORIZED");

      const completed = await request(app).post("/escrows/0/complete").send({ caller: OWNER, recipient: RECIPIENT });
      expect(completed.status).toBe(200);
      expect(completed.body.escrow).toMatchObject({
        status: "COMPLETED",
        recipient: RECIPIENT,
        settledAt: "2026-01-01T00:00:00.000Z",
      });

      const again = await request(app).post("/escrows/0/complete").send({ caller: OWNER, recipient: RECIPIENT });
      expect(again.status).toBe(409);
      expect(again.body.error).toBe("ALREADY_COMPLETED");
    });

    it("maps a failed payout to 502 and keeps the escrow open", async () => {
      h.ledger.block(RECIPIENT);

      const response = await request(app).post("/escrows/0/complete").send({ caller: OWNER, recipient: RECIPIENT });

      expect(response.status).toBe(502);
      expect(response.body.error).toBe("TRANSFER_FAILED");
      expect((await request(app).get("/escrows/0")).body.escrow.status).toBe("OPEN");
    });

    it("refunds only after the deadline", async () => {
      const early = await request(app).post("/escrows/0/refund").send({ caller: OWNER });
      expect(early.status).toBe(409);
      expect(early.body.error).toBe("DEADLINE_NOT_YET_PASSED");

      h.advance(DAY_MS + 1);
      const refunded = await request(app).post("/escrows/0/refund").send({ caller: OWNER });
      expect(refunded.status).toBe(200);
      expect(refunded.body.escrow.status).toBe("REFUNDED");
    });

    it("cancels before the deadline", async () => {
      const response = await request(app).post("/escrows/0/cancel").send({ caller: OWNER });
      expect(response.status).toBe(200);
      expect(response.body.escrow.status).toBe("REFUNDED");
      expect(h.ledger.balanceOf(OWNER, NATIVE_ASSET)).toBe(5_000_000n);
    });

    it("lists with owner and status filters", async () => {
      const byOwner = await request(app).get("/escrows").query({ owner: OWNER });
      expect(byOwner.body.escrows.map((escrow: { id: number }) => escrow.id)).toEqual([0]);

      const completed = await request(app).get("/escrows").query({ status: "COMPLETED" });
      expect(completed.body.escrows).toEqual([]);

      const bogus = await request(app).get("/escrows").query({ status: "PENDING" });
      expect(bogus.status).toBe(400);
    });

    it("exposes notifications with stringified amounts", async () => {
      const response = await request(app).get("/notifications").query({ type: "escrow.created" });

      expect(response.status).toBe(200);
      expect(response.body.notifications).toHaveLength(1);
      expect(response.body.notifications[0].notification).toEqual({
        type: "escrow.created",
        escrowId: 0,
        owner: OWNER,
        amount: "1000000",
        asset: { kind: "NATIVE" },
        deadline: "2026-01-02T00:00:00.000Z",
        descriptionRef: "ref1",
        transferRef: "ledger-1",
      });

      const forOther = await request(app).get("/notifications").query({ escrowId: "3" });
      expect(forOther.body.notifications).toEqual([]);
    });
  });

  describe("/admin/primary-token", () => {
    it("reads and updates the primary token", async () => {
      const current = await request(app).get("/admin/primary-token");
      expect(current.body).toEqual({ address: PRIMARY_TOKEN });

      const denied = await request(app).put("/admin/primary-token").send({ caller: OWNER, address: OTHER_TOKEN });
      expect(denied.status).toBe(403);

      const updated = await request(app).put("/admin/primary-token").send({ caller: ADMIN, address: OTHER_TOKEN });
      expect(updated.status).toBe(200);
      expect(updated.body).toEqual({ address: OTHER_TOKEN });
    });
  });
});
