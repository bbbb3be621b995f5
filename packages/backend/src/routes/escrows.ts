import express from "express";
import { z } from "zod";

import {
  ESCROW_STATUSES,
  MAX_DURATION_DAYS,
  type AssetSpec,
  type EscrowRecord,
  type EscrowStatus,
} from "../models/escrow.js";
import type { EscrowService } from "../services/escrowService.js";

const integerString = z.string().regex(/^\d+$/, "Expected a non-negative integer string");

const statusSchema = z.custom<EscrowStatus>(
  (value) => typeof value === "string" && ESCROW_STATUSES.some((status) => status === value),
  "Unknown escrow status"
);

export function parseAssetSpec(raw: string): AssetSpec {
  switch (raw.toLowerCase()) {
    case "native":
      return { kind: "NATIVE" };
    case "primary":
      return { kind: "PRIMARY_TOKEN" };
    default:
      return { kind: "TOKEN", address: raw };
  }
}

// non-numeric ids can never have been assigned
export function parseEscrowId(raw: string): number {
  return /^\d+$/.test(raw) ? Number(raw) : -1;
}

export function serializeEscrow(record: EscrowRecord) {
  return {
    id: record.id,
    owner: record.owner,
    recipient: record.recipient ?? null,
    amount: record.amount.toString(),
    asset: record.asset.kind === "NATIVE" ? "native" : record.asset.address,
    deadline: record.deadline.toISOString(),
    descriptionRef: record.descriptionRef,
    status: record.status,
    createdAt: record.createdAt.toISOString(),
    settledAt: record.settledAt?.toISOString() ?? null,
    fundingRef: record.fundingRef ?? null,
    pendingSettlement: record.pendingSettlement
      ? {
          status: record.pendingSettlement.status,
          destination: record.pendingSettlement.destination,
          startedAt: record.pendingSettlement.startedAt.toISOString(),
        }
      : null,
  };
}

export function createEscrowsRouter(escrowService: EscrowService) {
  const router = express.Router();

  const createSchema = z.object({
    caller: z.string(),
    amount: integerString,
    asset: z.string().min(1),
    durationDays: z.number().int().max(MAX_DURATION_DAYS),
    descriptionRef: z.string(),
    nativeValue: integerString.optional(),
    depositTxHash: z.string().optional(),
  });

  router.post("/", async (req, res, next) => {
    try {
      const parsed = createSchema.parse(req.body);
      const escrow = await escrowService.create({
        caller: parsed.caller,
        amount: BigInt(parsed.amount),
        asset: parseAssetSpec(parsed.asset),
        durationDays: parsed.durationDays,
        descriptionRef: parsed.descriptionRef,
        nativeValue: parsed.nativeValue === undefined ? 0n : BigInt(parsed.nativeValue),
        depositRef: parsed.depositTxHash,
      });
      res.status(201).json({ escrow: serializeEscrow(escrow) });
    } catch (error) {
      next(error);
    }
  });

  const listSchema = z.object({
    owner: z.string().optional(),
    status: statusSchema.optional(),
  });

  router.get("/", async (req, res, next) => {
    try {
      const filter = listSchema.parse(req.query);
      const escrows = await escrowService.listRecords(filter);
      res.json({ escrows: escrows.map(serializeEscrow) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:escrowId", async (req, res, next) => {
    try {
      const escrow = await escrowService.getRecord(parseEscrowId(req.params.escrowId));
      res.json({ escrow: serializeEscrow(escrow) });
    } catch (error) {
      next(error);
    }
  });

  const completeSchema = z.object({ caller: z.string(), recipient: z.string() });

  router.post("/:escrowId/complete", async (req, res, next) => {
    try {
      const parsed = completeSchema.parse(req.body);
      const escrow = await escrowService.complete(
        parseEscrowId(req.params.escrowId),
        parsed.caller,
        parsed.recipient
      );
      res.json({ escrow: serializeEscrow(escrow) });
    } catch (error) {
      next(error);
    }
  });

  const ownerActionSchema = z.object({ caller: z.string() });

  router.post("/:escrowId/refund", async (req, res, next) => {
    try {
      const parsed = ownerActionSchema.parse(req.body);
      const escrow = await escrowService.requestRefund(parseEscrowId(req.params.escrowId), parsed.caller);
      res.json({ escrow: serializeEscrow(escrow) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/:escrowId/cancel", async (req, res, next) => {
    try {
      const parsed = ownerActionSchema.parse(req.body);
      const escrow = await escrowService.cancel(parseEscrowId(req.params.escrowId), parsed.caller);
      res.json({ escrow: serializeEscrow(escrow) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
