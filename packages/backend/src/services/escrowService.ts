import { EscrowError, NotFoundError, TransferFailedError, UnauthorizedError, isEscrowError } from "../errors.js";
import { normalizeAddress, sameAddress } from "../lib/address.js";
import { KeyedMutex } from "../lib/keyedMutex.js";
import type { Logger } from "../lib/logger.js";
import {
  DAY_MS,
  MAX_DEADLINE_MS,
  MAX_DURATION_DAYS,
  NATIVE_ASSET,
  assetLabel,
  type AssetSpec,
  type EscrowFilter,
  type EscrowRecord,
  type PendingSettlement,
  type ResolvedAsset,
} from "../models/escrow.js";
import type { EscrowNotification, NotificationSink } from "../models/notification.js";
import type { AssetTransferAdapter, TransferReceipt } from "./assetTransfer.js";
import type { EscrowStore } from "./escrowStore.js";
import type { PrimaryTokenRegistry } from "./primaryTokenRegistry.js";

export interface CreateEscrowInput {
  caller: string;
  amount: bigint;
  asset: AssetSpec;
  durationDays: number;
  descriptionRef: string;
  /** Native value attached to the call; zero when omitted. */
  nativeValue?: bigint;
  /** Hash of the owner's native deposit into custody. */
  depositRef?: string;
}

export interface EscrowServiceOptions {
  store: EscrowStore;
  transfers: AssetTransferAdapter;
  primaryToken: PrimaryTokenRegistry;
  notifications: NotificationSink;
  logger: Logger;
  now?: () => Date;
}

type SettlementMode = "refund" | "cancel";

interface SettlementPlan {
  escrow: EscrowRecord;
  settled: EscrowRecord & { status: PendingSettlement["status"] };
  destination: string;
}

const CREATE_LOCK = "create";

function recordLock(id: number): string {
  return `escrow:${id}`;
}

export class EscrowService {
  private readonly store: EscrowStore;
  private readonly transfers: AssetTransferAdapter;
  private readonly primaryToken: PrimaryTokenRegistry;
  private readonly notifications: NotificationSink;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();

  constructor({ store, transfers, primaryToken, notifications, logger, now = () => new Date() }: EscrowServiceOptions) {
    this.store = store;
    this.transfers = transfers;
    this.primaryToken = primaryToken;
    this.notifications = notifications;
    this.logger = logger;
    this.now = now;
  }

  async create(input: CreateEscrowInput): Promise<EscrowRecord> {
    return this.guarded("create", undefined, async () => {
      const owner = normalizeAddress(input.caller);
      if (!owner) {
        throw new UnauthorizedError("Caller is not a valid address");
      }
      if (input.amount <= 0n) {
        throw new EscrowError("INVALID_AMOUNT", "Amount must be greater than zero");
      }
      if (
        !Number.isSafeInteger(input.durationDays) ||
        input.durationDays <= 0 ||
        input.durationDays > MAX_DURATION_DAYS
      ) {
        throw new EscrowError("INVALID_DURATION", `Duration must be between 1 and ${MAX_DURATION_DAYS} days`);
      }
      if (input.descriptionRef.length === 0) {
        throw new EscrowError("INVALID_DESCRIPTION", "Description reference must not be empty");
      }
      const asset = this.resolveFunding(input.asset, input.amount, input.nativeValue ?? 0n);

      return this.locks.withLock(CREATE_LOCK, async () => {
        const funding: { receipt?: TransferReceipt } = {};
        let record: EscrowRecord;
        try {
          record = await this.store.withTransaction(async (tx) => {
            const createdAt = this.now();
            const deadlineMs = createdAt.getTime() + input.durationDays * DAY_MS;
            if (!(deadlineMs <= MAX_DEADLINE_MS)) {
              throw new EscrowError("INVALID_DURATION", "Deadline falls beyond the supported date range");
            }
            const staged = tx.create({
              owner,
              amount: input.amount,
              asset,
              deadline: new Date(deadlineMs),
              descriptionRef: input.descriptionRef,
              createdAt,
            });
            const receipt = await this.transfer(() =>
              this.transfers.pullFrom(owner, input.amount, asset, input.depositRef)
            );
            funding.receipt = receipt;
            const funded: EscrowRecord = { ...staged, fundingRef: receipt.reference };
            await tx.update(funded);
            return funded;
          });
        } catch (error) {
          if (funding.receipt) {
            await this.returnFunds(owner, input.amount, asset, error);
          }
          throw error;
        }

        this.logger.info("Escrow created", {
          escrowId: record.id,
          owner,
          amount: record.amount,
          asset: assetLabel(asset),
          deadline: record.deadline.toISOString(),
        });
        await this.notify({
          type: "escrow.created",
          escrowId: record.id,
          owner,
          amount: record.amount,
          asset,
          deadline: record.deadline,
          descriptionRef: record.descriptionRef,
          transferRef: funding.receipt?.reference,
        });
        return record;
      });
    });
  }

  async complete(id: number, caller: string, recipient: string): Promise<EscrowRecord> {
    return this.guarded("complete", id, () =>
      this.locks.withLock(recordLock(id), async () => {
        const { record, receipt } = await this.settle(id, (current, now) => {
          this.assertOwner(current, caller);
          this.assertOpen(current);
          if (now.getTime() > current.deadline.getTime()) {
            throw new EscrowError("DEADLINE_EXPIRED", "Deadline has passed; request a refund instead");
          }
          const to = normalizeAddress(recipient);
          if (!to) {
            throw new EscrowError("INVALID_RECIPIENT", "Recipient must be a non-zero address");
          }
          return {
            escrow: current,
            settled: { ...current, recipient: to, status: "COMPLETED", settledAt: now },
            destination: to,
          };
        });

        this.logger.info("Escrow completed", { escrowId: id, recipient: record.recipient, amount: record.amount });
        await this.notify({
          type: "escrow.completed",
          escrowId: id,
          recipient: record.recipient ?? recipient,
          amount: record.amount,
          asset: record.asset,
          transferRef: receipt.reference,
        });
        return record;
      })
    );
  }

  async requestRefund(id: number, caller: string): Promise<EscrowRecord> {
    return this.guarded("requestRefund", id, () => this.settleToOwner(id, caller, "refund"));
  }

  async cancel(id: number, caller: string): Promise<EscrowRecord> {
    return this.guarded("cancel", id, () => this.settleToOwner(id, caller, "cancel"));
  }

  async getRecord(id: number): Promise<EscrowRecord> {
    if (!Number.isSafeInteger(id) || id < 0) {
      throw new NotFoundError(id);
    }
    return this.store.get(id);
  }

  async listRecords(filter?: EscrowFilter): Promise<EscrowRecord[]> {
    return this.store.list(filter);
  }

  getPrimaryTokenAddress(): string {
    return this.primaryToken.get();
  }

  async setPrimaryTokenAddress(caller: string, address: string): Promise<string> {
    return this.primaryToken.set(caller, address);
  }

  private async settleToOwner(id: number, caller: string, mode: SettlementMode): Promise<EscrowRecord> {
    return this.locks.withLock(recordLock(id), async () => {
      const { record, receipt } = await this.settle(id, (current, now) => {
        this.assertOwner(current, caller);
        this.assertOpen(current);
        const expired = now.getTime() > current.deadline.getTime();
        if (mode === "refund" && !expired) {
          throw new EscrowError("DEADLINE_NOT_YET_PASSED", "Deadline has not passed; cancel instead");
        }
        if (mode === "cancel" && expired) {
          throw new EscrowError("DEADLINE_EXPIRED", "Deadline has passed; request a refund instead");
        }
        return {
          escrow: current,
          settled: { ...current, status: "REFUNDED", settledAt: now },
          destination: current.owner,
        };
      });

      this.logger.info("Escrow refunded", { escrowId: id, mode, owner: record.owner, amount: record.amount });
      await this.notify({
        type: "escrow.refunded",
        escrowId: id,
        owner: record.owner,
        amount: record.amount,
        asset: record.asset,
        transferRef: receipt.reference,
      });
      return record;
    });
  }

  /**
   * Marks the record as settling, pays out, then commits the terminal status.
   * A failed payout clears the mark. A failed final commit leaves the mark in
   * place, so the record refuses every later terminal operation.
   */
  private async settle(
    id: number,
    plan: (current: EscrowRecord, now: Date) => SettlementPlan
  ): Promise<{ record: EscrowRecord; receipt: TransferReceipt }> {
    const { escrow, settled, destination } = await this.store.withTransaction(async (tx) => {
      const planned = plan(await tx.get(id), this.now());
      const pendingSettlement: PendingSettlement = {
        status: planned.settled.status,
        destination: planned.destination,
        startedAt: this.now(),
      };
      await tx.update({ ...planned.escrow, pendingSettlement });
      return planned;
    });

    let receipt: TransferReceipt;
    try {
      receipt = await this.transfer(() => this.transfers.pushTo(destination, escrow.amount, escrow.asset));
    } catch (error) {
      await this.clearPendingSettlement(escrow);
      throw error;
    }

    const record: EscrowRecord = { ...settled, pendingSettlement: undefined };
    try {
      await this.store.withTransaction(async (tx) => {
        await tx.update(record);
      });
    } catch (error) {
      this.logger.error("Payout sent but settlement not recorded", {
        escrowId: id,
        destination,
        amount: escrow.amount,
        asset: assetLabel(escrow.asset),
        transferRef: receipt.reference,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
    return { record, receipt };
  }

  // nothing left custody; reopen the record for another attempt
  private async clearPendingSettlement(escrow: EscrowRecord): Promise<void> {
    try {
      await this.store.withTransaction(async (tx) => {
        await tx.update({ ...escrow, pendingSettlement: undefined });
      });
    } catch (error) {
      this.logger.error("Failed to clear settlement mark after failed payout", {
        escrowId: escrow.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private resolveFunding(spec: AssetSpec, amount: bigint, nativeValue: bigint): ResolvedAsset {
    switch (spec.kind) {
      case "NATIVE":
        if (nativeValue !== amount) {
          throw new EscrowError("AMOUNT_MISMATCH", `Attached value ${nativeValue} does not equal amount ${amount}`);
        }
        return NATIVE_ASSET;
      case "PRIMARY_TOKEN":
        if (nativeValue !== 0n) {
          throw new EscrowError("UNEXPECTED_NATIVE_VALUE", "Token escrows must not carry native value");
        }
        return { kind: "TOKEN", address: this.primaryToken.get() };
      case "TOKEN": {
        const address = normalizeAddress(spec.address);
        if (!address) {
          throw new EscrowError("INVALID_ADDRESS", `Invalid token address: ${spec.address}`);
        }
        if (nativeValue !== 0n) {
          throw new EscrowError("UNEXPECTED_NATIVE_VALUE", "Token escrows must not carry native value");
        }
        return { kind: "TOKEN", address };
      }
      default:
        throw new EscrowError("INVALID_ADDRESS", "Unknown asset kind");
    }
  }

  private assertOwner(record: EscrowRecord, caller: string): void {
    if (!normalizeAddress(caller) || !sameAddress(record.owner, caller)) {
      throw new UnauthorizedError();
    }
  }

  private assertOpen(record: EscrowRecord): void {
    if (record.status === "COMPLETED") {
      throw new EscrowError("ALREADY_COMPLETED", `Escrow ${record.id} is already completed`);
    }
    if (record.status === "REFUNDED") {
      throw new EscrowError("ALREADY_REFUNDED", `Escrow ${record.id} is already refunded`);
    }
    if (record.pendingSettlement) {
      throw new EscrowError(
        "SETTLEMENT_PENDING",
        `Escrow ${record.id} has an unrecorded payout to ${record.pendingSettlement.destination}`
      );
    }
  }

  private async transfer(action: () => Promise<TransferReceipt>): Promise<TransferReceipt> {
    try {
      return await action();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransferFailedError(`Asset transfer failed: ${reason}`, error);
    }
  }

  // commit failed after funds were pulled in; send them back
  private async returnFunds(owner: string, amount: bigint, asset: ResolvedAsset, cause: unknown): Promise<void> {
    this.logger.warn("Escrow creation rolled back after funding", {
      owner,
      amount,
      asset: assetLabel(asset),
      error: cause instanceof Error ? cause.message : String(cause),
    });
    try {
      await this.transfers.pushTo(owner, amount, asset);
    } catch (error) {
      this.logger.error("Failed to return funds for rolled back escrow", {
        owner,
        amount,
        asset: assetLabel(asset),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async notify(notification: EscrowNotification): Promise<void> {
    try {
      await this.notifications.publish(notification);
    } catch (error) {
      this.logger.error("Notification sink failed", {
        type: notification.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async guarded<T>(operation: string, id: number | undefined, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (isEscrowError(error, "TRANSFER_FAILED")) {
        this.logger.warn("Escrow transfer failed", { operation, escrowId: id, error: error.message });
      } else if (isEscrowError(error)) {
        this.logger.debug("Escrow operation rejected", { operation, escrowId: id, code: error.code });
      }
      throw error;
    }
  }
}
