export type EscrowStatus = "OPEN" | "COMPLETED" | "REFUNDED";

export const ESCROW_STATUSES: readonly EscrowStatus[] = ["OPEN", "COMPLETED", "REFUNDED"];

/**
 * How the caller asks to fund an escrow. `PRIMARY_TOKEN` is resolved to the
 * configured primary-token address at creation time.
 */
export type AssetSpec =
  | { kind: "NATIVE" }
  | { kind: "PRIMARY_TOKEN" }
  | { kind: "TOKEN"; address: string };

/** The asset a record actually holds once created. */
export type ResolvedAsset = { kind: "NATIVE" } | { kind: "TOKEN"; address: string };

export const NATIVE_ASSET: ResolvedAsset = { kind: "NATIVE" };

/**
 * Written before a payout leaves custody and cleared when the terminal status
 * is committed. A record carrying one accepts no further terminal operation.
 */
export interface PendingSettlement {
  status: "COMPLETED" | "REFUNDED";
  destination: string;
  startedAt: Date;
}

export interface EscrowRecord {
  id: number;
  owner: string;
  recipient?: string;
  amount: bigint;
  asset: ResolvedAsset;
  deadline: Date;
  descriptionRef: string;
  status: EscrowStatus;
  createdAt: Date;
  settledAt?: Date;
  /** Reference of the transfer that funded the escrow. */
  fundingRef?: string;
  pendingSettlement?: PendingSettlement;
}

export type NewEscrowRecord = Omit<EscrowRecord, "id" | "status" | "recipient" | "settledAt" | "pendingSettlement">;

export interface EscrowFilter {
  owner?: string;
  status?: EscrowStatus;
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export const MAX_DURATION_DAYS = 36_500;

// 9999-12-31T23:59:59.999Z; later instants have no plain ISO-8601 form
export const MAX_DEADLINE_MS = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

export function assetLabel(asset: ResolvedAsset): string {
  return asset.kind === "NATIVE" ? "native" : asset.address;
}

export function cloneRecord(record: EscrowRecord): EscrowRecord {
  return {
    ...record,
    asset: { ...record.asset },
    deadline: new Date(record.deadline.getTime()),
    createdAt: new Date(record.createdAt.getTime()),
    settledAt: record.settledAt ? new Date(record.settledAt.getTime()) : undefined,
    pendingSettlement: record.pendingSettlement
      ? { ...record.pendingSettlement, startedAt: new Date(record.pendingSettlement.startedAt.getTime()) }
      : undefined,
  };
}
