import { assetLabel, type ResolvedAsset } from "../models/escrow.js";

export interface TransferReceipt {
  /** Transaction hash or ledger entry id, when the backend produces one. */
  reference?: string;
}

/**
 * Moves value in and out of escrow custody. Each call either moves the whole
 * amount or rejects having moved nothing.
 *
 * For the native asset, `pullFrom` accounts for value the owner already sent
 * to custody rather than drawing on an allowance; `depositRef` names that
 * deposit where the backend can check it.
 */
export interface AssetTransferAdapter {
  readonly custodyAddress: string;
  pullFrom(source: string, amount: bigint, asset: ResolvedAsset, depositRef?: string): Promise<TransferReceipt>;
  pushTo(destination: string, amount: bigint, asset: ResolvedAsset): Promise<TransferReceipt>;
}

export class InsufficientBalanceError extends Error {
  constructor(holder: string, asset: ResolvedAsset, balance: bigint, amount: bigint) {
    super(`Balance of ${holder} in ${assetLabel(asset)} is ${balance}, needs ${amount}`);
  }
}

export class InsufficientAllowanceError extends Error {
  constructor(owner: string, token: string, allowance: bigint, amount: bigint) {
    super(`Allowance of ${owner} for ${token} is ${allowance}, needs ${amount}`);
  }
}

export class BlockedHolderError extends Error {
  constructor(holder: string) {
    super(`Holder ${holder} cannot receive transfers`);
  }
}

export interface LedgerTransfer {
  reference: string;
  from: string;
  to: string;
  amount: bigint;
  asset: ResolvedAsset;
}

function assetKey(asset: ResolvedAsset): string {
  return asset.kind === "NATIVE" ? "native" : asset.address.toLowerCase();
}

/**
 * Balance-sheet ledger kept in process. Custody is an ordinary holder, so
 * anything paid out must first have been pulled in.
 */
export class InMemoryAssetLedger implements AssetTransferAdapter {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly blocked = new Set<string>();
  private readonly history: LedgerTransfer[] = [];

  constructor(readonly custodyAddress: string) {}

  mint(holder: string, asset: ResolvedAsset, amount: bigint): void {
    const key = this.balanceKey(holder, asset);
    this.balances.set(key, (this.balances.get(key) ?? 0n) + amount);
  }

  approve(owner: string, token: string, amount: bigint): void {
    this.allowances.set(this.allowanceKey(owner, token), amount);
  }

  block(holder: string): void {
    this.blocked.add(holder.toLowerCase());
  }

  unblock(holder: string): void {
    this.blocked.delete(holder.toLowerCase());
  }

  balanceOf(holder: string, asset: ResolvedAsset): bigint {
    return this.balances.get(this.balanceKey(holder, asset)) ?? 0n;
  }

  allowance(owner: string, token: string): bigint {
    return this.allowances.get(this.allowanceKey(owner, token)) ?? 0n;
  }

  transfers(): LedgerTransfer[] {
    return [...this.history];
  }

  async pullFrom(source: string, amount: bigint, asset: ResolvedAsset): Promise<TransferReceipt> {
    if (asset.kind === "TOKEN") {
      const allowance = this.allowance(source, asset.address);
      if (allowance < amount) {
        throw new InsufficientAllowanceError(source, asset.address, allowance, amount);
      }
      const entry = this.move(source, this.custodyAddress, amount, asset);
      this.allowances.set(this.allowanceKey(source, asset.address), allowance - amount);
      return { reference: entry.reference };
    }
    const entry = this.move(source, this.custodyAddress, amount, asset);
    return { reference: entry.reference };
  }

  async pushTo(destination: string, amount: bigint, asset: ResolvedAsset): Promise<TransferReceipt> {
    const entry = this.move(this.custodyAddress, destination, amount, asset);
    return { reference: entry.reference };
  }

  private move(from: string, to: string, amount: bigint, asset: ResolvedAsset): LedgerTransfer {
    if (this.blocked.has(to.toLowerCase())) {
      throw new BlockedHolderError(to);
    }
    const balance = this.balanceOf(from, asset);
    if (balance < amount) {
      throw new InsufficientBalanceError(from, asset, balance, amount);
    }
    this.balances.set(this.balanceKey(from, asset), balance - amount);
    this.mint(to, asset, amount);
    const entry: LedgerTransfer = {
      reference: `ledger-${this.history.length + 1}`,
      from,
      to,
      amount,
      asset,
    };
    this.history.push(entry);
    return entry;
  }

  private balanceKey(holder: string, asset: ResolvedAsset): string {
    return `${assetKey(asset)}:${holder.toLowerCase()}`;
  }

  private allowanceKey(owner: string, token: string): string {
    return `${token.toLowerCase()}:${owner.toLowerCase()}`;
  }
}
