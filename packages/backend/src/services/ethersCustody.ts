import { ethers } from "ethers";

import { sameAddress } from "../lib/address.js";
import type { Logger } from "../lib/logger.js";
import { assetLabel, type ResolvedAsset } from "../models/escrow.js";
import type { AssetTransferAdapter, TransferReceipt } from "./assetTransfer.js";

export const ERC20_ABI = [
  "function transfer(address to, uint256 amount) returns (bool)",
  "function transferFrom(address from, address to, uint256 amount) returns (bool)",
] as const;

export interface SubmittedTransaction {
  hash: string;
  wait(confirmations?: number): Promise<{ status: number | null } | null>;
}

export interface TokenContractAdapter {
  transfer(to: string, amount: bigint): Promise<SubmittedTransaction>;
  transferFrom(from: string, to: string, amount: bigint): Promise<SubmittedTransaction>;
}

export interface CustodySigner {
  sendTransaction(tx: { to: string; value: bigint }): Promise<SubmittedTransaction>;
}

/** Chain reads used to confirm a native deposit into custody. */
export interface DepositLookup {
  getTransaction(hash: string): Promise<{ from: string; to: string | null; value: bigint } | null>;
  getTransactionReceipt(hash: string): Promise<{ status: number | null } | null>;
}

export interface EthersCustodyOptions {
  custodyAddress: string;
  signer: CustodySigner;
  tokenAt: (address: string) => TokenContractAdapter;
  deposits: DepositLookup;
  /** Deposit hashes already backing an escrow, restored from the store. */
  consumedDeposits?: Iterable<string>;
  logger: Logger;
  confirmations?: number;
}

export class MissingCustodyKeyError extends Error {
  constructor() {
    super("ESCROW_CUSTODY_PRIVATE_KEY env var is required for on-chain custody");
  }
}

export class DepositRejectedError extends Error {
  constructor(reason: string) {
    super(`Native deposit rejected: ${reason}`);
  }
}

export class RevertedTransactionError extends Error {
  constructor(readonly hash: string) {
    super(`Transaction ${hash} reverted`);
  }
}

/**
 * Custody held by a single ethers signer. Tokens are pulled with
 * `transferFrom` against the owner's prior approval and paid out with
 * `transfer`; native payouts are plain value transfers.
 *
 * Native funding is a transfer the owner already sent to the custody address.
 * Its hash is checked on chain (sender, recipient, value, success) and may back
 * one escrow only.
 */
export class EthersCustody implements AssetTransferAdapter {
  readonly custodyAddress: string;
  private readonly signer: CustodySigner;
  private readonly tokenAt: (address: string) => TokenContractAdapter;
  private readonly deposits: DepositLookup;
  private readonly consumed: Set<string>;
  private readonly logger: Logger;
  private readonly confirmations: number;

  constructor({
    custodyAddress,
    signer,
    tokenAt,
    deposits,
    consumedDeposits = [],
    logger,
    confirmations = 1,
  }: EthersCustodyOptions) {
    this.custodyAddress = custodyAddress;
    this.signer = signer;
    this.tokenAt = tokenAt;
    this.deposits = deposits;
    this.consumed = new Set([...consumedDeposits].map((hash) => hash.toLowerCase()));
    this.logger = logger;
    this.confirmations = confirmations;
  }

  async pullFrom(source: string, amount: bigint, asset: ResolvedAsset, depositRef?: string): Promise<TransferReceipt> {
    if (asset.kind === "NATIVE") {
      return this.claimDeposit(source, amount, depositRef);
    }
    const tx = await this.tokenAt(asset.address).transferFrom(source, this.custodyAddress, amount);
    return this.confirm(tx, "pull", source, amount, asset);
  }

  async pushTo(destination: string, amount: bigint, asset: ResolvedAsset): Promise<TransferReceipt> {
    const tx =
      asset.kind === "NATIVE"
        ? await this.signer.sendTransaction({ to: destination, value: amount })
        : await this.tokenAt(asset.address).transfer(destination, amount);
    return this.confirm(tx, "push", destination, amount, asset);
  }

  private async claimDeposit(source: string, amount: bigint, depositRef: string | undefined): Promise<TransferReceipt> {
    if (!depositRef || !ethers.isHexString(depositRef, 32)) {
      throw new DepositRejectedError("a deposit transaction hash is required");
    }
    const hash = depositRef.toLowerCase();
    if (this.consumed.has(hash)) {
      throw new DepositRejectedError(`${hash} already funds an escrow`);
    }
    // reserved while the chain is queried
    this.consumed.add(hash);
    try {
      await this.verifyDeposit(hash, source, amount);
    } catch (error) {
      this.consumed.delete(hash);
      throw error;
    }
    this.logger.info("Native deposit accepted", { source, amount: amount.toString(), txHash: hash });
    return { reference: hash };
  }

  private async verifyDeposit(hash: string, source: string, amount: bigint): Promise<void> {
    const tx = await this.deposits.getTransaction(hash);
    if (!tx) {
      throw new DepositRejectedError(`${hash} is unknown`);
    }
    if (!sameAddress(tx.from, source) || !tx.to || !sameAddress(tx.to, this.custodyAddress)) {
      throw new DepositRejectedError(`${hash} is not a transfer from ${source} to custody`);
    }
    if (tx.value !== amount) {
      throw new DepositRejectedError(`${hash} carries ${tx.value}, expected ${amount}`);
    }
    const receipt = await this.deposits.getTransactionReceipt(hash);
    if (!receipt || receipt.status !== 1) {
      throw new DepositRejectedError(`${hash} did not succeed`);
    }
  }

  private async confirm(
    tx: SubmittedTransaction,
    direction: "pull" | "push",
    counterparty: string,
    amount: bigint,
    asset: ResolvedAsset
  ): Promise<TransferReceipt> {
    const receipt = await tx.wait(this.confirmations);
    if (receipt && receipt.status === 0) {
      throw new RevertedTransactionError(tx.hash);
    }
    this.logger.info("Custody transfer confirmed", {
      direction,
      counterparty,
      amount: amount.toString(),
      asset: assetLabel(asset),
      txHash: tx.hash,
    });
    return { reference: tx.hash };
  }
}

function erc20(address: string, runner: ethers.ContractRunner): TokenContractAdapter {
  const contract = new ethers.Contract(address, ERC20_ABI, runner);
  return {
    transfer: (to, amount) => contract.getFunction("transfer")(to, amount),
    transferFrom: (from, to, amount) => contract.getFunction("transferFrom")(from, to, amount),
  };
}

export function createEthersCustody({
  rpcUrl,
  privateKey,
  logger,
  confirmations,
  consumedDeposits,
}: {
  rpcUrl: string;
  privateKey: string | undefined;
  logger: Logger;
  confirmations?: number;
  consumedDeposits?: Iterable<string>;
}): EthersCustody {
  if (!privateKey) {
    throw new MissingCustodyKeyError();
  }
  const provider = new ethers.JsonRpcProvider(rpcUrl);
  const wallet = new ethers.Wallet(privateKey, provider);
  return new EthersCustody({
    custodyAddress: wallet.address,
    signer: wallet,
    tokenAt: (address) => erc20(address, wallet),
    deposits: provider,
    consumedDeposits,
    logger,
    confirmations,
  });
}
