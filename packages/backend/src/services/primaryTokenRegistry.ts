import { EscrowError, UnauthorizedError } from "../errors.js";
import { normalizeAddress, sameAddress } from "../lib/address.js";
import type { Logger } from "../lib/logger.js";
import type { NotificationSink } from "../models/notification.js";

export interface PrimaryTokenRegistryOptions {
  adminAddress: string;
  initialAddress: string;
  logger: Logger;
  notifications?: NotificationSink;
}

/**
 * Process-wide primary-token setting. Created once at startup and passed to
 * the escrow service; only the administrator may change it.
 */
export class PrimaryTokenRegistry {
  private readonly adminAddress: string;
  private current: string;
  private readonly logger: Logger;
  private readonly notifications?: NotificationSink;

  constructor({ adminAddress, initialAddress, logger, notifications }: PrimaryTokenRegistryOptions) {
    const admin = normalizeAddress(adminAddress);
    if (!admin) {
      throw new EscrowError("INVALID_ADDRESS", `Invalid administrator address: ${adminAddress}`);
    }
    const initial = normalizeAddress(initialAddress);
    if (!initial) {
      throw new EscrowError("INVALID_ADDRESS", `Invalid primary token address: ${initialAddress}`);
    }
    this.adminAddress = admin;
    this.current = initial;
    this.logger = logger;
    this.notifications = notifications;
  }

  get(): string {
    return this.current;
  }

  get admin(): string {
    return this.adminAddress;
  }

  async set(caller: string, newAddress: string): Promise<string> {
    if (!sameAddress(caller, this.adminAddress)) {
      this.logger.warn("Rejected primary token update", { caller });
      throw new UnauthorizedError("Only the administrator may change the primary token");
    }
    const address = normalizeAddress(newAddress);
    if (!address) {
      throw new EscrowError("INVALID_ADDRESS", `Invalid primary token address: ${newAddress}`);
    }
    const previousAddress = this.current;
    this.current = address;
    this.logger.info("Primary token updated", { previousAddress, address });

    if (this.notifications) {
      try {
        await this.notifications.publish({
          type: "config.primary_token_updated",
          previousAddress,
          address,
          updatedBy: this.adminAddress,
        });
      } catch (error) {
        this.logger.error("Notification sink failed", {
          type: "config.primary_token_updated",
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return address;
  }
}
