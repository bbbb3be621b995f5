import { InMemoryDatabase } from "../db/inMemoryDatabase.js";
import { Logger } from "../lib/logger.js";
import type { NotificationSink } from "../models/notification.js";
import { InMemoryAssetLedger } from "../services/assetTransfer.js";
import { EscrowService } from "../services/escrowService.js";
import { InMemoryEscrowStore, type EscrowStore } from "../services/escrowStore.js";
import { NotificationLog } from "../services/notificationLog.js";
import { PrimaryTokenRegistry } from "../services/primaryTokenRegistry.js";

// digit-only addresses keep their checksummed form unchanged
export const OWNER = "0x0000000000000000000000000000000000000011";
export const RECIPIENT = "0x0000000000000000000000000000000000000022";
export const STRANGER = "0x0000000000000000000000000000000000000033";
export const ADMIN = "0x0000000000000000000000000000000000000099";
export const PRIMARY_TOKEN = "0x0000000000000000000000000000000000001001";
export const OTHER_TOKEN = "0x0000000000000000000000000000000000002002";
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";
export const CUSTODY = "custody";

export const START = new Date("2026-01-01T00:00:00.000Z");

export interface HarnessOptions {
  notifications?: NotificationSink;
  store?: (db: InMemoryDatabase) => EscrowStore;
}

export function buildHarness(options: HarnessOptions = {}) {
  const clock = { now: new Date(START.getTime()) };
  const db = new InMemoryDatabase();
  const notificationLog = new NotificationLog(db);
  const store = options.store ? options.store(db) : new InMemoryEscrowStore(db);
  const ledger = new InMemoryAssetLedger(CUSTODY);
  const logger = new Logger({ level: "error", environment: "test" });
  const notifications = options.notifications ?? notificationLog;
  const primaryToken = new PrimaryTokenRegistry({
    adminAddress: ADMIN,
    initialAddress: PRIMARY_TOKEN,
    logger,
    notifications,
  });
  const service = new EscrowService({
    store,
    transfers: ledger,
    primaryToken,
    notifications,
    logger,
    now: () => clock.now,
  });

  return {
    clock,
    db,
    notificationLog,
    store,
    ledger,
    logger,
    primaryToken,
    service,
    advance(ms: number) {
      clock.now = new Date(clock.now.getTime() + ms);
    },
  };
}

export type Harness = ReturnType<typeof buildHarness>;
