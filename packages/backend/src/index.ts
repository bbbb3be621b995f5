export { createApp, type AppDependencies } from "./app.js";
export { InMemoryDatabase } from "./db/inMemoryDatabase.js";
export {
  EscrowError,
  NotFoundError,
  TransferFailedError,
  UnauthorizedError,
  isEscrowError,
  type EscrowErrorCode,
} from "./errors.js";
export { runDeadlineWatchdog, type WatchdogSummary } from "./jobs/deadlineWatchdog.js";
export { normalizeAddress, sameAddress } from "./lib/address.js";
export { KeyedMutex } from "./lib/keyedMutex.js";
export { Logger, logger, parseLogLevel, type LogLevel } from "./lib/logger.js";
export * from "./models/escrow.js";
export type * from "./models/notification.js";
export {
  InMemoryAssetLedger,
  type AssetTransferAdapter,
  type TransferReceipt,
} from "./services/assetTransfer.js";
export {
  DepositRejectedError,
  EthersCustody,
  createEthersCustody,
  type DepositLookup,
} from "./services/ethersCustody.js";
export { EscrowService, type CreateEscrowInput } from "./services/escrowService.js";
export {
  InMemoryEscrowStore,
  StagedEscrowTransaction,
  ConcurrentCreationError,
  matchesFilter,
  type EscrowStore,
  type EscrowTransaction,
  type StagedChanges,
} from "./services/escrowStore.js";
export { NotificationLog } from "./services/notificationLog.js";
export { PrimaryTokenRegistry } from "./services/primaryTokenRegistry.js";
