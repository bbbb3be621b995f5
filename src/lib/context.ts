import {
  EscrowService,
  InMemoryAssetLedger,
  InMemoryDatabase,
  InMemoryEscrowStore,
  NotificationLog,
  PrimaryTokenRegistry,
  createEthersCustody,
  type AssetTransferAdapter,
  type EscrowStore,
  type Logger,
} from '@escrow-ledger/backend';
import type { ServiceConfig } from '../config.js';
import { FileEscrowStore } from '../db/fileStore.js';

export interface ServiceContext {
  config: ServiceConfig;
  store: EscrowStore;
  transfers: AssetTransferAdapter;
  notificationLog: NotificationLog;
  primaryToken: PrimaryTokenRegistry;
  escrowService: EscrowService;
  logger: Logger;
}

export async function buildContext(config: ServiceConfig, logger: Logger): Promise<ServiceContext> {
  const db = new InMemoryDatabase();
  const notificationLog = new NotificationLog(db);

  const store: EscrowStore = config.useMemoryStore
    ? new InMemoryEscrowStore(db)
    : new FileEscrowStore(config.dataFilePath);

  let transfers: AssetTransferAdapter;
  if (config.custody) {
    const funded = await store.list();
    transfers = createEthersCustody({
      rpcUrl: config.custody.rpcUrl,
      privateKey: config.custody.privateKey,
      confirmations: config.custody.confirmations,
      logger: logger.child('custody'),
      consumedDeposits: funded.flatMap((record) =>
        record.asset.kind === 'NATIVE' && record.fundingRef ? [record.fundingRef] : []
      ),
    });
  } else {
    logger.warn('No chain custody configured; using in-process asset ledger');
    transfers = new InMemoryAssetLedger('in-process-custody');
  }

  const primaryToken = new PrimaryTokenRegistry({
    adminAddress: config.adminAddress,
    initialAddress: config.primaryTokenAddress,
    logger: logger.child('config'),
    notifications: notificationLog,
  });

  const escrowService = new EscrowService({
    store,
    transfers,
    primaryToken,
    notifications: notificationLog,
    logger: logger.child('escrow'),
  });

  return { config, store, transfers, notificationLog, primaryToken, escrowService, logger };
}
