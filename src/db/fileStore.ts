import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import {
  ConcurrentCreationError,
  KeyedMutex,
  MAX_DEADLINE_MS,
  NotFoundError,
  StagedEscrowTransaction,
  cloneRecord,
  matchesFilter,
  type EscrowFilter,
  type EscrowRecord,
  type EscrowStore,
  type EscrowTransaction,
} from '@escrow-ledger/backend';

const FILE_LOCKS = new KeyedMutex();

const assetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('NATIVE') }),
  z.object({ kind: z.literal('TOKEN'), address: z.string() }),
]);

const epochMs = z.number().int().min(-MAX_DEADLINE_MS).max(MAX_DEADLINE_MS);

const pendingSettlementSchema = z.object({
  status: z.enum(['COMPLETED', 'REFUNDED']),
  destination: z.string(),
  startedAt: epochMs,
});

// dates are epoch milliseconds
const recordSchema = z.object({
  id: z.number().int().nonnegative(),
  owner: z.string(),
  recipient: z.string().nullable(),
  amount: z.string().regex(/^\d+$/).transform((value) => BigInt(value)),
  asset: assetSchema,
  deadline: epochMs,
  descriptionRef: z.string(),
  status: z.enum(['OPEN', 'COMPLETED', 'REFUNDED']),
  createdAt: epochMs,
  settledAt: epochMs.nullable(),
  fundingRef: z.string().nullable(),
  pendingSettlement: pendingSettlementSchema.nullable(),
});

const fileSchema = z.object({
  nextId: z.number().int().nonnegative(),
  records: z.array(recordSchema),
});

type StoredRecord = z.input<typeof recordSchema>;

interface FileState {
  nextId: number;
  records: Map<number, EscrowRecord>;
}

const EMPTY_FILE = JSON.stringify({ nextId: 0, records: [] }, null, 2);

async function ensureFile(filePath: string): Promise<void> {
  try {
    await fs.access(filePath);
  } catch {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, EMPTY_FILE, 'utf8');
  }
}

function toStored(record: EscrowRecord): StoredRecord {
  return {
    id: record.id,
    owner: record.owner,
    recipient: record.recipient ?? null,
    amount: record.amount.toString(),
    asset: record.asset,
    deadline: record.deadline.getTime(),
    descriptionRef: record.descriptionRef,
    status: record.status,
    createdAt: record.createdAt.getTime(),
    settledAt: record.settledAt?.getTime() ?? null,
    fundingRef: record.fundingRef ?? null,
    pendingSettlement: record.pendingSettlement
      ? { ...record.pendingSettlement, startedAt: record.pendingSettlement.startedAt.getTime() }
      : null,
  };
}

function fromStored(stored: z.output<typeof recordSchema>): EscrowRecord {
  return {
    id: stored.id,
    owner: stored.owner,
    recipient: stored.recipient ?? undefined,
    amount: stored.amount,
    asset: stored.asset,
    deadline: new Date(stored.deadline),
    descriptionRef: stored.descriptionRef,
    status: stored.status,
    createdAt: new Date(stored.createdAt),
    settledAt: stored.settledAt === null ? undefined : new Date(stored.settledAt),
    fundingRef: stored.fundingRef ?? undefined,
    pendingSettlement: stored.pendingSettlement
      ? { ...stored.pendingSettlement, startedAt: new Date(stored.pendingSettlement.startedAt) }
      : undefined,
  };
}

/**
 * Escrow records persisted as one JSON document. The id counter is stored
 * with the records, so ids keep increasing across restarts.
 */
export class FileEscrowStore implements EscrowStore {
  constructor(private readonly filePath: string) {}

  async get(id: number): Promise<EscrowRecord> {
    const { records } = await this.readState();
    const record = records.get(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return record;
  }

  async list(filter?: EscrowFilter): Promise<EscrowRecord[]> {
    const { records } = await this.readState();
    return [...records.values()].filter((record) => matchesFilter(record, filter)).sort((a, b) => a.id - b.id);
  }

  async nextId(): Promise<number> {
    const { nextId } = await this.readState();
    return nextId;
  }

  async withTransaction<T>(fn: (tx: EscrowTransaction) => Promise<T>): Promise<T> {
    const snapshot = await this.readState();
    const tx = new StagedEscrowTransaction(async (id) => (await this.readState()).records.get(id), snapshot.nextId);
    const result = await fn(tx);
    const changes = tx.changes();
    if (changes.inserts.length === 0 && changes.updates.length === 0) {
      return result;
    }

    await FILE_LOCKS.withLock(this.filePath, async () => {
      const state = await this.readState();
      if (changes.inserts.length > 0 && state.nextId !== changes.baseNextId) {
        throw new ConcurrentCreationError(changes.baseNextId, state.nextId);
      }
      for (const record of [...changes.inserts, ...changes.updates]) {
        state.records.set(record.id, cloneRecord(record));
      }
      if (changes.inserts.length > 0) {
        state.nextId = changes.nextId;
      }
      await this.writeState(state);
    });
    return result;
  }

  private async readState(): Promise<FileState> {
    await ensureFile(this.filePath);
    const raw = await fs.readFile(this.filePath, 'utf8');
    const parsed = fileSchema.parse(JSON.parse(raw));
    return {
      nextId: parsed.nextId,
      records: new Map(parsed.records.map((stored): [number, EscrowRecord] => [stored.id, fromStored(stored)])),
    };
  }

  // replaced by rename, never rewritten in place
  private async writeState(state: FileState): Promise<void> {
    const document = {
      nextId: state.nextId,
      records: [...state.records.values()].sort((a, b) => a.id - b.id).map(toStored),
    };
    // a document that would not read back is never written
    fileSchema.parse(document);
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf8');
    await fs.rename(tempPath, this.filePath);
  }
}
