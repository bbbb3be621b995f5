import type { InMemoryDatabase } from "../db/inMemoryDatabase.js";
import { NotFoundError } from "../errors.js";
import { sameAddress } from "../lib/address.js";
import {
  cloneRecord,
  type EscrowFilter,
  type EscrowRecord,
  type NewEscrowRecord,
} from "../models/escrow.js";

/** Staging view handed to `withTransaction` callbacks. */
export interface EscrowTransaction {
  get(id: number): Promise<EscrowRecord>;
  create(input: NewEscrowRecord): EscrowRecord;
  update(record: EscrowRecord): Promise<void>;
}

export interface EscrowStore {
  get(id: number): Promise<EscrowRecord>;
  list(filter?: EscrowFilter): Promise<EscrowRecord[]>;
  nextId(): Promise<number>;
  /**
   * Runs `fn` against staged state. Writes are applied only after `fn`
   * resolves; a rejection discards them and leaves the id counter untouched.
   */
  withTransaction<T>(fn: (tx: EscrowTransaction) => Promise<T>): Promise<T>;
}

export interface StagedChanges {
  baseNextId: number;
  nextId: number;
  inserts: EscrowRecord[];
  updates: EscrowRecord[];
}

export class ConcurrentCreationError extends Error {
  constructor(expected: number, actual: number) {
    super(`Escrow id counter moved from ${expected} to ${actual} during a transaction`);
  }
}

export class StagedEscrowTransaction implements EscrowTransaction {
  private readonly inserts = new Map<number, EscrowRecord>();
  private readonly updates = new Map<number, EscrowRecord>();
  private pendingNextId: number;

  constructor(
    private readonly readCommitted: (id: number) => Promise<EscrowRecord | undefined>,
    private readonly baseNextId: number
  ) {
    this.pendingNextId = baseNextId;
  }

  async get(id: number): Promise<EscrowRecord> {
    const staged = this.inserts.get(id) ?? this.updates.get(id);
    if (staged) {
      return cloneRecord(staged);
    }
    const committed = await this.readCommitted(id);
    if (!committed) {
      throw new NotFoundError(id);
    }
    return cloneRecord(committed);
  }

  create(input: NewEscrowRecord): EscrowRecord {
    const record: EscrowRecord = {
      ...input,
      id: this.pendingNextId,
      status: "OPEN",
    };
    this.pendingNextId += 1;
    this.inserts.set(record.id, cloneRecord(record));
    return cloneRecord(record);
  }

  async update(record: EscrowRecord): Promise<void> {
    if (this.inserts.has(record.id)) {
      this.inserts.set(record.id, cloneRecord(record));
      return;
    }
    if (!this.updates.has(record.id) && !(await this.readCommitted(record.id))) {
      throw new NotFoundError(record.id);
    }
    this.updates.set(record.id, cloneRecord(record));
  }

  changes(): StagedChanges {
    return {
      baseNextId: this.baseNextId,
      nextId: this.pendingNextId,
      inserts: [...this.inserts.values()],
      updates: [...this.updates.values()],
    };
  }
}

export function matchesFilter(record: EscrowRecord, filter: EscrowFilter = {}): boolean {
  if (filter.owner && !sameAddress(record.owner, filter.owner)) {
    return false;
  }
  if (filter.status && record.status !== filter.status) {
    return false;
  }
  return true;
}

export class InMemoryEscrowStore implements EscrowStore {
  private readonly records = new Map<number, EscrowRecord>();
  private counter = 0;

  constructor(private readonly db: InMemoryDatabase) {}

  async get(id: number): Promise<EscrowRecord> {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return cloneRecord(record);
  }

  async list(filter?: EscrowFilter): Promise<EscrowRecord[]> {
    return [...this.records.values()]
      .filter((record) => matchesFilter(record, filter))
      .sort((a, b) => a.id - b.id)
      .map(cloneRecord);
  }

  async nextId(): Promise<number> {
    return this.counter;
  }

  async withTransaction<T>(fn: (tx: EscrowTransaction) => Promise<T>): Promise<T> {
    const tx = new StagedEscrowTransaction(async (id) => this.records.get(id), this.counter);
    const result = await fn(tx);
    this.commit(tx.changes());
    return result;
  }

  private commit(changes: StagedChanges): void {
    if (changes.inserts.length > 0 && changes.baseNextId !== this.counter) {
      throw new ConcurrentCreationError(changes.baseNextId, this.counter);
    }
    const insert = this.db.prepare<[EscrowRecord], EscrowRecord>("insert_escrow", (record) => {
      this.records.set(record.id, record);
      return record;
    });
    const update = this.db.prepare<[EscrowRecord], EscrowRecord>("update_escrow", (record) => {
      this.records.set(record.id, record);
      return record;
    });
    for (const record of changes.inserts) {
      insert.run(record);
    }
    for (const record of changes.updates) {
      update.run(record);
    }
    if (changes.inserts.length > 0) {
      this.counter = changes.nextId;
    }
  }
}
