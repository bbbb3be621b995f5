import { randomUUID } from "node:crypto";

import type { InMemoryDatabase } from "../db/inMemoryDatabase.js";
import type {
  EscrowNotification,
  NotificationRecord,
  NotificationSink,
  NotificationType,
} from "../models/notification.js";

export class NotificationLog implements NotificationSink {
  private readonly records: NotificationRecord[] = [];
  private readonly byEscrow = new Map<number, NotificationRecord[]>();

  constructor(private readonly db: InMemoryDatabase) {}

  publish(notification: EscrowNotification): void {
    this.append(notification);
  }

  append(notification: EscrowNotification): NotificationRecord {
    const statement = this.db.prepare<[NotificationRecord], NotificationRecord>(
      "insert_notification",
      (record) => {
        this.records.push(record);
        if ("escrowId" in record.notification) {
          const escrowId = record.notification.escrowId;
          const bucket = this.byEscrow.get(escrowId);
          if (bucket) bucket.push(record);
          else this.byEscrow.set(escrowId, [record]);
        }
        return record;
      }
    );

    const record: NotificationRecord = {
      id: randomUUID(),
      type: notification.type,
      notification,
      createdAt: new Date(),
    };

    return statement.run(record);
  }

  list(type?: NotificationType): NotificationRecord[] {
    return type ? this.records.filter((record) => record.type === type) : [...this.records];
  }

  forEscrow(escrowId: number): NotificationRecord[] {
    return [...(this.byEscrow.get(escrowId) ?? [])];
  }
}
