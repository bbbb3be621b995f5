import type { Logger } from "../lib/logger.js";
import type { EscrowRecord } from "../models/escrow.js";
import type { EscrowStore } from "../services/escrowStore.js";
import type { NotificationLog } from "../services/notificationLog.js";

export interface WatchdogDependencies {
  store: EscrowStore;
  notificationLog: NotificationLog;
  dispatchReminder: (payload: { escrow: EscrowRecord; hoursBefore: number }) => Promise<void>;
  logger?: Logger;
  now?: Date;
}

export interface WatchdogSummary {
  reminders: number;
  refundable: number;
}

const REMINDER_WINDOWS = [72, 24, 6];

/**
 * Reports open escrows approaching or past their deadline. Read-only with
 * respect to escrow state; refunds stay with the owner.
 */
export async function runDeadlineWatchdog({
  store,
  notificationLog,
  dispatchReminder,
  logger,
  now = new Date(),
}: WatchdogDependencies): Promise<WatchdogSummary> {
  const summary: WatchdogSummary = { reminders: 0, refundable: 0 };

  for (const escrow of await store.list({ status: "OPEN" })) {
    // a payout is in flight; the record is not really open
    if (escrow.pendingSettlement) continue;

    const history = notificationLog.forEscrow(escrow.id);
    const msUntilDeadline = escrow.deadline.getTime() - now.getTime();
    if (msUntilDeadline >= 0) {
      const hoursUntilDeadline = Math.floor(msUntilDeadline / (1000 * 60 * 60));
      for (const window of REMINDER_WINDOWS) {
        const alreadyReminded = history.some(
          (record) =>
            record.notification.type === "escrow.watchdog.reminder" && record.notification.hoursBefore === window
        );
        if (hoursUntilDeadline === window && !alreadyReminded) {
          await dispatchReminder({ escrow, hoursBefore: window });
          notificationLog.append({
            type: "escrow.watchdog.reminder",
            escrowId: escrow.id,
            owner: escrow.owner,
            hoursBefore: window,
          });
          summary.reminders += 1;
        }
      }
      continue;
    }

    const alreadyFlagged = history.some((record) => record.type === "escrow.watchdog.refundable");
    if (!alreadyFlagged) {
      notificationLog.append({
        type: "escrow.watchdog.refundable",
        escrowId: escrow.id,
        owner: escrow.owner,
        deadline: escrow.deadline,
      });
      summary.refundable += 1;
    }
  }

  logger?.debug("Deadline watchdog finished", { ...summary });
  return summary;
}
