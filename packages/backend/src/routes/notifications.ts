import express from "express";
import { z } from "zod";

import type { NotificationType } from "../models/notification.js";
import type { NotificationLog } from "../services/notificationLog.js";

const NOTIFICATION_TYPES: readonly NotificationType[] = [
  "escrow.created",
  "escrow.completed",
  "escrow.refunded",
  "config.primary_token_updated",
  "escrow.watchdog.reminder",
  "escrow.watchdog.refundable",
];

export function createNotificationsRouter(notificationLog: NotificationLog) {
  const router = express.Router();

  const querySchema = z.object({
    type: z
      .custom<NotificationType>(
        (value) => typeof value === "string" && NOTIFICATION_TYPES.some((type) => type === value),
        "Unknown notification type"
      )
      .optional(),
    escrowId: z.string().regex(/^\d+$/).optional(),
  });

  router.get("/", (req, res, next) => {
    try {
      const { type, escrowId } = querySchema.parse(req.query);
      let records = escrowId === undefined ? notificationLog.list() : notificationLog.forEscrow(Number(escrowId));
      if (type) {
        records = records.filter((record) => record.type === type);
      }
      res.json({ notifications: records });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
