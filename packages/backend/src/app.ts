import express from "express";

import type { Logger } from "./lib/logger.js";
import { createAdminRouter } from "./routes/admin.js";
import { createErrorHandler } from "./routes/errorHandler.js";
import { createEscrowsRouter } from "./routes/escrows.js";
import { createNotificationsRouter } from "./routes/notifications.js";
import type { EscrowService } from "./services/escrowService.js";
import type { NotificationLog } from "./services/notificationLog.js";

export interface AppDependencies {
  escrowService: EscrowService;
  notificationLog: NotificationLog;
  logger: Logger;
}

export function createApp({ escrowService, notificationLog, logger }: AppDependencies) {
  const app = express();
  // bigint amounts inside notification payloads
  app.set("json replacer", (_key: string, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });
  app.use("/escrows", createEscrowsRouter(escrowService));
  app.use("/admin", createAdminRouter(escrowService));
  app.use("/notifications", createNotificationsRouter(notificationLog));
  app.use(createErrorHandler(logger));

  return app;
}
