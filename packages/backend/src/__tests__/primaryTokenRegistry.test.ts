import { InMemoryDatabase } from "../db/inMemoryDatabase.js";
import { Logger } from "../lib/logger.js";
import { NotificationLog } from "../services/notificationLog.js";
import { PrimaryTokenRegistry } from "../services/primaryTokenRegistry.js";
import { ADMIN, OTHER_TOKEN, OWNER, PRIMARY_TOKEN, ZERO_ADDRESS } from "./harness.js";

const logger = new Logger({ level: "error", environment: "test" });

describe("PrimaryTokenRegistry", () => {
  let notificationLog: NotificationLog;
  let registry: PrimaryTokenRegistry;

  beforeEach(() => {
    notificationLog = new NotificationLog(new InMemoryDatabase());
    registry = new PrimaryTokenRegistry({
      adminAddress: ADMIN,
      initialAddress: PRIMARY_TOKEN,
      logger,
      notifications: notificationLog,
    });
  });

  it("starts from the configured address", () => {
    expect(registry.get()).toBe(PRIMARY_TOKEN);
    expect(registry.admin).toBe(ADMIN);
  });

  it("lets the administrator replace the address and announces the change", async () => {
    await expect(registry.set(ADMIN, OTHER_TOKEN)).resolves.toBe(OTHER_TOKEN);

    expect(registry.get()).toBe(OTHER_TOKEN);
    expect(notificationLog.list("config.primary_token_updated").map((record) => record.notification)).toEqual([
      {
        type: "config.primary_token_updated",
        previousAddress: PRIMARY_TOKEN,
        address: OTHER_TOKEN,
        updatedBy: ADMIN,
      },
    ]);
  });

  it("matches the administrator without regard to case", async () => {
    const mixedAdmin = "0x00000000000000000000000000000000000000aa";
    const mixed = new PrimaryTokenRegistry({ adminAddress: mixedAdmin, initialAddress: PRIMARY_TOKEN, logger });

    await expect(mixed.set("0x00000000000000000000000000000000000000AA", OTHER_TOKEN)).resolves.toBe(OTHER_TOKEN);
  });

  it("rejects anyone else", async () => {
    await expect(registry.set(OWNER, OTHER_TOKEN)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    expect(registry.get()).toBe(PRIMARY_TOKEN);
    expect(notificationLog.list()).toEqual([]);
  });

  it.each([ZERO_ADDRESS, "0xabc", ""])("rejects %p as the new address", async (address) => {
    await expect(registry.set(ADMIN, address)).rejects.toMatchObject({ code: "INVALID_ADDRESS" });
    expect(registry.get()).toBe(PRIMARY_TOKEN);
  });

  it("refuses to start without valid addresses", () => {
    expect(
      () => new PrimaryTokenRegistry({ adminAddress: "nobody", initialAddress: PRIMARY_TOKEN, logger })
    ).toThrow("Invalid administrator address: nobody");
    expect(
      () => new PrimaryTokenRegistry({ adminAddress: ADMIN, initialAddress: ZERO_ADDRESS, logger })
    ).toThrow(`Invalid primary token address: ${ZERO_ADDRESS}`);
  });
});
