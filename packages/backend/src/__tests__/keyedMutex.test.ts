import { KeyedMutex } from "../lib/keyedMutex.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedMutex", () => {
  it("runs work on the same key one at a time in arrival order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const job = (name: string) =>
      mutex.withLock("escrow:0", async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([job("a"), job("b"), job("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.isLocked("escrow:0")).toBe(false);
  });

  it("does not hold different keys behind each other", async () => {
    const mutex = new KeyedMutex();
    let release: () => void = () => undefined;
    const blocker = mutex.withLock("escrow:0", () => new Promise<void>((resolve) => (release = resolve)));

    await expect(mutex.withLock("escrow:1", async () => "free")).resolves.toBe("free");
    expect(mutex.isLocked("escrow:0")).toBe(true);

    release();
    await blocker;
  });

  it("releases the key when the work rejects", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.withLock("create", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.withLock("create", async () => 1)).resolves.toBe(1);
    expect(mutex.isLocked("create")).toBe(false);
  });
});
