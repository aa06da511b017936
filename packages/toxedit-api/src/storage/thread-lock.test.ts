import { describe, expect, it } from "vitest";
import { ThreadLock } from "./thread-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("ThreadLock", () => {
  it("runs work for one key in arrival order", async () => {
    const lock = new ThreadLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive("thread_a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("thread_a", async () => {
      order.push("second");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not hold other keys", async () => {
    const lock = new ThreadLock();
    const gate = deferred();

    const blocked = lock.runExclusive("thread_a", () => gate.promise);
    await expect(lock.runExclusive("thread_b", async () => "free")).resolves.toBe("free");

    gate.resolve();
    await blocked;
  });

  it("releases the key after a failure", async () => {
    const lock = new ThreadLock();

    await expect(
      lock.runExclusive("thread_a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.runExclusive("thread_a", async () => "next")).resolves.toBe("next");
    expect(lock.isLocked("thread_a")).toBe(false);
  });
});
