import { describe, expect, it } from "vitest";
import { InMemoryRecordStore } from "./in-memory-record-store.js";

function fixedClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 2, 1, 10, 0, tick++));
}

describe("InMemoryRecordStore", () => {
  it("numbers versions per thread starting at one", () => {
    const store = new InMemoryRecordStore({ now: fixedClock() });

    const first = store.save({ threadId: "thread_a", record: { inci: "CITRAL" }, summary: "seed" });
    const second = store.save({ threadId: "thread_a", record: { inci: "CITRAL", DAP: [] }, summary: "edit" });
    const other = store.save({ threadId: "thread_b", record: { inci: "LINALOOL" }, summary: "seed" });

    expect([first.version, second.version, other.version]).toEqual([1, 2, 1]);
    expect(first.createdAt).toBe("2026-03-01T10:00:00.000Z");
    expect(store.current("thread_a")?.version).toBe(2);
  });

  it("defaults the ingredient tag and batch flag", () => {
    const store = new InMemoryRecordStore();

    const single = store.save({ threadId: "thread_a", record: { inci: " citral " }, summary: "seed" });
    const batched = store.save({
      threadId: "thread_b",
      record: { inci: "LINALOOL" },
      summary: "seed",
      batchId: "batch_1",
    });

    expect(single.ingredientTag).toBe("CITRAL");
    expect(single.isBatchItem).toBe(false);
    expect(batched.isBatchItem).toBe(true);
    expect(store.byBatch("batch_1").map((entry) => entry.threadId)).toEqual(["thread_b"]);
    expect(store.byIngredient("citral").map((entry) => entry.threadId)).toEqual(["thread_a"]);
  });

  it("keeps stored snapshots apart from callers", () => {
    const store = new InMemoryRecordStore();
    const record = { inci: "CITRAL", cas: ["5392-40-5"] };
    const saved = store.save({ threadId: "thread_a", record, summary: "seed" });

    record.cas.push("mutated");
    saved.record.inci = "CHANGED";
    const read = store.getVersion("thread_a", 1);
    if (read) {
      read.summary = "changed";
    }

    expect(store.current("thread_a")).toMatchObject({
      summary: "seed",
      record: { inci: "CITRAL", cas: ["5392-40-5"] },
    });
  });

  it("summarizes history with patch counts", () => {
    const store = new InMemoryRecordStore();
    store.save({ threadId: "thread_a", record: { inci: "CITRAL" }, summary: "seed" });
    store.save({
      threadId: "thread_a",
      record: { inci: "CITRAL", DAP: [{ value: 1, unit: "%", source: "" }] },
      summary: "Applied patch: add /DAP/-",
      patchOps: [{ op: "add", path: "/DAP/-", value: { value: 1 } }],
      pathTaken: "NLI_EDIT",
    });

    expect(store.history("thread_a")).toEqual([
      expect.objectContaining({ version: 1, summary: "seed", patchOpCount: 0, fallbackUsed: false }),
      expect.objectContaining({ version: 2, pathTaken: "NLI_EDIT", patchOpCount: 1 }),
    ]);
    expect(store.history("thread_missing")).toBeNull();
  });

  it("diffs two stored versions", () => {
    const store = new InMemoryRecordStore();
    store.save({ threadId: "thread_a", record: { inci: "CITRAL", category: "OTHERS" }, summary: "seed" });
    store.save({ threadId: "thread_a", record: { inci: "CITRAL", category: "FRAGRANCE" }, summary: "edit" });

    expect(store.diff("thread_a", 1, 2)).toEqual([
      { type: "change", path: "/category", old: "OTHERS", new: "FRAGRANCE" },
    ]);
    expect(store.diff("thread_a", 2, 2)).toEqual([]);
    expect(store.diff("thread_a", 1, 3)).toBeNull();
    expect(store.getVersion("thread_a", 3)).toBeNull();
  });
});
