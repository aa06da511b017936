import { describe, expect, it } from "vitest";
import { runBoundedCall, throwIfCancelled } from "./generation-timeout.js";

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

describe("runBoundedCall", () => {
  it("returns the task result", async () => {
    await expect(runBoundedCall(async () => 42, { timeoutMs: 1_000, label: "patch generation" })).resolves.toBe(42);
  });

  it("times out and aborts the task signal", async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = runBoundedCall(
      (signal) => {
        taskSignal = signal;
        return untilAborted(signal);
      },
      { timeoutMs: 10, label: "patch generation", path: "NLI_EDIT" },
    );

    await expect(pending).rejects.toMatchObject({
      code: "GENERATION_TIMEOUT",
      path: "NLI_EDIT",
      message: "patch generation did not finish within 10ms on the NLI_EDIT path",
    });
    expect(taskSignal?.aborted).toBe(true);
  });

  it("reports a caller abort as a cancellation", async () => {
    const controller = new AbortController();
    const pending = runBoundedCall(untilAborted, {
      timeoutMs: 1_000,
      label: "patch generation",
      path: "NLI_EDIT",
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      code: "EDIT_CANCELLED",
      message: "edit cancelled on the NLI_EDIT path",
    });
  });

  it("does not start the task when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    await expect(
      runBoundedCall(
        async () => {
          started = true;
          return 1;
        },
        { timeoutMs: 1_000, label: "form extraction", signal: controller.signal },
      ),
    ).rejects.toMatchObject({ code: "EDIT_CANCELLED", message: "edit cancelled" });
    expect(started).toBe(false);
  });

  it("wraps task failures as generation errors", async () => {
    await expect(
      runBoundedCall(
        async () => {
          throw new Error("bad gateway");
        },
        { timeoutMs: 1_000, label: "full update generation" },
      ),
    ).rejects.toMatchObject({ code: "GENERATION_ERROR", message: "full update generation failed: bad gateway" });
  });

  it("catches synchronous throws from the task", async () => {
    await expect(
      runBoundedCall(
        () => {
          throw new Error("not configured");
        },
        { timeoutMs: 1_000, label: "form extraction", path: "FORM_EDIT_RAW" },
      ),
    ).rejects.toMatchObject({
      code: "GENERATION_ERROR",
      message: "form extraction failed on the FORM_EDIT_RAW path: not configured",
    });
  });
});

describe("throwIfCancelled", () => {
  it("is silent for a live signal", () => {
    expect(() => throwIfCancelled(new AbortController().signal)).not.toThrow();
  });
});
