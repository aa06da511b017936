import type { IntentLabel } from "@toxedit/contracts";
import { EditError, describeError } from "./edit-errors.js";

export type BoundedCallOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  path?: IntentLabel;
  label: string;
};

/**
 * Runs one collaborator call under a deadline and the caller's abort signal.
 * The task receives a signal that fires on either. Timeouts surface as
 * GENERATION_TIMEOUT, caller aborts as EDIT_CANCELLED, anything else the task
 * throws as GENERATION_ERROR.
 */
export async function runBoundedCall<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: BoundedCallOptions,
): Promise<T> {
  throwIfCancelled(options.signal, options.path);

  const controller = new AbortController();
  let rejectDeadline: (error: EditError) => void = () => {};
  const deadline = new Promise<never>((_resolve, reject) => {
    rejectDeadline = reject;
  });

  const timer = setTimeout(() => {
    controller.abort();
    rejectDeadline(
      new EditError(
        "GENERATION_TIMEOUT",
        `${options.label} did not finish within ${options.timeoutMs}ms${onPath(options.path)}`,
        { path: options.path },
      ),
    );
  }, options.timeoutMs);

  const onAbort = () => {
    controller.abort();
    rejectDeadline(cancelled(options.path));
  };
  options.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([
      Promise.resolve()
        .then(() => task(controller.signal))
        .catch((error: unknown) => {
          if (controller.signal.aborted) {
            return deadline;
          }
          throw new EditError(
            "GENERATION_ERROR",
            `${options.label} failed${onPath(options.path)}: ${describeError(error)}`,
            { path: options.path, cause: error },
          );
        }),
      deadline,
    ]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined, path?: IntentLabel): void {
  if (signal?.aborted) {
    throw cancelled(path);
  }
}

function onPath(path: IntentLabel | undefined): string {
  return path ? ` on the ${path} path` : "";
}

function cancelled(path: IntentLabel | undefined): EditError {
  return new EditError("EDIT_CANCELLED", `edit cancelled${onPath(path)}`, { path });
}
