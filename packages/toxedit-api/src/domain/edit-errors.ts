import type { EditErrorCode, EditFailure, IntentLabel } from "@toxedit/contracts";

/**
 * Fatal outcome of an edit. `path` is the intent path that was being
 * attempted when the edit stopped.
 */
export class EditError extends Error {
  public readonly code: EditErrorCode;
  public readonly path: IntentLabel | undefined;
  public override readonly cause: unknown;

  constructor(
    code: EditErrorCode,
    message: string,
    options: { path?: IntentLabel | undefined; cause?: unknown } = {},
  ) {
    super(message);
    this.name = "EditError";
    this.code = code;
    this.path = options.path;
    this.cause = options.cause;
    Object.setPrototypeOf(this, EditError.prototype);
  }

  toFailure(): EditFailure {
    const failure: EditFailure = { code: this.code, message: this.message };
    if (this.path) {
      failure.path = this.path;
    }
    return failure;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
