import type { PatchOperation } from "@toxedit/contracts";
import jsonpatch, { type Operation } from "fast-json-patch";
import { describeError } from "./edit-errors.js";
import type { JsonObject } from "./json-values.js";

export class PatchConflictError extends Error {
  readonly operationIndex: number;

  constructor(operationIndex: number, message: string) {
    super(`operation ${operationIndex}: ${message}`);
    this.name = "PatchConflictError";
    this.operationIndex = operationIndex;
  }
}

export function parsePointer(pointer: string): string[] {
  if (pointer === "") {
    return [];
  }
  return pointer.slice(1).split("/").map(jsonpatch.unescapePathComponent);
}

export function formatPointer(tokens: ReadonlyArray<string | number>): string {
  return tokens.map((token) => `/${jsonpatch.escapePathComponent(String(token))}`).join("");
}

function toLibraryOperation(operation: PatchOperation, index: number): Operation {
  switch (operation.op) {
    case "add":
    case "replace":
    case "test":
      return { op: operation.op, path: operation.path, value: operation.value };
    case "remove":
      return { op: "remove", path: operation.path };
    case "move":
    case "copy":
      if (operation.from === undefined) {
        throw new PatchConflictError(index, `${operation.op} requires a from pointer`);
      }
      return { op: operation.op, path: operation.path, from: operation.from };
  }
}

/**
 * Applies RFC 6902 operations in order with per-operation validation,
 * mutating `document`. Callers own atomicity: pass a copy and discard it
 * when this throws.
 */
export function applyOperations(document: JsonObject, operations: readonly PatchOperation[]): void {
  operations.forEach((operation, index) => {
    const libraryOperation = toLibraryOperation(operation, index);
    try {
      jsonpatch.applyOperation(document, libraryOperation, true, true, true, index);
    } catch (error) {
      throw new PatchConflictError(index, describePatchError(error));
    }
  });
}

function describePatchError(error: unknown): string {
  if (error instanceof jsonpatch.JsonPatchError) {
    // The library appends the operation and the whole tree after the first line.
    const [headline = ""] = error.message.split("\n");
    return `${error.name}: ${headline}`;
  }
  return describeError(error);
}
