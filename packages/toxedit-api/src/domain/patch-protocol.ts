import {
  PatchOperationSchema,
  isEvidenceField,
  isMetricField,
  isRegisteredField,
  type MetricField,
  type PatchOperation,
  type ToxicologyRecord,
} from "@toxedit/contracts";
import { PatchConflictError, applyOperations, parsePointer } from "./json-patch.js";
import { cloneJson, type JsonObject } from "./json-values.js";
import { normalizeEvidenceEntry, tryNormalizeMetricEntry, validateRecord } from "./record-fields.js";

export type PatchFailureCode = "PATCH_VALIDATION_FAILED" | "UNKNOWN_FIELD_REFERENCE";

export type PatchApplyResult =
  | { ok: true; record: ToxicologyRecord; operations: PatchOperation[] }
  | { ok: false; record: ToxicologyRecord; code: PatchFailureCode; reason: string };

class PatchRejection extends Error {
  readonly code: PatchFailureCode;

  constructor(code: PatchFailureCode, message: string) {
    super(message);
    this.name = "PatchRejection";
    this.code = code;
  }
}

/**
 * Validates an untrusted patch proposal against the record and applies it
 * all-or-nothing. On failure the original record object is returned as is.
 */
export function applyPatchSafely(record: ToxicologyRecord, proposal: unknown): PatchApplyResult {
  try {
    const operations = readOperations(proposal).map((operation, index) =>
      prepareOperation(record, operation, index),
    );

    const working: JsonObject = cloneJson(record);
    applyOperations(working, operations);

    const validation = validateRecord(working);
    if (!validation.ok) {
      return reject(record, "PATCH_VALIDATION_FAILED", `patched record is invalid: ${validation.reason}`);
    }

    return { ok: true, record: validation.record, operations };
  } catch (error) {
    if (error instanceof PatchRejection) {
      return reject(record, error.code, error.message);
    }
    if (error instanceof PatchConflictError) {
      return reject(record, "PATCH_VALIDATION_FAILED", error.message);
    }
    throw error;
  }
}

function reject(record: ToxicologyRecord, code: PatchFailureCode, reason: string): PatchApplyResult {
  return { ok: false, record, code, reason };
}

function readOperations(proposal: unknown): PatchOperation[] {
  const candidates = Array.isArray(proposal) ? proposal : [proposal];
  if (candidates.length === 0) {
    throw new PatchRejection("PATCH_VALIDATION_FAILED", "patch proposal contains no operations");
  }

  return candidates.map((candidate, index) => {
    const parsed = PatchOperationSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new PatchRejection(
        "PATCH_VALIDATION_FAILED",
        `operation ${index} is malformed: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`,
      );
    }
    return parsed.data;
  });
}

function prepareOperation(record: ToxicologyRecord, operation: PatchOperation, index: number): PatchOperation {
  const pointers = operation.from === undefined ? [operation.path] : [operation.path, operation.from];
  for (const pointer of pointers) {
    if (!pointer.startsWith("/")) {
      throw new PatchRejection("PATCH_VALIDATION_FAILED", `operation ${index}: path must start with '/': ${pointer}`);
    }
    const field = parsePointer(pointer)[0] ?? "";
    if (!isRegisteredField(field) && !Object.hasOwn(record, field)) {
      throw new PatchRejection("UNKNOWN_FIELD_REFERENCE", `operation ${index}: unknown field referenced: ${field}`);
    }
  }

  if ((operation.op === "move" || operation.op === "copy") && operation.from === undefined) {
    throw new PatchRejection("PATCH_VALIDATION_FAILED", `operation ${index}: ${operation.op} requires from`);
  }

  if (operation.op === "move" && operation.from !== undefined && operation.path.startsWith(`${operation.from}/`)) {
    throw new PatchRejection("PATCH_VALIDATION_FAILED", `operation ${index}: cannot move ${operation.from} into its own child`);
  }

  if (operation.op === "test" && operation.value === undefined) {
    throw new PatchRejection("PATCH_VALIDATION_FAILED", `operation ${index}: test requires a value`);
  }

  if (operation.op !== "add" && operation.op !== "replace") {
    return operation;
  }

  if (operation.value === undefined || operation.value === null) {
    throw new PatchRejection("PATCH_VALIDATION_FAILED", `operation ${index}: ${operation.op} requires a value`);
  }

  const tokens = parsePointer(operation.path);
  const field = tokens[0] ?? "";
  if (tokens.length > 2) {
    return operation;
  }

  if (isEvidenceField(field)) {
    const value = tokens.length === 1 && Array.isArray(operation.value)
      ? operation.value.map(normalizeEvidenceEntry)
      : tokens.length === 2
        ? normalizeEvidenceEntry(operation.value)
        : operation.value;
    return { ...operation, value };
  }

  if (isMetricField(field)) {
    const value = tokens.length === 1 && Array.isArray(operation.value)
      ? operation.value.map((entry) => normalizeMetricValue(field, entry, index))
      : tokens.length === 2
        ? normalizeMetricValue(field, operation.value, index)
        : operation.value;
    return { ...operation, value };
  }

  return operation;
}

function normalizeMetricValue(field: MetricField, value: unknown, index: number): unknown {
  const entry = tryNormalizeMetricEntry(field, value);
  if (!entry) {
    throw new PatchRejection(
      "PATCH_VALIDATION_FAILED",
      `operation ${index}: ${field} entry must carry a number or string value`,
    );
  }
  return entry;
}
