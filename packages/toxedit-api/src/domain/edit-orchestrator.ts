import { randomUUID } from "node:crypto";
import {
  normalizeIngredientTag,
  type EditGenerationContext,
  type EditGenerator,
  type EditResponse,
  type EvidenceField,
  type FormPayloadExtractor,
  type FormPayloads,
  type IntentLabel,
  type PatchOperation,
  type RecordVersion,
  type ToxicologyRecord,
} from "@toxedit/contracts";
import type { RecordStore } from "../types/record-store.js";
import { ThreadLock } from "../storage/thread-lock.js";
import { EditError, describeError } from "./edit-errors.js";
import { buildEvidenceEntry, isDuplicateEvidenceEntry, type EvidenceEntryInput } from "./evidence-entries.js";
import { applyFormPayloads, hasFormPayloads } from "./form-apply.js";
import { runBoundedCall, throwIfCancelled } from "./generation-timeout.js";
import { classifyIntent, type ClassifiedIntent } from "./intent-classifier.js";
import { isPlainObject, type JsonObject } from "./json-values.js";
import { LOG_PREFIX, consoleLogger, type EditLogger } from "./logger.js";
import { listUpdatedFields, mergeRecordUpdates } from "./merge-engine.js";
import { applyPatchSafely } from "./patch-protocol.js";
import { createBlankRecord, validateRecord } from "./record-fields.js";

export const DEFAULT_GENERATION_TIMEOUT_MS = 25_000;

export type EditCommand = {
  ingredientId: string;
  instruction?: string;
  structuredPayload?: JsonObject;
  threadId?: string;
  initialRecord?: ToxicologyRecord;
  batchId?: string;
  signal?: AbortSignal;
};

export type EvidenceEntryCommand = {
  ingredientId: string;
  threadId?: string;
  field: EvidenceField;
  entry: EvidenceEntryInput;
  signal?: AbortSignal;
};

export type EvidenceRemovalCommand = {
  threadId: string;
  field: EvidenceField;
  index: number;
  signal?: AbortSignal;
};

type CommitContext = {
  threadId: string;
  ingredientId: string;
  path: IntentLabel;
  batchId?: string;
};

export type EditOrchestratorOptions = {
  store: RecordStore;
  generator: EditGenerator;
  extractor: FormPayloadExtractor;
  generationTimeoutMs?: number;
  logger?: EditLogger;
  locks?: ThreadLock;
  createThreadId?: () => string;
};

type EditOutcome = {
  record: ToxicologyRecord;
  summary: string;
  fallbackUsed: boolean;
  patchOps?: PatchOperation[];
};

export function createThreadId(): string {
  return `thread_${randomUUID()}`;
}

/**
 * Runs one edit end to end: classify, take the matching path, save a new
 * version. Everything from loading the current record to the save happens
 * under the thread's lock, so versions of one thread never interleave.
 */
export class EditOrchestrator {
  private readonly store: RecordStore;
  private readonly generator: EditGenerator;
  private readonly extractor: FormPayloadExtractor;
  private readonly generationTimeoutMs: number;
  private readonly logger: EditLogger;
  private readonly locks: ThreadLock;
  private readonly createThreadId: () => string;

  constructor(options: EditOrchestratorOptions) {
    this.store = options.store;
    this.generator = options.generator;
    this.extractor = options.extractor;
    this.generationTimeoutMs = Math.max(1, options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS);
    this.logger = options.logger ?? consoleLogger;
    this.locks = options.locks ?? new ThreadLock();
    this.createThreadId = options.createThreadId ?? createThreadId;
  }

  async edit(command: EditCommand): Promise<EditResponse> {
    const threadId = command.threadId ?? this.createThreadId();
    return this.locks.runExclusive(threadId, () => this.runEdit(threadId, command));
  }

  private async runEdit(threadId: string, command: EditCommand): Promise<EditResponse> {
    const { signal } = command;
    throwIfCancelled(signal);

    const existing = this.store.current(threadId);
    const base = existing?.record ?? command.initialRecord ?? createBlankRecord(command.ingredientId);

    const intent = await classifyIntent(
      { instruction: command.instruction, structuredPayload: command.structuredPayload },
      {
        classifyAmbiguous: (text) =>
          this.bounded((callSignal) => this.generator.classifyAmbiguous(text, callSignal), {
            label: "intent classification",
            signal,
          }),
        logger: this.logger,
        signal,
      },
    );

    const outcome = await this.runPath(intent, base, command);
    throwIfCancelled(signal, intent.label);

    return this.commit(
      { threadId, ingredientId: command.ingredientId, path: intent.label, batchId: command.batchId },
      outcome,
    );
  }

  /** Appends one evidence entry as a structured edit; a duplicate saves an unchanged version. */
  async addEvidenceEntry(command: EvidenceEntryCommand): Promise<EditResponse> {
    const threadId = command.threadId ?? this.createThreadId();
    return this.locks.runExclusive(threadId, async () => {
      throwIfCancelled(command.signal, "FORM_EDIT_STRUCTURED");
      const base = this.store.current(threadId)?.record ?? createBlankRecord(command.ingredientId);
      const entry = buildEvidenceEntry(command.entry);
      const current = base[command.field];

      const outcome = isDuplicateEvidenceEntry(current, entry)
        ? unchanged(base, `Duplicate ${command.field} entry; record unchanged`)
        : this.applyStructuredPatch(
            base,
            Array.isArray(current)
              ? [{ op: "add", path: `/${command.field}/-`, value: entry }]
              : [{ op: "add", path: `/${command.field}`, value: [entry] }],
            `Added ${command.field} entry`,
          );

      return this.commit({ threadId, ingredientId: command.ingredientId, path: "FORM_EDIT_STRUCTURED" }, outcome);
    });
  }

  /** Resolves to null when the thread has no versions. */
  async removeEvidenceEntry(command: EvidenceRemovalCommand): Promise<EditResponse | null> {
    return this.locks.runExclusive(command.threadId, async () => {
      throwIfCancelled(command.signal, "FORM_EDIT_STRUCTURED");
      const existing = this.store.current(command.threadId);
      if (!existing) {
        return null;
      }

      const outcome = this.applyStructuredPatch(
        existing.record,
        [{ op: "remove", path: `/${command.field}/${command.index}` }],
        `Removed ${command.field} entry ${command.index}`,
      );

      return this.commit(
        { threadId: command.threadId, ingredientId: existing.record.inci, path: "FORM_EDIT_STRUCTURED" },
        outcome,
      );
    });
  }

  /** Runs the extractor alone and returns what it found without touching any thread. */
  async previewExtraction(text: string, options: { signal?: AbortSignal } = {}): Promise<FormPayloads> {
    return this.bounded((callSignal) => this.extractor.extract(text, callSignal), {
      label: "correction form extraction",
      path: "FORM_EDIT_RAW",
      signal: options.signal,
    });
  }

  private commit(context: CommitContext, outcome: EditOutcome): EditResponse {
    const { threadId, path } = context;

    let saved: RecordVersion;
    try {
      saved = this.store.save({
        threadId,
        record: outcome.record,
        summary: outcome.summary,
        patchOps: outcome.patchOps,
        batchId: context.batchId,
        ingredientTag: normalizeIngredientTag(context.ingredientId),
        isBatchItem: context.batchId !== undefined,
        pathTaken: path,
        fallbackUsed: outcome.fallbackUsed,
      });
    } catch (error) {
      throw new EditError(
        "STORE_WRITE_FAILURE",
        `could not save ${path} result for thread ${threadId}: ${describeError(error)}`,
        { path, cause: error },
      );
    }

    this.logger.info(`${LOG_PREFIX} ${threadId} v${saved.version} ${path}${outcome.fallbackUsed ? " (fallback)" : ""}`);

    const response: EditResponse = {
      threadId,
      version: saved.version,
      record: saved.record,
      pathTaken: path,
      fallbackUsed: outcome.fallbackUsed,
      summary: outcome.summary,
    };
    if (saved.patchOps) {
      response.patchOps = saved.patchOps;
    }
    return response;
  }

  private applyStructuredPatch(base: ToxicologyRecord, operations: PatchOperation[], summary: string): EditOutcome {
    const result = applyPatchSafely(base, operations);
    if (!result.ok) {
      throw new EditError(result.code, `${summary} rejected: ${result.reason}`, { path: "FORM_EDIT_STRUCTURED" });
    }
    return { record: result.record, summary, patchOps: result.operations, fallbackUsed: false };
  }

  private async runPath(
    intent: ClassifiedIntent,
    base: ToxicologyRecord,
    command: EditCommand,
  ): Promise<EditOutcome> {
    switch (intent.label) {
      case "NLI_EDIT":
        return this.applyInstruction(base, intent.instruction, command);
      case "FORM_EDIT_STRUCTURED":
        if (!hasFormPayloads(intent.payloads)) {
          return unchanged(base, "No structured payload found; record unchanged");
        }
        return this.applyPayloads(base, intent.payloads, command.ingredientId, intent.label, "Structured update");
      case "FORM_EDIT_RAW": {
        const payloads = await this.bounded(
          (callSignal) => this.extractor.extract(intent.text, callSignal),
          { label: "correction form extraction", path: intent.label, signal: command.signal },
        );
        if (!hasFormPayloads(payloads)) {
          return unchanged(base, "No structured data extracted from correction form; record unchanged");
        }
        return this.applyPayloads(base, payloads, command.ingredientId, intent.label, "Correction form update");
      }
      case "NO_EDIT":
        return unchanged(base, "No edit requested; record unchanged");
    }
  }

  private async applyInstruction(
    base: ToxicologyRecord,
    instruction: string,
    command: EditCommand,
  ): Promise<EditOutcome> {
    const context: EditGenerationContext = { record: base, instruction, ingredientId: command.ingredientId };
    let failure: string;

    try {
      const proposal = await this.bounded(
        (callSignal) => this.generator.generatePatch({ ...context, signal: callSignal }),
        { label: "patch generation", path: "NLI_EDIT", signal: command.signal },
      );
      const result = applyPatchSafely(base, proposal);
      if (result.ok) {
        const applied = result.operations.map((operation) => `${operation.op} ${operation.path}`).join(", ");
        return {
          record: result.record,
          summary: `Applied patch: ${applied}`,
          patchOps: result.operations,
          fallbackUsed: false,
        };
      }
      if (result.code === "UNKNOWN_FIELD_REFERENCE") {
        throw new EditError("UNKNOWN_FIELD_REFERENCE", `patch rejected on the NLI_EDIT path: ${result.reason}`, {
          path: "NLI_EDIT",
        });
      }
      failure = result.reason;
    } catch (error) {
      if (!isGenerationFailure(error)) {
        throw error;
      }
      failure = error.message;
    }

    this.logger.warn(`${LOG_PREFIX} patch path failed, falling back to full update: ${failure}`);
    return this.applyFullUpdate(base, context, command.signal);
  }

  private async applyFullUpdate(
    base: ToxicologyRecord,
    context: EditGenerationContext,
    signal: AbortSignal | undefined,
  ): Promise<EditOutcome> {
    const output = await this.bounded(
      (callSignal) => this.generator.generateFullUpdate({ ...context, signal: callSignal }),
      { label: "full update generation", path: "NLI_EDIT", signal },
    );

    if (!isPlainObject(output)) {
      throw new EditError(
        "MALFORMED_FALLBACK_OUTPUT",
        "full update on the NLI_EDIT path did not return a JSON object of field updates",
        { path: "NLI_EDIT" },
      );
    }

    const validation = validateRecord(mergeRecordUpdates(base, output, { logger: this.logger }));
    if (!validation.ok) {
      throw new EditError(
        "MALFORMED_FALLBACK_OUTPUT",
        `full update on the NLI_EDIT path produced an invalid record: ${validation.reason}`,
        { path: "NLI_EDIT" },
      );
    }

    const fields = listUpdatedFields(output);
    return {
      record: validation.record,
      summary: `Fallback full update: ${fields.length > 0 ? fields.join(", ") : "no fields"}`,
      fallbackUsed: true,
    };
  }

  private applyPayloads(
    base: ToxicologyRecord,
    payloads: FormPayloads,
    ingredientId: string,
    path: IntentLabel,
    summaryLead: string,
  ): EditOutcome {
    const { record, applied } = applyFormPayloads(base, payloads, ingredientId, { logger: this.logger });
    const validation = validateRecord(record);
    if (!validation.ok) {
      throw new EditError(
        "PAYLOAD_VALIDATION_FAILED",
        `${path} payload produced an invalid record: ${validation.reason}`,
        { path },
      );
    }
    return {
      record: validation.record,
      summary: `${summaryLead}: ${applied.join(", ")}`,
      fallbackUsed: false,
    };
  }

  private bounded<T>(
    task: (signal: AbortSignal) => Promise<T>,
    options: { label: string; path?: IntentLabel; signal?: AbortSignal },
  ): Promise<T> {
    return runBoundedCall(task, { ...options, timeoutMs: this.generationTimeoutMs });
  }
}

function isGenerationFailure(error: unknown): error is EditError {
  return error instanceof EditError && (error.code === "GENERATION_ERROR" || error.code === "GENERATION_TIMEOUT");
}

function unchanged(record: ToxicologyRecord, summary: string): EditOutcome {
  return { record, summary, fallbackUsed: false };
}
