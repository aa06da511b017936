import { randomUUID } from "node:crypto";
import {
  normalizeIngredientTag,
  type BatchEditEntry,
  type BatchEditItemResult,
  type BatchEditRequest,
  type BatchEditResponse,
  type EditFailure,
} from "@toxedit/contracts";
import { EditError, describeError } from "./edit-errors.js";
import { createThreadId, type EditOrchestrator } from "./edit-orchestrator.js";
import { LOG_PREFIX, consoleLogger, type EditLogger } from "./logger.js";

export type BatchCoordinatorOptions = {
  orchestrator: EditOrchestrator;
  logger?: EditLogger;
  createBatchId?: () => string;
  createThreadId?: () => string;
};

type IndexedEntry = {
  index: number;
  entry: BatchEditEntry;
};

type ThreadGroup = {
  threadId: string;
  ingredientId: string;
  entries: IndexedEntry[];
};

export class BatchCoordinator {
  private readonly orchestrator: EditOrchestrator;
  private readonly logger: EditLogger;
  private readonly createBatchId: () => string;
  private readonly createThreadId: () => string;

  constructor(options: BatchCoordinatorOptions) {
    this.orchestrator = options.orchestrator;
    this.logger = options.logger ?? consoleLogger;
    this.createBatchId = options.createBatchId ?? (() => `batch_${randomUUID()}`);
    this.createThreadId = options.createThreadId ?? createThreadId;
  }

  /**
   * One thread per distinct ingredient, named after its first spelling in
   * the request. Edits for the same ingredient run in request order so each
   * sees the previous one's saved version; different ingredients run
   * concurrently and fail independently.
   */
  async run(request: BatchEditRequest, options: { signal?: AbortSignal } = {}): Promise<BatchEditResponse> {
    const batchId = this.createBatchId();
    const threadMap: Record<string, string> = {};
    const groups = new Map<string, ThreadGroup>();

    request.edits.forEach((entry, index) => {
      const key = normalizeIngredientTag(entry.ingredientId);
      let group = groups.get(key);
      if (!group) {
        group = { threadId: this.createThreadId(), ingredientId: entry.ingredientId, entries: [] };
        groups.set(key, group);
        threadMap[key] = group.threadId;
      }
      group.entries.push({ index, entry });
    });

    const grouped = await Promise.all(
      [...groups.values()].map((group) => this.runThread(batchId, group, options.signal)),
    );
    const results = grouped.flat().sort((left, right) => left.index - right.index);
    const succeeded = results.filter((result) => result.ok).length;

    this.logger.info(
      `${LOG_PREFIX} batch ${batchId}: ${succeeded}/${results.length} edits applied across ${groups.size} threads`,
    );

    return {
      batchId,
      threadMap,
      requested: request.edits.length,
      succeeded,
      failed: results.length - succeeded,
      results,
    };
  }

  private async runThread(
    batchId: string,
    { threadId, ingredientId, entries }: ThreadGroup,
    signal: AbortSignal | undefined,
  ): Promise<BatchEditItemResult[]> {
    const results: BatchEditItemResult[] = [];

    for (const { index, entry } of entries) {
      const base = { index, ingredientId: entry.ingredientId, threadId };
      try {
        const result = await this.orchestrator.edit({
          ingredientId,
          instruction: entry.instruction,
          structuredPayload: entry.structuredPayload,
          threadId,
          batchId,
          signal,
        });
        results.push({ ...base, ok: true, result });
      } catch (error) {
        results.push({ ...base, ok: false, error: this.toFailure(batchId, index, error) });
      }
    }

    return results;
  }

  private toFailure(batchId: string, index: number, error: unknown): EditFailure {
    if (error instanceof EditError) {
      this.logger.warn(`${LOG_PREFIX} batch ${batchId} item ${index} failed: ${error.code} ${error.message}`);
      return error.toFailure();
    }
    this.logger.error(`${LOG_PREFIX} batch ${batchId} item ${index} failed unexpectedly: ${describeError(error)}`);
    return { code: "GENERATION_ERROR", message: `unexpected failure: ${describeError(error)}` };
  }
}
