import { normalizeIngredientTag, type RecordChange, type RecordVersion, type VersionSummary } from "@toxedit/contracts";
import { cloneJson as clone } from "../domain/json-values.js";
import { diffRecords } from "../domain/record-diff.js";
import type { RecordStore, SaveVersionParams } from "../types/record-store.js";

type InMemoryRecordStoreOptions = {
  now?: () => Date;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Append-only version log. Each thread's versions are gapless from 1;
 * stored snapshots are frozen and every read hands out a copy.
 */
export class InMemoryRecordStore implements RecordStore {
  private readonly threads = new Map<string, RecordVersion[]>();
  private readonly batchIndex = new Map<string, RecordVersion[]>();
  private readonly ingredientIndex = new Map<string, RecordVersion[]>();
  private readonly now: () => Date;

  constructor(options: InMemoryRecordStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  save(params: SaveVersionParams): RecordVersion {
    const versions = this.threads.get(params.threadId) ?? [];
    const latest = versions.reduce((max, entry) => Math.max(max, entry.version), 0);

    const entry: RecordVersion = {
      threadId: params.threadId,
      version: latest + 1,
      record: clone(params.record),
      summary: params.summary,
      createdAt: this.now().toISOString(),
      isBatchItem: params.isBatchItem ?? params.batchId !== undefined,
      fallbackUsed: params.fallbackUsed ?? false,
    };
    if (params.patchOps) {
      entry.patchOps = clone(params.patchOps);
    }
    if (params.batchId) {
      entry.batchId = params.batchId;
    }
    const ingredientTag = params.ingredientTag ?? normalizeIngredientTag(params.record.inci);
    if (ingredientTag.length > 0) {
      entry.ingredientTag = ingredientTag;
    }
    if (params.pathTaken) {
      entry.pathTaken = params.pathTaken;
    }

    const frozen = deepFreeze(entry);
    versions.push(frozen);
    this.threads.set(params.threadId, versions);

    if (frozen.batchId) {
      appendIndex(this.batchIndex, frozen.batchId, frozen);
    }
    if (frozen.ingredientTag) {
      appendIndex(this.ingredientIndex, frozen.ingredientTag, frozen);
    }

    return clone(frozen);
  }

  current(threadId: string): RecordVersion | null {
    const versions = this.threads.get(threadId);
    const latest = versions?.[versions.length - 1];
    return latest ? clone(latest) : null;
  }

  getVersion(threadId: string, version: number): RecordVersion | null {
    const entry = this.findVersion(threadId, version);
    return entry ? clone(entry) : null;
  }

  history(threadId: string): VersionSummary[] | null {
    const versions = this.threads.get(threadId);
    if (!versions) {
      return null;
    }
    return versions.map((entry) => {
      const summary: VersionSummary = {
        version: entry.version,
        summary: entry.summary,
        createdAt: entry.createdAt,
        fallbackUsed: entry.fallbackUsed,
        patchOpCount: entry.patchOps?.length ?? 0,
      };
      if (entry.pathTaken) {
        summary.pathTaken = entry.pathTaken;
      }
      return summary;
    });
  }

  diff(threadId: string, fromVersion: number, toVersion: number): RecordChange[] | null {
    const from = this.findVersion(threadId, fromVersion);
    const to = this.findVersion(threadId, toVersion);
    if (!from || !to) {
      return null;
    }
    return clone(diffRecords(from.record, to.record));
  }

  byBatch(batchId: string): RecordVersion[] {
    return clone(this.batchIndex.get(batchId) ?? []);
  }

  byIngredient(inciName: string): RecordVersion[] {
    return clone(this.ingredientIndex.get(normalizeIngredientTag(inciName)) ?? []);
  }

  private findVersion(threadId: string, version: number): RecordVersion | undefined {
    return this.threads.get(threadId)?.find((entry) => entry.version === version);
  }
}

function appendIndex(index: Map<string, RecordVersion[]>, key: string, entry: RecordVersion): void {
  const entries = index.get(key) ?? [];
  entries.push(entry);
  index.set(key, entries);
}
