import type {
  IntentLabel,
  PatchOperation,
  RecordChange,
  RecordVersion,
  ToxicologyRecord,
  VersionSummary,
} from "@toxedit/contracts";

export type SaveVersionParams = {
  threadId: string;
  record: ToxicologyRecord;
  summary: string;
  patchOps?: PatchOperation[];
  batchId?: string;
  ingredientTag?: string;
  isBatchItem?: boolean;
  pathTaken?: IntentLabel;
  fallbackUsed?: boolean;
};

export type RecordStore = {
  save(params: SaveVersionParams): RecordVersion;
  current(threadId: string): RecordVersion | null;
  getVersion(threadId: string, version: number): RecordVersion | null;
  history(threadId: string): VersionSummary[] | null;
  diff(threadId: string, fromVersion: number, toVersion: number): RecordChange[] | null;
  byBatch(batchId: string): RecordVersion[];
  byIngredient(inciName: string): RecordVersion[];
};
