import type { EvidenceEntry, EvidenceEntryRequest } from "@toxedit/contracts";
import { isPlainObject } from "./json-values.js";
import { normalizeSource, referenceTitle } from "./record-fields.js";

export type EvidenceEntryInput = Omit<EvidenceEntryRequest, "ingredientId" | "threadId">;

const STATEMENT_DETAILS: ReadonlyArray<[key: string, render: (value: string) => string]> = [
  ["test_subject", (value) => `with ${value}`],
  ["test_guideline", (value) => `following ${value}`],
  ["concentration", (value) => `at ${value} concentration`],
  ["study_duration", (value) => `over ${value}`],
];

export function composeEvidenceStatement(source: string, metadata: Record<string, string> = {}): string {
  const parts = [`Based on ${source} assessment`];
  for (const [key, render] of STATEMENT_DETAILS) {
    const value = metadata[key]?.trim();
    if (value) {
      parts.push(render(value));
    }
  }
  return parts.join(" ");
}

export function buildEvidenceEntry(input: EvidenceEntryInput): EvidenceEntry {
  const source = normalizeSource(input.source);
  const entry: EvidenceEntry = {
    reference: {
      title: input.reference_title,
      link: input.reference_link ?? null,
    },
    data: [...input.data],
    source,
    statement: input.statement ?? composeEvidenceStatement(source, input.metadata),
    replaced: {
      replaced_inci: "",
      replaced_type: "",
    },
  };
  if (input.metadata && Object.keys(input.metadata).length > 0) {
    entry.metadata = { ...input.metadata };
  }
  return entry;
}

function firstDataItem(data: unknown): unknown {
  return Array.isArray(data) ? data[0] : undefined;
}

/** Same reference title, same normalized source and the same leading data item. */
export function isDuplicateEvidenceEntry(entries: unknown, entry: EvidenceEntry): boolean {
  if (!Array.isArray(entries)) {
    return false;
  }
  const leading = firstDataItem(entry.data);
  return entries.some(
    (existing) =>
      isPlainObject(existing) &&
      referenceTitle(existing.reference) === referenceTitle(entry.reference) &&
      typeof existing.source === "string" &&
      normalizeSource(existing.source) === entry.source &&
      leading !== undefined &&
      firstDataItem(existing.data) === leading,
  );
}
