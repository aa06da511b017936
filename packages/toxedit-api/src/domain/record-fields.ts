import {
  DEFAULT_CATEGORY,
  EVIDENCE_FIELDS,
  METRIC_FIELD_SPECS,
  ToxicologyRecordSchema,
  type MetricEntry,
  type MetricField,
  type ToxicologyRecord,
} from "@toxedit/contracts";
import { isPlainObject, type JsonObject } from "./json-values.js";

const EVIDENCE_DEFAULTS: Readonly<Record<string, string | boolean>> = {
  reference: "",
  data: "",
  source: "",
  statement: "",
  replaced: false,
};

export function createBlankRecord(ingredientId: string): ToxicologyRecord {
  const record: ToxicologyRecord = {
    inci: ingredientId,
    inci_ori: ingredientId,
    cas: [],
    isSkip: false,
    category: DEFAULT_CATEGORY,
  };
  for (const field of EVIDENCE_FIELDS) {
    record[field] = [];
  }
  record.NOAEL = [];
  record.DAP = [];
  return record;
}

export function normalizeSource(source: string): string {
  return source.trim().toLowerCase().replace(/\s+/g, "_");
}

export function referenceTitle(reference: unknown): string {
  if (typeof reference === "string") {
    return reference;
  }
  if (isPlainObject(reference) && typeof reference.title === "string") {
    return reference.title;
  }
  return "";
}

/** Fills the keys every evidence entry carries. Non-object input is returned unchanged. */
export function normalizeEvidenceEntry(raw: unknown): unknown {
  if (!isPlainObject(raw)) {
    return raw;
  }
  const entry: JsonObject = { ...raw };
  if (typeof entry.source === "string") {
    entry.source = normalizeSource(entry.source);
  }
  for (const [key, fallback] of Object.entries(EVIDENCE_DEFAULTS)) {
    if (entry[key] === undefined) {
      entry[key] = fallback;
    }
  }
  return entry;
}

/**
 * Coerces a scalar or partial object into a metric entry.
 * Returns null when no number or string value can be found.
 */
export function tryNormalizeMetricEntry(field: MetricField, raw: unknown): MetricEntry | null {
  const spec = METRIC_FIELD_SPECS[field];

  if (typeof raw === "number" || typeof raw === "string") {
    return { value: raw, unit: spec.defaultUnit, source: "", type: field };
  }

  if (!isPlainObject(raw)) {
    return null;
  }

  const value = raw.value;
  if (typeof value !== "number" && typeof value !== "string") {
    return null;
  }

  const unit = typeof raw.unit === "string" && raw.unit.trim().length > 0 ? raw.unit : spec.defaultUnit;
  const source = typeof raw.source === "string" ? normalizeSource(raw.source) : "";
  const type = typeof raw.type === "string" && raw.type.length > 0 ? raw.type : field;

  return { ...raw, value, unit, source, type };
}

export type RecordValidation =
  | { ok: true; record: ToxicologyRecord }
  | { ok: false; reason: string };

export function validateRecord(candidate: unknown): RecordValidation {
  const parsed = ToxicologyRecordSchema.safeParse(candidate);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "record"}: ${issue.message}`)
      .join("; ");
    return { ok: false, reason };
  }
  return { ok: true, record: parsed.data };
}
