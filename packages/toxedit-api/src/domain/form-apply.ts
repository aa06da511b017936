import {
  METRIC_FIELDS,
  METRIC_FIELD_SPECS,
  MetricFormPayloadSchema,
  normalizeIngredientTag,
  type FormPayloads,
  type MetricField,
  type MetricFormPayload,
  type ToxicologyRecord,
} from "@toxedit/contracts";
import { isPlainObject, type JsonObject } from "./json-values.js";
import type { EditLogger } from "./logger.js";
import { mergeRecordUpdates } from "./merge-engine.js";
import { normalizeSource } from "./record-fields.js";

export type FormPayloadRead =
  | { status: "found"; payloads: FormPayloads }
  | { status: "absent" }
  | { status: "invalid"; reason: string };

export type FormApplyResult = {
  record: JsonObject;
  applied: MetricField[];
};

/**
 * Reads metric payloads from an object keyed by `noael`, `noael_payload`,
 * `NOAEL`, `dap`, `dap_payload` or `DAP`.
 */
export function readFormPayloads(value: unknown): FormPayloadRead {
  if (!isPlainObject(value)) {
    return { status: "absent" };
  }

  const payloads: FormPayloads = {};
  let found = false;

  for (const field of METRIC_FIELDS) {
    const key = METRIC_FIELD_SPECS[field].payloadKeys.find((candidate) => Object.hasOwn(value, candidate));
    if (key === undefined || value[key] === null || value[key] === undefined) {
      continue;
    }

    const parsed = MetricFormPayloadSchema.safeParse(value[key]);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${[key, ...issue.path].join(".")}: ${issue.message}`)
        .join("; ");
      return { status: "invalid", reason: issues };
    }
    payloads[field] = parsed.data;
    found = true;
  }

  return found ? { status: "found", payloads } : { status: "absent" };
}

export function hasFormPayloads(payloads: FormPayloads): boolean {
  return METRIC_FIELDS.some((field) => payloads[field] !== undefined);
}

export function applyFormPayloads(
  record: ToxicologyRecord,
  payloads: FormPayloads,
  ingredientId: string,
  options: { logger?: EditLogger } = {},
): FormApplyResult {
  const updates: JsonObject = { inci: resolveInci(record, ingredientId) };
  const applied: MetricField[] = [];

  for (const field of METRIC_FIELDS) {
    const payload = payloads[field];
    if (!payload) {
      continue;
    }
    updates[field] = [buildMetricEntry(field, payload)];
    updates[METRIC_FIELD_SPECS[field].evidenceField] = [buildEvidenceEntry(field, payload)];
    applied.push(field);
  }

  if (applied.length === 0) {
    return { record: { ...record }, applied };
  }

  return { record: mergeRecordUpdates(record, updates, options), applied };
}

/** The stored name wins when the request only differs from it in case or padding. */
function resolveInci(record: ToxicologyRecord, ingredientId: string): string {
  const stored = record.inci.trim();
  return stored.length > 0 && normalizeIngredientTag(stored) === normalizeIngredientTag(ingredientId)
    ? stored
    : ingredientId;
}

function payloadUnit(field: MetricField, payload: MetricFormPayload): string {
  if (field === "DAP") {
    return "%";
  }
  return payload.unit && payload.unit.trim().length > 0 ? payload.unit : METRIC_FIELD_SPECS[field].defaultUnit;
}

function buildMetricEntry(field: MetricField, payload: MetricFormPayload): JsonObject {
  return {
    note: payload.note ?? null,
    unit: payloadUnit(field, payload),
    experiment_target: payload.experiment_target ?? "",
    source: normalizeSource(payload.source ?? ""),
    type: field,
    study_duration: payload.study_duration ?? "",
    value: payload.value,
  };
}

function buildEvidenceEntry(field: MetricField, payload: MetricFormPayload): JsonObject {
  const source = normalizeSource(payload.source ?? "");
  return {
    reference: {
      title: payload.reference_title ?? "",
      link: payload.reference_link ?? null,
    },
    data: [summarizePayload(field, payload, source)],
    source,
    statement:
      payload.statement ?? (source ? `Based on ${source} assessment` : "Based on submitted correction form"),
    replaced: {
      replaced_inci: "",
      replaced_type: "",
    },
  };
}

export function summarizePayload(field: MetricField, payload: MetricFormPayload, source: string): string {
  const lead =
    field === "DAP"
      ? `Dermal absorption estimated at ${payload.value}%`
      : `NOAEL of ${payload.value} ${payloadUnit(field, payload)}`;
  const target = payload.experiment_target ? ` established in ${payload.experiment_target}` : "";
  const duration = payload.study_duration ? ` (${payload.study_duration} study)` : "";
  const basis = source ? ` based on ${source} assessment` : "";
  return `${lead}${target}${duration}${basis}`;
}
