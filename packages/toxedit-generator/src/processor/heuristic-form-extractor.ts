import type { FormPayloadExtractor, FormPayloads, MetricFormPayload } from "@toxedit/contracts";

type SharedField =
  | "experiment_target"
  | "study_duration"
  | "source"
  | "reference_title"
  | "reference_link"
  | "note"
  | "statement"
  | "unit";

const LINE_REGEX = /^\s*(?<label>[A-Za-z][A-Za-z\s_/-]*?)\s*[:=]\s*(?<value>.+?)\s*$/;
const VALUE_REGEX = /^(?<number>[-+]?\d+(?:\.\d+)?)\s*(?<unit>.*)$/;

const SHARED_LABELS: Record<string, SharedField> = {
  species: "experiment_target",
  target: "experiment_target",
  "experiment target": "experiment_target",
  "test species": "experiment_target",
  duration: "study_duration",
  "study duration": "study_duration",
  source: "source",
  reference: "reference_title",
  "reference title": "reference_title",
  title: "reference_title",
  link: "reference_link",
  "reference link": "reference_link",
  url: "reference_link",
  note: "note",
  notes: "note",
  statement: "statement",
  conclusion: "statement",
  unit: "unit",
};

const NOAEL_LABELS = new Set(["noael", "noael value"]);
const DAP_LABELS = new Set(["dap", "dermal absorption", "dermal absorption percentage"]);

/**
 * Reads `Label: value` lines from pasted correction-form text. Shared lines
 * (species, duration, source, reference) apply to every metric found.
 */
export class HeuristicFormExtractor implements FormPayloadExtractor {
  async extract(rawText: string): Promise<FormPayloads> {
    const shared: Partial<Record<SharedField, string>> = {};
    let noael: { value: number; unit?: string } | null = null;
    let dap: { value: number } | null = null;

    for (const line of rawText.split(/\r?\n/)) {
      const match = line.match(LINE_REGEX);
      const label = match?.groups?.label?.trim().toLowerCase().replace(/[_\s]+/g, " ");
      const value = match?.groups?.value?.trim();
      if (!label || !value) {
        continue;
      }

      if (NOAEL_LABELS.has(label)) {
        noael = parseMeasurement(value) ?? noael;
        continue;
      }
      if (DAP_LABELS.has(label)) {
        const measurement = parseMeasurement(value);
        dap = measurement ? { value: measurement.value } : dap;
        continue;
      }

      const field = SHARED_LABELS[label];
      if (field && shared[field] === undefined) {
        shared[field] = value;
      }
    }

    const payloads: FormPayloads = {};
    if (noael) {
      const unit = noael.unit ?? shared.unit;
      payloads.NOAEL = buildPayload(noael.value, shared, unit);
    }
    if (dap) {
      payloads.DAP = buildPayload(dap.value, shared, "%");
    }
    return payloads;
  }
}

function parseMeasurement(text: string): { value: number; unit?: string } | null {
  const match = text.match(VALUE_REGEX);
  const numberText = match?.groups?.number;
  if (!numberText) {
    return null;
  }
  const value = Number.parseFloat(numberText);
  if (!Number.isFinite(value)) {
    return null;
  }
  const unit = match?.groups?.unit?.replace(/[.;,]+$/, "").trim();
  return unit ? { value, unit } : { value };
}

function buildPayload(
  value: number,
  shared: Partial<Record<SharedField, string>>,
  unit: string | undefined,
): MetricFormPayload {
  const payload: MetricFormPayload = { value };
  if (unit) {
    payload.unit = unit;
  }
  if (shared.experiment_target) {
    payload.experiment_target = shared.experiment_target;
  }
  if (shared.study_duration) {
    payload.study_duration = shared.study_duration;
  }
  if (shared.source) {
    payload.source = shared.source;
  }
  if (shared.reference_title) {
    payload.reference_title = shared.reference_title;
  }
  if (shared.reference_link) {
    payload.reference_link = shared.reference_link;
  }
  if (shared.note) {
    payload.note = shared.note;
  }
  if (shared.statement) {
    payload.statement = shared.statement;
  }
  return payload;
}
