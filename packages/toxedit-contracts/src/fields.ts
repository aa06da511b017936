export const EVIDENCE_FIELDS = [
  "acute_toxicity",
  "skin_irritation",
  "skin_sensitization",
  "ocular_irritation",
  "phototoxicity",
  "repeated_dose_toxicity",
  "percutaneous_absorption",
  "ingredient_profile",
] as const;

export const METRIC_FIELDS = ["NOAEL", "DAP"] as const;

export const IDENTITY_FIELDS = ["inci", "inci_ori", "cas", "isSkip", "category"] as const;

export type EvidenceField = (typeof EVIDENCE_FIELDS)[number];
export type MetricField = (typeof METRIC_FIELDS)[number];
export type IdentityField = (typeof IDENTITY_FIELDS)[number];
export type RegisteredField = EvidenceField | MetricField | IdentityField;

export type MetricFieldSpec = {
  defaultUnit: string;
  evidenceField: EvidenceField;
  payloadKeys: readonly string[];
};

export const METRIC_FIELD_SPECS: Record<MetricField, MetricFieldSpec> = {
  NOAEL: {
    defaultUnit: "mg/kg bw/day",
    evidenceField: "repeated_dose_toxicity",
    payloadKeys: ["noael", "noael_payload", "NOAEL"],
  },
  DAP: {
    defaultUnit: "%",
    evidenceField: "percutaneous_absorption",
    payloadKeys: ["dap", "dap_payload", "DAP"],
  },
};

export const DEFAULT_CATEGORY = "OTHERS";

const EVIDENCE_FIELD_SET: ReadonlySet<string> = new Set<string>(EVIDENCE_FIELDS);
const METRIC_FIELD_SET: ReadonlySet<string> = new Set<string>(METRIC_FIELDS);
const IDENTITY_FIELD_SET: ReadonlySet<string> = new Set<string>(IDENTITY_FIELDS);

export function isEvidenceField(name: string): name is EvidenceField {
  return EVIDENCE_FIELD_SET.has(name);
}

export function isMetricField(name: string): name is MetricField {
  return METRIC_FIELD_SET.has(name);
}

export function isRegisteredField(name: string): name is RegisteredField {
  return (
    isEvidenceField(name) ||
    isMetricField(name) ||
    IDENTITY_FIELD_SET.has(name)
  );
}

export function normalizeIngredientTag(name: string): string {
  return name.trim().toUpperCase();
}
