import { z } from "zod";
import { EVIDENCE_FIELDS, IDENTITY_FIELDS, METRIC_FIELDS } from "./fields.js";

export const IntentLabelSchema = z.enum([
  "NLI_EDIT",
  "FORM_EDIT_STRUCTURED",
  "FORM_EDIT_RAW",
  "NO_EDIT",
]);

export const PatchOpSchema = z.enum(["add", "remove", "replace", "move", "copy", "test"]);
export const RecordChangeTypeSchema = z.enum(["add", "remove", "change"]);
export const EditErrorCodeSchema = z.enum([
  "PATCH_VALIDATION_FAILED",
  "UNKNOWN_FIELD_REFERENCE",
  "GENERATION_TIMEOUT",
  "GENERATION_ERROR",
  "MALFORMED_FALLBACK_OUTPUT",
  "PAYLOAD_VALIDATION_FAILED",
  "STORE_WRITE_FAILURE",
  "EDIT_CANCELLED",
]);

export const EvidenceFieldSchema = z.enum(EVIDENCE_FIELDS);
export const MetricFieldSchema = z.enum(METRIC_FIELDS);
export const IdentityFieldSchema = z.enum(IDENTITY_FIELDS);

export const IdSchema = z.string().min(1).max(128);
export const IngredientIdSchema = z.string().trim().min(1).max(240);

export const EvidenceReferenceSchema = z
  .object({
    title: z.string(),
    link: z.string().nullable().optional(),
  })
  .loose();

export const ReplacedMarkerSchema = z
  .object({
    replaced_inci: z.string(),
    replaced_type: z.string(),
  })
  .loose();

export const EvidenceEntrySchema = z
  .object({
    reference: z.union([EvidenceReferenceSchema, z.string()]),
    data: z.union([z.array(z.string()), z.string()]),
    source: z.string(),
    statement: z.string().nullable(),
    replaced: z.union([ReplacedMarkerSchema, z.boolean()]),
  })
  .loose();

export const MetricValueSchema = z.union([z.number(), z.string()]);

export const MetricEntrySchema = z
  .object({
    value: MetricValueSchema,
    unit: z.string(),
    source: z.string(),
    type: z.string().optional(),
    note: z.string().nullable().optional(),
    experiment_target: z.string().nullable().optional(),
    study_duration: z.string().nullable().optional(),
  })
  .loose();

const EvidenceListSchema = z.array(EvidenceEntrySchema).optional();
const MetricListSchema = z.array(MetricEntrySchema).optional();

export const ToxicologyRecordSchema = z
  .object({
    inci: z.string(),
    inci_ori: z.string().optional(),
    cas: z.array(z.string()).optional(),
    isSkip: z.boolean().optional(),
    category: z.string().optional(),
    acute_toxicity: EvidenceListSchema,
    skin_irritation: EvidenceListSchema,
    skin_sensitization: EvidenceListSchema,
    ocular_irritation: EvidenceListSchema,
    phototoxicity: EvidenceListSchema,
    repeated_dose_toxicity: EvidenceListSchema,
    percutaneous_absorption: EvidenceListSchema,
    ingredient_profile: EvidenceListSchema,
    NOAEL: MetricListSchema,
    DAP: MetricListSchema,
  })
  .loose();

export const FieldUpdateSchema = z.record(z.string(), z.unknown());

export const PatchOperationSchema = z.object({
  op: PatchOpSchema,
  path: z.string(),
  value: z.unknown().optional(),
  from: z.string().optional(),
});

export const MetricFormPayloadSchema = z
  .object({
    value: MetricValueSchema,
    unit: z.string().optional(),
    source: z.string().nullable().optional(),
    experiment_target: z.string().nullable().optional(),
    study_duration: z.string().nullable().optional(),
    note: z.string().nullable().optional(),
    reference_title: z.string().nullable().optional(),
    reference_link: z.string().nullable().optional(),
    statement: z.string().nullable().optional(),
  })
  .loose();

export const FormPayloadsSchema = z.object({
  NOAEL: MetricFormPayloadSchema.optional(),
  DAP: MetricFormPayloadSchema.optional(),
});

export const RecordVersionSchema = z.object({
  threadId: IdSchema,
  version: z.number().int().min(1),
  record: ToxicologyRecordSchema,
  summary: z.string(),
  createdAt: z.iso.datetime(),
  patchOps: z.array(PatchOperationSchema).optional(),
  batchId: IdSchema.optional(),
  ingredientTag: z.string().min(1).optional(),
  isBatchItem: z.boolean(),
  pathTaken: IntentLabelSchema.optional(),
  fallbackUsed: z.boolean(),
});

export const VersionSummarySchema = z.object({
  version: z.number().int().min(1),
  summary: z.string(),
  createdAt: z.iso.datetime(),
  pathTaken: IntentLabelSchema.optional(),
  fallbackUsed: z.boolean(),
  patchOpCount: z.number().int().min(0),
});

export const RecordChangeSchema = z.object({
  type: RecordChangeTypeSchema,
  path: z.string(),
  old: z.unknown().optional(),
  new: z.unknown().optional(),
});

export const EditRequestSchema = z.object({
  ingredientId: IngredientIdSchema,
  instruction: z.string().max(20000).optional(),
  structuredPayload: FieldUpdateSchema.optional(),
  threadId: IdSchema.optional(),
  initialRecord: ToxicologyRecordSchema.optional(),
});

export const EditResponseSchema = z.object({
  threadId: IdSchema,
  version: z.number().int().min(1),
  record: ToxicologyRecordSchema,
  pathTaken: IntentLabelSchema,
  fallbackUsed: z.boolean(),
  patchOps: z.array(PatchOperationSchema).optional(),
  summary: z.string(),
});

export const EditFailureSchema = z.object({
  code: EditErrorCodeSchema,
  message: z.string(),
  path: IntentLabelSchema.optional(),
});

export const BatchEditEntrySchema = z.object({
  ingredientId: IngredientIdSchema,
  instruction: z.string().max(20000).optional(),
  structuredPayload: FieldUpdateSchema.optional(),
});

export const BatchEditRequestSchema = z.object({
  edits: z.array(BatchEditEntrySchema).min(1).max(50),
});

export const BatchEditItemResultSchema = z.object({
  index: z.number().int().min(0),
  ingredientId: IngredientIdSchema,
  threadId: IdSchema,
  ok: z.boolean(),
  result: EditResponseSchema.optional(),
  error: EditFailureSchema.optional(),
});

export const BatchEditResponseSchema = z.object({
  batchId: IdSchema,
  threadMap: z.record(z.string(), IdSchema),
  requested: z.number().int().min(1),
  succeeded: z.number().int().min(0),
  failed: z.number().int().min(0),
  results: z.array(BatchEditItemResultSchema),
});

export const EvidenceEntryRequestSchema = z.object({
  ingredientId: IngredientIdSchema,
  threadId: IdSchema.optional(),
  data: z.array(z.string().trim().min(1)).min(1),
  source: z.string().trim().min(1),
  reference_title: z.string().trim().min(1),
  reference_link: z.string().nullable().optional(),
  statement: z.string().trim().min(1).optional(),
  metadata: z.record(z.string(), z.string()).optional(),
});

export const EvidenceListResponseSchema = z.object({
  threadId: IdSchema,
  version: z.number().int().min(1),
  field: EvidenceFieldSchema,
  inci: z.string(),
  entries: z.array(EvidenceEntrySchema),
  count: z.number().int().min(0),
});

export const ExtractionRequestSchema = z.object({
  text: z.string().trim().min(1).max(20000),
});

export const ExtractionResponseSchema = z.object({
  fields: z.array(MetricFieldSchema),
  payloads: FormPayloadsSchema,
});

export const FieldListResponseSchema = z.object({
  evidence: z.array(EvidenceFieldSchema),
  metrics: z.array(
    z.object({
      field: MetricFieldSchema,
      defaultUnit: z.string(),
      evidenceField: EvidenceFieldSchema,
    }),
  ),
  identity: z.array(IdentityFieldSchema),
});

export const VersionResponseSchema = z.object({
  version: RecordVersionSchema,
});

export const HistoryResponseSchema = z.object({
  threadId: IdSchema,
  versions: z.array(VersionSummarySchema),
});

export const DiffResponseSchema = z.object({
  threadId: IdSchema,
  fromVersion: z.number().int().min(1),
  toVersion: z.number().int().min(1),
  changes: z.array(RecordChangeSchema),
});

export const VersionListResponseSchema = z.object({
  versions: z.array(RecordVersionSchema),
});

export const HealthResponseSchema = z.object({
  ok: z.literal(true),
  service: z.string(),
  now: z.iso.datetime(),
});

export type IntentLabel = z.infer<typeof IntentLabelSchema>;
export type PatchOp = z.infer<typeof PatchOpSchema>;
export type RecordChangeType = z.infer<typeof RecordChangeTypeSchema>;
export type EditErrorCode = z.infer<typeof EditErrorCodeSchema>;
export type EvidenceReference = z.infer<typeof EvidenceReferenceSchema>;
export type EvidenceEntry = z.infer<typeof EvidenceEntrySchema>;
export type MetricEntry = z.infer<typeof MetricEntrySchema>;
export type ToxicologyRecord = z.infer<typeof ToxicologyRecordSchema>;
export type FieldUpdate = z.infer<typeof FieldUpdateSchema>;
export type PatchOperation = z.infer<typeof PatchOperationSchema>;
export type MetricFormPayload = z.infer<typeof MetricFormPayloadSchema>;
export type FormPayloads = z.infer<typeof FormPayloadsSchema>;
export type RecordVersion = z.infer<typeof RecordVersionSchema>;
export type VersionSummary = z.infer<typeof VersionSummarySchema>;
export type RecordChange = z.infer<typeof RecordChangeSchema>;
export type EditRequest = z.infer<typeof EditRequestSchema>;
export type EditResponse = z.infer<typeof EditResponseSchema>;
export type EditFailure = z.infer<typeof EditFailureSchema>;
export type BatchEditEntry = z.infer<typeof BatchEditEntrySchema>;
export type BatchEditRequest = z.infer<typeof BatchEditRequestSchema>;
export type BatchEditItemResult = z.infer<typeof BatchEditItemResultSchema>;
export type BatchEditResponse = z.infer<typeof BatchEditResponseSchema>;
export type EvidenceEntryRequest = z.infer<typeof EvidenceEntryRequestSchema>;
export type EvidenceListResponse = z.infer<typeof EvidenceListResponseSchema>;
export type ExtractionRequest = z.infer<typeof ExtractionRequestSchema>;
export type ExtractionResponse = z.infer<typeof ExtractionResponseSchema>;
export type FieldListResponse = z.infer<typeof FieldListResponseSchema>;
export type VersionResponse = z.infer<typeof VersionResponseSchema>;
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
export type DiffResponse = z.infer<typeof DiffResponseSchema>;
export type VersionListResponse = z.infer<typeof VersionListResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
