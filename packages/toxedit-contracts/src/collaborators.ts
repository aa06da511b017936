import type { FormPayloads, IntentLabel, ToxicologyRecord } from "./schemas.js";

export type EditGenerationContext = {
  record: ToxicologyRecord;
  instruction: string;
  ingredientId: string;
  signal?: AbortSignal;
};

/**
 * Text-generation service behind the natural-language edit path.
 * Nothing it returns is trusted: patch proposals go through the patch protocol
 * and full updates through the merge engine plus record validation.
 */
export type EditGenerator = {
  generatePatch: (context: EditGenerationContext) => Promise<unknown>;
  /** Resolves to `undefined` when the service produced no readable JSON. */
  generateFullUpdate: (context: EditGenerationContext) => Promise<unknown>;
  classifyAmbiguous: (instruction: string, signal?: AbortSignal) => Promise<IntentLabel>;
};

export type FormPayloadExtractor = {
  extract: (rawText: string, signal?: AbortSignal) => Promise<FormPayloads>;
};
