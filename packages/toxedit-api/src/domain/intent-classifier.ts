import {
  EVIDENCE_FIELDS,
  IDENTITY_FIELDS,
  METRIC_FIELDS,
  type FormPayloads,
  type IntentLabel,
} from "@toxedit/contracts";
import { EditError, describeError } from "./edit-errors.js";
import { readFormPayloads } from "./form-apply.js";
import { isPlainObject, type JsonObject } from "./json-values.js";
import { LOG_PREFIX, consoleLogger, type EditLogger } from "./logger.js";

export type IntentSource = "payload" | "heuristic" | "collaborator" | "default";

export type ClassifiedIntent =
  | { label: "FORM_EDIT_STRUCTURED"; payloads: FormPayloads; source: IntentSource }
  | { label: "FORM_EDIT_RAW"; text: string; source: IntentSource }
  | { label: "NLI_EDIT"; instruction: string; source: IntentSource }
  | { label: "NO_EDIT"; reason: string; source: IntentSource };

export type IntentInput = {
  instruction?: string;
  structuredPayload?: JsonObject;
};

export type ClassifyOptions = {
  classifyAmbiguous?: (instruction: string) => Promise<IntentLabel>;
  logger?: EditLogger;
  signal?: AbortSignal;
};

const EDIT_VERBS = /\b(set|change|update|add|remove|delete|modify|edit|replace|fix|correct)\b/i;
const METRIC_LABEL_LINE = /^[ \t]*(NOAEL|DAP|LOAEL|POD|HED)\b[^\n\d]{0,20}?[:=][ \t]*[-+]?\d/im;
const FORM_LABELS = [
  "noael:",
  "loael:",
  "dap:",
  "pod:",
  "hed:",
  "species:",
  "duration:",
  "study type:",
  "endpoint:",
  "correction form",
];
const QUESTION_OPENERS = /^(what|how|why|is|are|can|does|do|which|who|when|where)\b/i;
const INCI_MARKER = /^\s*INCI\s*:[^\n]*\n/i;

const FIELD_TERMS = [
  ...new Set(
    [...EVIDENCE_FIELDS, ...METRIC_FIELDS, ...IDENTITY_FIELDS, "dermal absorption"].flatMap((name) => {
      const lower = name.toLowerCase();
      return [lower, lower.replace(/_/g, " ")];
    }),
  ),
];

/** Parses a JSON object from the text, allowing a leading `INCI: NAME` line. */
export function parseJsonObjectFromText(text: string): JsonObject | null {
  const trimmed = text.trim().replace(INCI_MARKER, "").trim();
  const candidates = [trimmed];
  const open = trimmed.indexOf("{");
  const close = trimmed.lastIndexOf("}");
  if (open > 0 && close > open) {
    candidates.push(trimmed.slice(open, close + 1));
  }

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isPlainObject(parsed)) {
        return parsed;
      }
    } catch {
      continue;
    }
  }
  return null;
}

export function looksLikeCorrectionForm(text: string): boolean {
  if (METRIC_LABEL_LINE.test(text)) {
    return true;
  }
  const lower = text.toLowerCase();
  return FORM_LABELS.filter((label) => lower.includes(label)).length >= 2;
}

export function looksLikeEditInstruction(text: string): boolean {
  if (!EDIT_VERBS.test(text)) {
    return false;
  }
  const lower = text.toLowerCase();
  return FIELD_TERMS.some((term) => new RegExp(`\\b${term}\\b`).test(lower));
}

export function looksLikeQuestion(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.endsWith("?") || QUESTION_OPENERS.test(trimmed);
}

function payloadsFromText(text: string): FormPayloads | null {
  const parsed = parseJsonObjectFromText(text);
  if (!parsed) {
    return null;
  }
  const read = readFormPayloads(parsed);
  return read.status === "found" ? read.payloads : null;
}

/**
 * Routes an edit request to one of four paths. Deterministic rules run
 * first; only text none of them recognises reaches `classifyAmbiguous`.
 */
export async function classifyIntent(input: IntentInput, options: ClassifyOptions = {}): Promise<ClassifiedIntent> {
  const logger = options.logger ?? consoleLogger;

  if (input.structuredPayload !== undefined) {
    const read = readFormPayloads(input.structuredPayload);
    if (read.status === "found") {
      return { label: "FORM_EDIT_STRUCTURED", payloads: read.payloads, source: "payload" };
    }
    const reason = read.status === "invalid" ? read.reason : "payload carries no NOAEL or DAP entry";
    throw new EditError("PAYLOAD_VALIDATION_FAILED", `structured payload rejected: ${reason}`, {
      path: "FORM_EDIT_STRUCTURED",
    });
  }

  const text = input.instruction?.trim() ?? "";
  if (text.length === 0) {
    return { label: "NO_EDIT", reason: "empty instruction", source: "heuristic" };
  }

  const payloads = payloadsFromText(text);
  if (payloads) {
    return { label: "FORM_EDIT_STRUCTURED", payloads, source: "heuristic" };
  }

  if (looksLikeCorrectionForm(text)) {
    return { label: "FORM_EDIT_RAW", text, source: "heuristic" };
  }

  if (looksLikeEditInstruction(text)) {
    return { label: "NLI_EDIT", instruction: text, source: "heuristic" };
  }

  if (looksLikeQuestion(text)) {
    return { label: "NO_EDIT", reason: "instruction is a question", source: "heuristic" };
  }

  if (!options.classifyAmbiguous) {
    return { label: "NO_EDIT", reason: "instruction not recognised as an edit", source: "default" };
  }

  let label: IntentLabel;
  try {
    label = await options.classifyAmbiguous(text);
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    logger.warn(`${LOG_PREFIX} ambiguous intent classification failed: ${describeError(error)}`);
    return { label: "NO_EDIT", reason: "intent could not be classified", source: "default" };
  }

  switch (label) {
    case "FORM_EDIT_STRUCTURED":
      return { label, payloads: {}, source: "collaborator" };
    case "FORM_EDIT_RAW":
      return { label, text, source: "collaborator" };
    case "NLI_EDIT":
      return { label, instruction: text, source: "collaborator" };
    case "NO_EDIT":
      return { label, reason: "classified as no edit", source: "collaborator" };
  }
}
