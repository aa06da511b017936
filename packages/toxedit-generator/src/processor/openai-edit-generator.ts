import {
  EVIDENCE_FIELDS,
  IntentLabelSchema,
  METRIC_FIELD_SPECS,
  type EditGenerationContext,
  type EditGenerator,
  type IntentLabel,
} from "@toxedit/contracts";
import { parseJsonOutput } from "./json-output.js";
import type { OpenAiCompatibleClient } from "./llm-client.js";

const FIELD_GUIDE = [
  `Evidence list fields: ${EVIDENCE_FIELDS.join(", ")}.`,
  "Each evidence entry has reference {title, link}, data (list of sentences), source, statement and replaced.",
  `Metric list fields: NOAEL (default unit "${METRIC_FIELD_SPECS.NOAEL.defaultUnit}") and DAP (unit "%").`,
  "Each metric entry has value, unit, source, type, note, experiment_target and study_duration.",
  "Identity fields: inci, inci_ori, cas (list of strings), isSkip (boolean), category.",
].join("\n");

const PATCH_SYSTEM_PROMPT = [
  "You edit toxicology records for cosmetic ingredients using RFC 6902 JSON Patch.",
  FIELD_GUIDE,
  'Return a JSON object {"operations": [...]} with the smallest list of operations that applies the instruction.',
  'Use "/NOAEL/-" or "/<evidence field>/-" to append. Only reference fields listed above or already in the record.',
  "Never use placeholders such as \"...\".",
].join("\n");

const FULL_UPDATE_SYSTEM_PROMPT = [
  "You edit toxicology records for cosmetic ingredients.",
  FIELD_GUIDE,
  "Return a JSON object holding only the top-level fields that change, with their complete new values.",
  "Metric fields replace the existing list; evidence entries are appended to the existing list.",
  "Never use placeholders such as \"...\" and never wrap the fields in another object.",
].join("\n");

const CLASSIFY_SYSTEM_PROMPT = [
  "Classify the user input for a toxicology record editor.",
  "NLI_EDIT: an instruction to change the record, for example \"Change source to FDA\".",
  "FORM_EDIT_STRUCTURED: JSON or structured form data.",
  "FORM_EDIT_RAW: pasted study or correction-form text with NOAEL, DAP or study details to extract.",
  "NO_EDIT: questions and anything that is not an edit.",
  'Return a JSON object {"label": "<category>"}.',
].join("\n");

type OpenAiEditGeneratorOptions = {
  client: OpenAiCompatibleClient;
};

export class OpenAiEditGenerator implements EditGenerator {
  private readonly client: OpenAiCompatibleClient;

  constructor(options: OpenAiEditGeneratorOptions) {
    this.client = options.client;
  }

  async generatePatch(context: EditGenerationContext): Promise<unknown> {
    const raw = await this.client.completeJson({
      task: "patch generation",
      system: PATCH_SYSTEM_PROMPT,
      user: buildEditPrompt(context),
      signal: context.signal,
    });

    const parsed = parseJsonOutput(raw);
    if (typeof parsed === "object" && parsed !== null && "operations" in parsed) {
      return parsed.operations;
    }
    return parsed;
  }

  async generateFullUpdate(context: EditGenerationContext): Promise<unknown> {
    const raw = await this.client.completeJson({
      task: "full update generation",
      system: FULL_UPDATE_SYSTEM_PROMPT,
      user: buildEditPrompt(context),
      signal: context.signal,
    });
    return parseJsonOutput(raw);
  }

  async classifyAmbiguous(instruction: string, signal?: AbortSignal): Promise<IntentLabel> {
    const raw = await this.client.completeJson({
      task: "intent classification",
      system: CLASSIFY_SYSTEM_PROMPT,
      user: instruction,
      signal,
    });

    const parsed = parseJsonOutput(raw);
    const candidate =
      typeof parsed === "object" && parsed !== null && "label" in parsed ? parsed.label : parsed;
    const label = IntentLabelSchema.safeParse(
      typeof candidate === "string" ? candidate.trim().toUpperCase() : candidate,
    );
    if (!label.success) {
      throw new Error(`intent classification returned an unknown label: ${String(raw).slice(0, 120)}`);
    }
    return label.data;
  }
}

function buildEditPrompt(context: EditGenerationContext): string {
  return [
    `Ingredient: ${context.ingredientId}`,
    "Current record:",
    JSON.stringify(context.record, null, 2),
    "Instruction:",
    context.instruction,
  ].join("\n");
}
