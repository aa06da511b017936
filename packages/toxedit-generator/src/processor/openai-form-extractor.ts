import {
  METRIC_FIELDS,
  METRIC_FIELD_SPECS,
  MetricFormPayloadSchema,
  type FormPayloadExtractor,
  type FormPayloads,
} from "@toxedit/contracts";
import { parseJsonOutput } from "./json-output.js";
import type { OpenAiCompatibleClient } from "./llm-client.js";

const EXTRACTION_SYSTEM_PROMPT = [
  "Extract toxicology values from a pasted correction form or study summary.",
  'Return a JSON object {"noael": <payload or null>, "dap": <payload or null>}.',
  "A payload has value (number), unit, source, experiment_target (species), study_duration,",
  "note, reference_title, reference_link and statement. Leave out anything the text does not state.",
  "Use null for a metric the text does not mention.",
].join("\n");

type OpenAiFormExtractorOptions = {
  client: OpenAiCompatibleClient;
};

export class OpenAiFormExtractor implements FormPayloadExtractor {
  private readonly client: OpenAiCompatibleClient;

  constructor(options: OpenAiFormExtractorOptions) {
    this.client = options.client;
  }

  async extract(rawText: string, signal?: AbortSignal): Promise<FormPayloads> {
    if (rawText.trim().length === 0) {
      return {};
    }

    const raw = await this.client.completeJson({
      task: "correction form extraction",
      system: EXTRACTION_SYSTEM_PROMPT,
      user: rawText,
      signal,
    });

    const parsed = parseJsonOutput(raw);
    if (!isRecord(parsed)) {
      return {};
    }

    const payloads: FormPayloads = {};
    for (const field of METRIC_FIELDS) {
      for (const key of METRIC_FIELD_SPECS[field].payloadKeys) {
        const result = MetricFormPayloadSchema.safeParse(parsed[key]);
        if (result.success) {
          payloads[field] = result.data;
          break;
        }
      }
    }
    return payloads;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
