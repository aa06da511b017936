import type { EditGenerator, FormPayloadExtractor } from "@toxedit/contracts";
import { FallbackFormExtractor, defaultGeneratorLogger, type GeneratorLogger } from "./form-extraction.js";
import { HeuristicFormExtractor } from "./heuristic-form-extractor.js";
import { DEFAULT_LLM_BASE_URL, OpenAiCompatibleClient, type LlmApiStyle } from "./llm-client.js";
import { OpenAiEditGenerator } from "./openai-edit-generator.js";
import { OpenAiFormExtractor } from "./openai-form-extractor.js";
import { UnavailableEditGenerator } from "./unavailable-generator.js";

export const DEFAULT_LLM_MODEL = "gpt-4o-mini";

export type EditLlmConfig = {
  baseUrl: string;
  model: string;
  apiKey?: string;
  apiStyle: LlmApiStyle;
};

export type EditCollaborators = {
  generator: EditGenerator;
  extractor: FormPayloadExtractor;
  llmConfig: EditLlmConfig | null;
};

export function createEditCollaboratorsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: { logger?: GeneratorLogger } = {},
): EditCollaborators {
  const logger = options.logger ?? defaultGeneratorLogger;
  const heuristicExtractor = new HeuristicFormExtractor();
  const llmConfig = resolveEditLlmConfigFromEnv(env);

  if (!llmConfig) {
    logger.warn("[toxedit-generator] no text-generation service configured; natural-language edits will fail");
    return {
      generator: new UnavailableEditGenerator(),
      extractor: new FallbackFormExtractor({
        primaryExtractor: heuristicExtractor,
        fallbackExtractor: heuristicExtractor,
        logger,
      }),
      llmConfig: null,
    };
  }

  const client = new OpenAiCompatibleClient(llmConfig);

  return {
    generator: new OpenAiEditGenerator({ client }),
    extractor: new FallbackFormExtractor({
      primaryExtractor: new OpenAiFormExtractor({ client }),
      fallbackExtractor: heuristicExtractor,
      logger,
    }),
    llmConfig,
  };
}

/**
 * Reads the text-generation service settings. The hosted default endpoint
 * needs a key; a custom `TOXEDIT_LLM_BASE_URL` (a local server, a gateway)
 * may run without one and defaults to chat completions.
 */
export function resolveEditLlmConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): EditLlmConfig | null {
  const baseUrl = env.TOXEDIT_LLM_BASE_URL?.trim() || DEFAULT_LLM_BASE_URL;
  const hosted = baseUrl === DEFAULT_LLM_BASE_URL;
  const apiKey = env.TOXEDIT_LLM_API_KEY?.trim() || (hosted ? env.OPENAI_API_KEY?.trim() : undefined) || undefined;
  if (hosted && !apiKey) {
    return null;
  }

  return {
    baseUrl,
    model: env.TOXEDIT_LLM_MODEL?.trim() || DEFAULT_LLM_MODEL,
    apiKey,
    apiStyle: readApiStyle(env.TOXEDIT_LLM_API, hosted ? "responses" : "chat_completions"),
  };
}

function readApiStyle(value: string | undefined, fallback: LlmApiStyle): LlmApiStyle {
  const raw = value?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (raw !== "responses" && raw !== "chat_completions") {
    throw new Error(`invalid TOXEDIT_LLM_API: ${raw}`);
  }
  return raw;
}
