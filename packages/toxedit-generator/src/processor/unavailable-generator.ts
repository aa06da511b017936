import type { EditGenerationContext, EditGenerator, IntentLabel } from "@toxedit/contracts";

/**
 * Stand-in used when no text-generation service is configured. Every call
 * fails, so natural-language edits surface GENERATION_ERROR while structured
 * and correction-form edits keep working.
 */
export class UnavailableEditGenerator implements EditGenerator {
  async generatePatch(_context: EditGenerationContext): Promise<unknown> {
    throw unavailable();
  }

  async generateFullUpdate(_context: EditGenerationContext): Promise<unknown> {
    throw unavailable();
  }

  async classifyAmbiguous(_instruction: string): Promise<IntentLabel> {
    throw unavailable();
  }
}

function unavailable(): Error {
  return new Error("no text-generation service configured; set TOXEDIT_LLM_API_KEY or TOXEDIT_LLM_BASE_URL");
}
