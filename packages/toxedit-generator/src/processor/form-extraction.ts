import type { FormPayloadExtractor, FormPayloads } from "@toxedit/contracts";

export type GeneratorLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const defaultGeneratorLogger: GeneratorLogger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

type FallbackFormExtractorOptions = {
  primaryExtractor: FormPayloadExtractor;
  fallbackExtractor: FormPayloadExtractor;
  logger?: GeneratorLogger;
};

function isEmpty(payloads: FormPayloads): boolean {
  return payloads.NOAEL === undefined && payloads.DAP === undefined;
}

/** Tries the primary extractor and falls back when it fails or finds nothing. */
export class FallbackFormExtractor implements FormPayloadExtractor {
  private readonly primaryExtractor: FormPayloadExtractor;
  private readonly fallbackExtractor: FormPayloadExtractor;
  private readonly logger: GeneratorLogger;

  constructor(options: FallbackFormExtractorOptions) {
    this.primaryExtractor = options.primaryExtractor;
    this.fallbackExtractor = options.fallbackExtractor;
    this.logger = options.logger ?? defaultGeneratorLogger;
  }

  async extract(rawText: string, signal?: AbortSignal): Promise<FormPayloads> {
    if (this.primaryExtractor === this.fallbackExtractor) {
      return this.primaryExtractor.extract(rawText, signal);
    }

    try {
      const payloads = await this.primaryExtractor.extract(rawText, signal);
      if (!isEmpty(payloads)) {
        return payloads;
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`[toxedit-generator] primary form extraction failed, using fallback: ${message}`);
    }

    return this.fallbackExtractor.extract(rawText, signal);
  }
}
