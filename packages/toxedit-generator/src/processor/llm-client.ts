import { z } from "zod";

export type LlmApiStyle = "responses" | "chat_completions";

export const DEFAULT_LLM_BASE_URL = "https://api.openai.com/v1";

export type OpenAiCompatibleClientOptions = {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  apiStyle?: LlmApiStyle;
  timeoutMs?: number;
};

export type JsonCompletionRequest = {
  task: string;
  system: string;
  user: string;
  signal?: AbortSignal;
};

const TextPartSchema = z.looseObject({ text: z.string().optional() });

const ResponsesPayloadSchema = z.looseObject({
  output_text: z.string().optional(),
  output: z.array(z.looseObject({ content: z.array(TextPartSchema).optional() })).optional(),
});

const ChatCompletionsPayloadSchema = z.looseObject({
  choices: z
    .array(
      z.looseObject({
        message: z
          .looseObject({ content: z.union([z.string(), z.array(TextPartSchema), z.null()]).optional() })
          .optional(),
      }),
    )
    .optional(),
});

/**
 * Client for the edit service's text-generation endpoint. Speaks either the
 * responses API or chat completions, asks for a JSON object and returns the
 * raw answer text, or null when there is none.
 */
export class OpenAiCompatibleClient {
  readonly model: string;
  readonly apiStyle: LlmApiStyle;
  private readonly apiKey?: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: OpenAiCompatibleClientOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey?.trim() || undefined;
    this.baseUrl = (options.baseUrl?.trim() || DEFAULT_LLM_BASE_URL).replace(/\/$/, "");
    this.apiStyle = options.apiStyle ?? "responses";
    this.timeoutMs = options.timeoutMs ?? 25000;
  }

  async completeJson(request: JsonCompletionRequest): Promise<string | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    }
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const payload = await this.post(request, controller.signal);
      return this.apiStyle === "chat_completions"
        ? chatCompletionText(payload, request.task)
        : responsesText(payload, request.task);
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private async post(request: JsonCompletionRequest, signal: AbortSignal): Promise<unknown> {
    const chat = this.apiStyle === "chat_completions";
    const response = await fetch(`${this.baseUrl}/${chat ? "chat/completions" : "responses"}`, {
      method: "POST",
      headers: this.buildHeaders(),
      body: JSON.stringify(chat ? this.chatBody(request) : this.responsesBody(request)),
      signal,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`${request.task} failed via ${this.apiStyle} (${response.status}): ${body}`);
    }
    return response.json();
  }

  private responsesBody(request: JsonCompletionRequest) {
    return {
      model: this.model,
      input: [
        { role: "system", content: [{ type: "input_text", text: request.system }] },
        { role: "user", content: [{ type: "input_text", text: request.user }] },
      ],
      text: { format: { type: "json_object" } },
    };
  }

  private chatBody(request: JsonCompletionRequest) {
    return {
      model: this.model,
      temperature: 0,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
      response_format: { type: "json_object" },
    };
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.apiKey) {
      headers.authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

function joinTextParts(parts: ReadonlyArray<{ text?: string }>): string | null {
  const texts = parts.flatMap((part) => (part.text ? [part.text] : []));
  return texts.length > 0 ? texts.join("\n") : null;
}

function responsesText(payload: unknown, task: string): string | null {
  const parsed = ResponsesPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`${task} returned an unreadable responses payload`);
  }
  if (parsed.data.output_text) {
    return parsed.data.output_text;
  }
  return joinTextParts((parsed.data.output ?? []).flatMap((entry) => entry.content ?? []));
}

function chatCompletionText(payload: unknown, task: string): string | null {
  const parsed = ChatCompletionsPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`${task} returned an unreadable chat_completions payload`);
  }
  const content = parsed.data.choices?.[0]?.message?.content;
  if (typeof content === "string") {
    return content.length > 0 ? content : null;
  }
  return content ? joinTextParts(content) : null;
}
