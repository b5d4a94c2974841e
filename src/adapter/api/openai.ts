import type { Logger } from "pino";
import { z } from "zod";
import type { ChatCompletionApi } from "../../core/api/chat-completion.js";
import { UpstreamError, errorMessage } from "../../core/errors.js";
import type { ChatMessage } from "../../types/chat.js";

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            role: z.string().optional(),
            content: z.string().nullish(),
          })
          .optional(),
      }),
    )
    .min(1, "response contained no choices"),
});

export interface OpenAIClientOptions {
  baseUrl: string;
  apiKey: string;
  defaultModel: string;
  temperature?: number;
  /** 0 or absent leaves the request unbounded. */
  timeoutMs?: number;
  logger: Logger;
}

function toEndpoint(baseUrl: string): string {
  const url = new URL(baseUrl.trim());
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`unsupported base URL protocol: ${url.protocol}`);
  }
  return `${url.toString().replace(/\/$/, "")}/chat/completions`;
}

function isTextMessage(message: ChatMessage): boolean {
  return typeof message.role === "string" && typeof message.content === "string";
}

function toOneLine(value: string, maxLen = 80): string {
  const compact = value.replace(/\s+/g, " ").trim();
  if (compact.length <= maxLen) {
    return compact;
  }
  return `${compact.slice(0, maxLen)}...`;
}

export class OpenAIChatCompletionApi implements ChatCompletionApi {
  readonly kind = "openai" as const;
  private readonly endpoint: string;

  constructor(private readonly options: OpenAIClientOptions) {
    if (!options.apiKey.trim()) {
      throw new Error("OpenAI API key is empty");
    }
    this.endpoint = toEndpoint(options.baseUrl);
  }

  async chat(messages: readonly ChatMessage[], model?: string): Promise<string> {
    try {
      return await this.complete(messages, model?.trim() || this.options.defaultModel);
    } catch (error) {
      throw new UpstreamError(`OpenAI call failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async complete(messages: readonly ChatMessage[], model: string): Promise<string> {
    const body = {
      model,
      messages: messages
        .filter(isTextMessage)
        .map((message) => ({ role: message.role, content: message.content })),
      temperature: this.options.temperature ?? 0.2,
    };

    this.options.logger.debug(
      {
        model,
        roleSeq: body.messages.map((m) => m.role).join(">"),
        preview: body.messages
          .slice(-3)
          .map((m) => `${m.role}:${toOneLine(m.content)}`)
          .join(" | "),
      },
      "chat completion request",
    );

    const timeoutMs = this.options.timeoutMs ?? 0;
    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify(body),
      ...(timeoutMs > 0 ? { signal: AbortSignal.timeout(timeoutMs) } : {}),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`LLM request failed (${response.status}): ${toOneLine(errorBody, 300)}`);
    }

    const parsed = completionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid payload"}`);
    }

    const content = parsed.data.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error("LLM response did not contain assistant content");
    }

    return content;
  }
}
