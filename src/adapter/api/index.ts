import type { Logger } from "pino";
import type { AppConfig } from "../../config/env.js";
import type { ChatCompletionApi } from "../../core/api/chat-completion.js";
import { errorMessage } from "../../core/errors.js";
import { MockChatCompletionApi } from "./mock.js";
import { OpenAIChatCompletionApi } from "./openai.js";

/**
 * Picks the model client once, at composition time. A configured key selects
 * the real client; a client that cannot be built degrades to the mock.
 */
export function resolveChatCompletionApi(config: AppConfig, logger: Logger): ChatCompletionApi {
  const mock = (): ChatCompletionApi =>
    new MockChatCompletionApi({ seed: config.mockSeed, defaultModel: config.openaiModel });

  if (!config.openaiApiKey) {
    logger.info("OPENAI_API_KEY not set; answering with the mock client");
    return mock();
  }

  try {
    return new OpenAIChatCompletionApi({
      baseUrl: config.openaiBaseUrl,
      apiKey: config.openaiApiKey,
      defaultModel: config.openaiModel,
      temperature: config.openaiTemperature,
      timeoutMs: config.llmTimeoutMs,
      logger,
    });
  } catch (error) {
    logger.warn({ reason: errorMessage(error) }, "OpenAI client unavailable; falling back to the mock client");
    return mock();
  }
}
