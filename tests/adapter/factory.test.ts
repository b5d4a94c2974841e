import { describe, expect, it } from "vitest";
import { resolveChatCompletionApi } from "../../src/adapter/api/index.js";
import { loadConfig } from "../../src/config/env.js";
import { silentLogger } from "../helpers/fakes.js";

describe("resolveChatCompletionApi", () => {
  it("uses the mock client when no key is configured", () => {
    const client = resolveChatCompletionApi(loadConfig({}), silentLogger);
    expect(client.kind).toBe("mock");
  });

  it("uses the real client when a key is configured", () => {
    const client = resolveChatCompletionApi(loadConfig({ OPENAI_API_KEY: "test-key" }), silentLogger);
    expect(client.kind).toBe("openai");
  });

  it("falls back to the mock client when the real one cannot be built", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-key", OPENAI_BASE_URL: "not a url" });
    expect(resolveChatCompletionApi(config, silentLogger).kind).toBe("mock");
  });

  it("answers offline when falling back", async () => {
    const client = resolveChatCompletionApi(loadConfig({}), silentLogger);
    const answer = await client.chat([{ role: "user", content: "What is osmosis?" }]);

    expect(answer.startsWith("[MockAnswer:")).toBe(true);
    expect(answer.endsWith(' Q="What is osmosis?"')).toBe(true);
  });
});
