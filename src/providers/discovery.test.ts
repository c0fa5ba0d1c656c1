import { describe, expect, it } from "vitest";
import { CompletionError } from "../core/errors.js";
import { createCompletionClient } from "./discovery.js";
import { EchoCompletionClient } from "./echo.js";
import { OpenAICompletionClient } from "./openai.js";

describe("createCompletionClient", () => {
  it("uses the echo client for the test model without a key", () => {
    expect(createCompletionClient("test", { env: {} })).toBeInstanceOf(EchoCompletionClient);
  });

  it("uses the OpenAI client with a configured key", () => {
    expect(createCompletionClient("gpt-4o", { apiKey: "test-secret", env: {} })).toBeInstanceOf(
      OpenAICompletionClient,
    );
  });

  it("falls back to OPENAI_API_KEY", () => {
    expect(createCompletionClient("gpt-4o", { env: { OPENAI_API_KEY: "test-secret" } }).clientId).toBe("openai");
  });

  it("fails with AuthInvalid when no key is configured", () => {
    expect(() => createCompletionClient("gpt-4o", { apiKey: "  ", env: {} })).toThrow(CompletionError);
    expect(() => createCompletionClient("gpt-4o", { env: {} })).toThrow("No API key configured");
  });
});
