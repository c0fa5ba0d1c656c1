import { describe, expect, it } from "vitest";
import { CancelledError, CompletionError } from "../core/errors.js";
import { buildCompletionRequest, resolveCompletionParams } from "../core/options.js";
import { createMockClient } from "./mock-client.js";

const params = resolveCompletionParams({ model: "gpt-4o-mini" });

function request(prompt: string, chunkIndex = 0) {
  return buildCompletionRequest(chunkIndex, prompt, params);
}

describe("MockCompletionClient", () => {
  it("replays outcomes in order and records calls", async () => {
    const client = createMockClient(["first", ["a", "b"]]);

    const one = await client.complete(request("p0"));
    const two = await client.complete(request("p1", 1));

    expect(one.choices.map((choice) => choice.text)).toEqual(["first"]);
    expect(two.choices).toEqual([
      { index: 0, text: "a", finishReason: "stop" },
      { index: 1, text: "b", finishReason: "stop" },
    ]);
    expect(two.chunkIndex).toBe(1);
    expect(client.prompts).toEqual(["p0", "p1"]);
    expect(client.callCount).toBe(2);
  });

  it("echoes the prompt once the script runs out", async () => {
    const client = createMockClient();
    const response = await client.complete(request("echo me"));
    expect(response.choices[0]?.text).toBe("echo me");
  });

  it("uses the fallback when given", async () => {
    const client = createMockClient([], { fallback: (req) => `re: ${req.prompt}` });
    const response = await client.complete(request("hi"));
    expect(response.choices[0]?.text).toBe("re: hi");
  });

  it("throws scripted errors", async () => {
    const client = createMockClient([new CompletionError("RateLimited", "slow down")]);
    await expect(client.complete(request("x"))).rejects.toThrow("slow down");
  });

  it("computes outcomes from the request", async () => {
    const client = createMockClient().enqueue((req) => req.prompt.length.toString());
    const response = await client.complete(request("four"));
    expect(response.choices[0]?.text).toBe("4");
  });

  it("reports the configured usage", async () => {
    const usage = { inputTokens: 1, outputTokens: 2, totalTokens: 3 };
    const client = createMockClient(["ok"], { usage });
    const response = await client.complete(request("x"));
    expect(response.usage).toEqual(usage);
  });

  it("rejects when aborted during the delay", async () => {
    const client = createMockClient(["late"], { delayMs: 5000 });
    const controller = new AbortController();

    const pending = client.complete(request("x"), { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it("rejects at once when already aborted", async () => {
    const client = createMockClient(["never"]);
    const controller = new AbortController();
    controller.abort();

    await expect(client.complete(request("x"), { signal: controller.signal })).rejects.toThrow("Request cancelled");
    expect(client.callCount).toBe(1);
  });
});
