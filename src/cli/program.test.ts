import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CompletionError } from "../core/errors.js";
import { createTestEnvironment, type TestEnvironmentOptions, waitFor } from "../testing/cli-helpers.js";
import { createMockClient } from "../testing/mock-client.js";
import { type CLIConfig, emptyConfig, loadConfig, parseConfig } from "./config.js";
import { runCLI } from "./program.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "promptloom-cli-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

/** Config whose user templates live in the per-test directory. */
function testConfig(toml = ""): CLIConfig {
  const config = toml ? parseConfig(toml) : emptyConfig();
  return { ...config, global: { "templates-dir": join(dir, "templates"), ...config.global } };
}

async function run(args: string[], options: Omit<TestEnvironmentOptions, "args"> = {}, config = testConfig()) {
  const env = createTestEnvironment({ ...options, args });
  await runCLI({ env, config });
  return env;
}

describe("complete", () => {
  it("echoes the prompt with the test model", async () => {
    const env = await run(["-m", "test", "hello"]);
    expect(env.output()).toBe("hello\n");
    expect(env.exitCode).toBeUndefined();
  });

  it("reads the prompt from stdin", async () => {
    const env = await run(["-m", "test"], { stdin: "from a pipe\n" });
    expect(env.output()).toBe("from a pipe\n");
  });

  it("renders a config template", async () => {
    const config = testConfig('[prompts]\nshout = "<%= it.prompt %>!"\n');
    const env = await run(["-m", "test", "-t", "shout", "hey"], {}, config);
    expect(env.output()).toBe("hey!\n");
  });

  it("renders a built-in template with its partial", async () => {
    const env = await run(["-m", "test", "-t", "summarize", "Some text"]);
    expect(env.output()).toBe("Summarize the following text in a concise style.\n\nSome text\n\nSummary:\n");
  });

  it("passes template arguments", async () => {
    const env = await run(["-m", "test", "-t", "summarize", "-a", "style=formal", "Some text"]);
    expect(env.output()).toBe("Summarize the following text in a formal style.\n\nSome text\n\nSummary:\n");
  });

  it("fails before sending when a template key is missing", async () => {
    const client = createMockClient();
    const env = await run(["-m", "gpt-4o-mini", "-t", "translate", "hi"], { client });

    expect(env.errors()).toBe("Error: Template 'translate' is missing a value for: language\n");
    expect(env.exitCode).toBe(1);
    expect(client.callCount).toBe(0);
  });

  it("reports unknown templates", async () => {
    const env = await run(["-m", "test", "-t", "nope", "hi"]);
    expect(env.output()).toBe("");
    expect(env.errors()).toBe("Error: Template 'nope' not found\n");
    expect(env.exitCode).toBe(1);
  });

  it("sends each chunk in order", async () => {
    const client = createMockClient(["A", "B"]);
    const env = await run(["-m", "gpt-4o-mini", "-c", "4", "a. b."], { client });

    expect(client.prompts).toEqual(["a. ", "b."]);
    expect(env.output()).toBe("A\nB\n");
  });

  it("round-trips a cypher", async () => {
    const client = createMockClient([(request) => request.prompt.toUpperCase()]);
    const env = await run(["-m", "gpt-4o-mini", "--encode", "reverse", "hello world"], { client });

    expect(client.prompts).toEqual(["olleh dlrow"]);
    expect(env.output()).toBe("HELLO WORLD\n");
  });

  it("prints JSON", async () => {
    const usage = { inputTokens: 5, outputTokens: 2, totalTokens: 7 };
    const client = createMockClient(["Bonjour"], { usage });
    const env = await run(["-m", "gpt-4o-mini", "-o", "json", "Hello"], { client });

    const parsed: unknown = JSON.parse(env.output());
    expect(parsed).toEqual([
      {
        chunkIndex: 0,
        model: "gpt-4o-mini",
        choices: [{ index: 0, text: "Bonjour", finishReason: "stop" }],
        usage,
      },
    ]);
    expect(env.errors()).toMatch(/^\[promptloom\] gpt-4o-mini \| ↑ 5 \| ↓ 2 \| /);
  });

  it("asks for log-probabilities with the logprobs format", async () => {
    const client = createMockClient(["ok"]);
    const env = await run(["-m", "gpt-4o-mini", "-o", "logprobs", "hi"], { client });

    expect(client.calls[0]?.params.logprobs).toBe(0);
    expect(env.output()).toBe("ok\n");
  });

  it("maps generation options onto the request", async () => {
    const client = createMockClient(["ok"]);
    const config = testConfig('[complete]\nstop = "###"\ntemperature = 0.3\n');
    await run(
      [
        "-m",
        "gpt-4o-mini",
        "--stop",
        "END",
        "--max-tokens",
        "64",
        "-n",
        "2",
        "--logit-bias",
        "hi=5",
        "--logit-bias",
        "token:50256=-100",
        "prompt",
      ],
      { client },
      config,
    );

    const params = client.calls[0]?.params;
    expect(params?.stop).toEqual(["###", "END"]);
    expect(params?.temperature).toBe(0.3);
    expect(params?.maxTokens).toBe(64);
    expect(params?.n).toBe(2);
    // The test tokenizer maps " hi" to [32, 104, 105]
    expect(params?.logitBias).toEqual({ "32": 5, "50256": -100 });
  });

  it("passes API settings from [global] to the client", async () => {
    const client = createMockClient(["ok"]);
    const config = testConfig('[global]\napi-key = "test-secret"\napi-base = "http://localhost:1234/v1"\n');
    const env = await run(["-m", "gpt-4o-mini", "hi"], { client }, config);

    expect(env.clientRequests).toHaveLength(1);
    expect(env.clientRequests[0]?.model).toBe("gpt-4o-mini");
    expect(env.clientRequests[0]?.settings.apiKey).toBe("test-secret");
    expect(env.clientRequests[0]?.settings.baseURL).toBe("http://localhost:1234/v1");
  });

  it("requires an API key for remote models", async () => {
    const env = await run(["-m", "gpt-4o-mini", "hi"]);
    expect(env.errors()).toBe(
      "Error: No API key configured. Set OPENAI_API_KEY or api-key in the [global] config section\n",
    );
    expect(env.exitCode).toBe(1);
  });

  it("reports a chunk that keeps failing", async () => {
    const client = createMockClient([new CompletionError("ServiceUnavailable", "down")]);
    const env = await run(["-m", "gpt-4o-mini", "--retries", "0", "hi"], { client });

    expect(env.output()).toBe("");
    expect(env.errors()).toBe("Error: Chunk 0 failed after 1 attempt: down\n");
    expect(env.exitCode).toBe(1);
  });

  it("prints the finished chunks with --partial", async () => {
    const client = createMockClient(["A", new CompletionError("ServiceUnavailable", "down")]);
    const env = await run(["-m", "gpt-4o-mini", "-c", "4", "--retries", "0", "--partial", "a. b."], { client });

    expect(env.output()).toBe("A\n");
    expect(env.errors()).toBe("Error: Chunk 1 failed after 1 attempt: down\n");
    expect(env.exitCode).toBe(1);
  });

  it("cancels the run on Ctrl+C", async () => {
    const client = createMockClient(["never"], { delayMs: 5000 });
    const env = createTestEnvironment({ client, args: ["-m", "gpt-4o-mini", "hi"] });

    const running = runCLI({ env, config: testConfig() });
    await waitFor(() => client.callCount === 1);
    env.interrupt();
    await running;

    expect(env.output()).toBe("");
    expect(env.errors()).toMatch(/^\n\[Interrupted\]\nError: (Request|Run) cancelled\n$/);
    expect(env.exitCode).toBe(1);
  });

  it("wraps the prompt in the in- and out-prefix", async () => {
    const env = await run(["-m", "test", "--in-prefix", "Q: ", "--out-prefix", " A:", "hi"]);
    expect(env.output()).toBe("Q: hi A:\n");
  });

  it("takes the prefixes from [complete]", async () => {
    const config = testConfig('[complete]\nin-prefix = "Human: "\nout-prefix = "\\nAI:"\n');
    const env = await run(["-m", "test", "hi"], {}, config);
    expect(env.output()).toBe("Human: hi\nAI:\n");
  });

  it("appends the completion to the prompt file with --append", async () => {
    const file = join(dir, "chat.txt");
    writeFileSync(file, "Hello\n");
    const client = createMockClient(["Hi there"]);

    const env = await run(["-m", "gpt-4o-mini", "-f", file, "--out-prefix", "\nAI: ", "--append"], { client });

    expect(client.prompts).toEqual(["Hello\nAI: "]);
    expect(env.output()).toBe("Hi there\n");
    expect(readFileSync(file, "utf-8")).toBe("Hello\n\nAI: Hi there\n");
  });

  it("leaves the prompt file alone when the run fails", async () => {
    const file = join(dir, "chat.txt");
    writeFileSync(file, "Hello\n");
    const client = createMockClient([new CompletionError("ServiceUnavailable", "down")]);

    const env = await run(["-m", "gpt-4o-mini", "-f", file, "--retries", "0", "--append"], { client });

    expect(env.exitCode).toBe(1);
    expect(readFileSync(file, "utf-8")).toBe("Hello\n");
  });

  it("ignores --append without --file", async () => {
    const env = await run(["-m", "test", "--append", "hi"]);
    expect(env.output()).toBe("hi\n");
    expect(env.exitCode).toBeUndefined();
  });

  it("loads the config file named by PROMPTLOOM_CONFIG", async () => {
    const path = join(dir, "cli.toml");
    writeFileSync(path, '[complete]\nmodel = "test"\ntemplate = "shout"\n\n[prompts]\nshout = "<%= it.prompt %>!"\n');
    const env = createTestEnvironment({ env: { PROMPTLOOM_CONFIG: path }, args: ["hey"] });

    await runCLI({ env });
    expect(env.output()).toBe("hey!\n");
  });
});

describe("custom commands", () => {
  const toml = [
    "[prompts]",
    'shout = "<%= it.prompt %>!"',
    "",
    "[loud]",
    'description = "Shout it"',
    'model = "test"',
    'template = "shout"',
    "",
    "[french]",
    'model = "test"',
    'template = "translate"',
    'arg = "language=French"',
  ].join("\n");

  it("runs with the section's defaults", async () => {
    const env = await run(["loud", "hey"], {}, testConfig(toml));
    expect(env.output()).toBe("hey!\n");
  });

  it("uses template arguments from the section", async () => {
    const env = await run(["french", "hi"], {}, testConfig(toml));
    expect(env.output()).toBe("Translate the following text into French. Keep the formatting.\n\nhi\n");
  });

  it("lets command-line options win", async () => {
    const env = await run(["loud", "-t", "summarize", "hey"], {}, testConfig(toml));
    expect(env.output()).toBe("Summarize the following text in a concise style.\n\nhey\n\nSummary:\n");
  });
});

describe("chunk", () => {
  it("prints chunk boundaries", async () => {
    const env = await run(["chunk", "-c", "4", "a. b."]);
    expect(env.output()).toBe("--- chunk 0 [0, 3) 3 chars ---\na. \n--- chunk 1 [3, 5) 2 chars ---\nb.\n");
  });

  it("prints JSON", async () => {
    const env = await run(["chunk", "-c", "4", "--json", "a. b."]);
    const parsed: unknown = JSON.parse(env.output());
    expect(parsed).toEqual([
      { index: 0, text: "a. ", start: 0, end: 3, length: 3 },
      { index: 1, text: "b.", start: 3, end: 5, length: 2 },
    ]);
  });

  it("takes the chunk size from [complete]", async () => {
    const env = await run(["chunk", "a. b."], {}, testConfig("[complete]\nchunk-size = 4\n"));
    expect(env.output()).toBe("--- chunk 0 [0, 3) 3 chars ---\na. \n--- chunk 1 [3, 5) 2 chars ---\nb.\n");
  });

  it("requires a chunk size", async () => {
    const env = await run(["chunk", "a. b."]);
    expect(env.errors()).toBe(
      "Error: A chunk size is required. Pass --chunk-size or set chunk-size in [complete].\n",
    );
    expect(env.exitCode).toBe(1);
  });
});

describe("templates", () => {
  it("lists templates from every source", async () => {
    mkdirSync(join(dir, "templates"));
    writeFileSync(join(dir, "templates", "memo.eta"), "Memo about <%= it.topic %>: <%= it.prompt %>");
    const env = await run(["templates"], {}, testConfig('[prompts]\nshout = "<%= it.prompt %>!"\n'));

    expect(env.output()).toBe(
      [
        "assist     builtin  tone?",
        "context    builtin",
        "memo       user     topic",
        "shout      config",
        "summarize  builtin  style?",
        "translate  builtin  language",
        "",
      ].join("\n"),
    );
  });

  it("prints one template", async () => {
    const env = await run(["templates", "translate"]);
    expect(env.output()).toBe(
      '<%~ include("@context", it) %>Translate the following text into <%= it.language %>. Keep the formatting.\n\n<%= it.prompt %>\n',
    );
    expect(env.errors()).toBe("translate (builtin): language\n");
  });

  it("reports unknown templates", async () => {
    const env = await run(["templates", "nope"]);
    expect(env.errors()).toBe("Error: Template 'nope' not found\n");
    expect(env.exitCode).toBe(1);
  });
});

describe("init", () => {
  it("writes a starter config and the templates directory", async () => {
    const path = join(dir, "cli.toml");
    const env = await run(["init"], { env: { PROMPTLOOM_CONFIG: path } });

    expect(env.output()).toBe(`Created ${path}\nTemplates directory ${join(dir, "templates")}\n`);
    expect(existsSync(join(dir, "templates"))).toBe(true);
    expect(loadConfig(path)).toEqual({
      global: { "templates-dir": join(dir, "templates") },
      complete: {},
      prompts: {},
      commands: {},
    });
  });

  it("refuses to overwrite without --force", async () => {
    const path = join(dir, "cli.toml");
    writeFileSync(path, "# mine\n");

    const env = await run(["init"], { env: { PROMPTLOOM_CONFIG: path } });
    expect(env.errors()).toBe(`Error: Config file already exists at ${path}. Use --force to overwrite it.\n`);
    expect(env.exitCode).toBe(1);
    expect(readFileSync(path, "utf-8")).toBe("# mine\n");

    const forced = await run(["init", "--force"], { env: { PROMPTLOOM_CONFIG: path } });
    expect(forced.exitCode).toBeUndefined();
    expect(readFileSync(path, "utf-8")).toContain("[complete]");
  });
});

describe("config", () => {
  const toml = '[global]\napi-key = "test-secret"\nlog-level = "info"\n\n[loud]\ndescription = "Shout it"\nmodel = "test"\n';

  it("lists profiles", async () => {
    const path = join(dir, "cli.toml");
    const env = await run(["config"], { env: { PROMPTLOOM_CONFIG: path } }, testConfig(toml));

    expect(env.output()).toBe(
      "global    Logging and API settings\ncomplete  Defaults of the complete command\nloud      Shout it\n",
    );
    expect(env.errors()).toBe(`Config file: ${path}\n`);
  });

  it("prints a profile with the API key redacted", async () => {
    const env = await run(["config", "global"], {}, testConfig(toml));
    const parsed: unknown = JSON.parse(env.output());
    expect(parsed).toEqual({
      "templates-dir": join(dir, "templates"),
      "api-key": "********",
      "log-level": "info",
    });
  });

  it("prints a custom command", async () => {
    const env = await run(["config", "loud"], {}, testConfig(toml));
    const parsed: unknown = JSON.parse(env.output());
    expect(parsed).toEqual({ description: "Shout it", model: "test" });
  });

  it("rejects unknown profiles", async () => {
    const env = await run(["config", "nope"], {}, testConfig(toml));
    expect(env.errors()).toBe("Error: Unknown profile 'nope'. Known profiles: global, complete, loud\n");
    expect(env.exitCode).toBe(1);
  });
});
