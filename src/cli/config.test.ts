import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  ConfigError,
  emptyConfig,
  getConfigPath,
  getCustomCommandNames,
  loadConfig,
  parseConfig,
  resolveInheritance,
  validateConfig,
} from "./config.js";

describe("getConfigPath", () => {
  it("defaults to cli.toml under ~/.promptloom", () => {
    expect(getConfigPath({})).toBe(join(homedir(), ".promptloom", "cli.toml"));
  });

  it("honours PROMPTLOOM_CONFIG and expands ~", () => {
    expect(getConfigPath({ PROMPTLOOM_CONFIG: "/etc/loom.toml" })).toBe("/etc/loom.toml");
    expect(getConfigPath({ PROMPTLOOM_CONFIG: "~/loom.toml" })).toBe(join(homedir(), "loom.toml"));
  });

  it("ignores a blank override", () => {
    expect(getConfigPath({ PROMPTLOOM_CONFIG: "  " })).toBe(join(homedir(), ".promptloom", "cli.toml"));
  });
});

describe("validateConfig", () => {
  it("splits reserved sections from custom commands", () => {
    const config = validateConfig({
      global: { "log-level": "debug", "api-base": "http://localhost:8080/v1" },
      complete: { model: "gpt-4o", temperature: 0.2 },
      prompts: { haiku: "Haiku: <%= it.prompt %>" },
      brief: { template: "summarize", "chunk-size": 2000, description: "Short summaries" },
    });

    expect(config).toEqual({
      global: { "log-level": "debug", "api-base": "http://localhost:8080/v1" },
      complete: { model: "gpt-4o", temperature: 0.2 },
      prompts: { haiku: "Haiku: <%= it.prompt %>" },
      commands: { brief: { template: "summarize", "chunk-size": 2000, description: "Short summaries" } },
    });
  });

  it("accepts a single string where a list is expected", () => {
    const config = validateConfig({ complete: { stop: "###", arg: ["a=1", "b=2"] } });
    expect(config.complete.stop).toEqual(["###"]);
    expect(config.complete.arg).toEqual(["a=1", "b=2"]);
  });

  it("reads prefixes and append for the complete path", () => {
    const config = parseConfig('[complete]\nin-prefix = "Human: "\nout-prefix = "\\nAI:"\nappend = true\n');

    expect(config.complete).toEqual({ "in-prefix": "Human: ", "out-prefix": "\nAI:", append: true });
  });

  it("rejects a prefix that is not a string", () => {
    expect(() => validateConfig({ complete: { "out-prefix": 3 } })).toThrow("[complete].out-prefix must be a string");
  });

  it("expands ~ in paths", () => {
    const config = validateConfig({ global: { "templates-dir": "~/prompts" } });
    expect(config.global["templates-dir"]).toBe(join(homedir(), "prompts"));
  });

  it("rejects unknown keys", () => {
    expect(() => validateConfig({ complete: { colour: true } })).toThrow("[complete].colour is not a valid option");
  });

  it("rejects a description in [complete]", () => {
    expect(() => validateConfig({ complete: { description: "x" } })).toThrow(
      "[complete].description is not a valid option",
    );
  });

  it("checks types and ranges", () => {
    expect(() => validateConfig({ complete: { temperature: "hot" } })).toThrow(
      "[complete].temperature must be a number",
    );
    expect(() => validateConfig({ complete: { temperature: 3 } })).toThrow("[complete].temperature must be <= 2");
    expect(() => validateConfig({ complete: { "chunk-size": 1.5 } })).toThrow(
      "[complete].chunk-size must be an integer",
    );
    expect(() => validateConfig({ complete: { echo: "yes" } })).toThrow("[complete].echo must be a boolean");
    expect(() => validateConfig({ complete: { stop: [1] } })).toThrow("[complete].stop[0] must be a string");
  });

  it("validates the log level and output format", () => {
    expect(() => validateConfig({ global: { "log-level": "loud" } })).toThrow(
      "[global].log-level must be one of: silly, trace, debug, info, warn, error, fatal",
    );
    expect(() => validateConfig({ complete: { format: "yaml" } })).toThrow(
      "[complete].format must be one of: clean, json, logprobs",
    );
  });

  it("rejects custom sections named after built-in commands", () => {
    expect(() => validateConfig({ chunk: { model: "gpt-4o" } })).toThrow(
      "[chunk] conflicts with the built-in chunk command",
    );
  });

  it("rejects invalid command names", () => {
    expect(() => validateConfig({ Brief: {} })).toThrow("[Brief] is not a valid command name");
  });

  it("rejects invalid template names in [prompts]", () => {
    expect(() => validateConfig({ prompts: { "has space": "x" } })).toThrow(
      "[prompts].has space is not a valid template name",
    );
  });

  it("prefixes errors with the config path", () => {
    expect(() => validateConfig({ global: { "log-reset": 1 } }, "/tmp/cli.toml")).toThrow(
      "/tmp/cli.toml: [global].log-reset must be a boolean",
    );
  });

  it("throws ConfigError instances", () => {
    expect(() => validateConfig({ global: [] })).toThrow(ConfigError);
  });
});

describe("resolveInheritance", () => {
  it("merges parents left to right with own values last", () => {
    const config = resolveInheritance({
      ...emptyConfig(),
      complete: { model: "gpt-4o-mini", temperature: 0.5 },
      commands: {
        base: { temperature: 0.1, "max-tokens": 100, description: "Base" },
        brief: { inherits: ["complete", "base"], "max-tokens": 50 },
      },
    });

    expect(config.commands.brief).toEqual({ model: "gpt-4o-mini", temperature: 0.1, "max-tokens": 50 });
    expect(config.commands.base).toEqual({ temperature: 0.1, "max-tokens": 100, description: "Base" });
  });

  it("replaces arrays instead of merging them", () => {
    const config = resolveInheritance({
      ...emptyConfig(),
      commands: { a: { stop: ["x"] }, b: { inherits: ["a"], stop: ["y"] } },
    });
    expect(config.commands.b?.stop).toEqual(["y"]);
  });

  it("detects cycles", () => {
    expect(() =>
      resolveInheritance({
        ...emptyConfig(),
        commands: { a: { inherits: ["b"] }, b: { inherits: ["a"] } },
      }),
    ).toThrow("Circular inheritance detected: a -> b -> a");
  });

  it("rejects unknown parents", () => {
    expect(() =>
      resolveInheritance({ ...emptyConfig(), commands: { a: { inherits: ["missing"] } } }),
    ).toThrow("Cannot inherit from unknown section: missing");
  });
});

describe("parseConfig", () => {
  it("parses TOML and resolves inheritance", () => {
    const config = parseConfig(
      [
        "[complete]",
        'model = "gpt-4o"',
        "",
        "[translate]",
        'inherits = "complete"',
        'template = "translate"',
        'arg = ["language=French"]',
      ].join("\n"),
    );

    expect(config.commands.translate).toEqual({
      model: "gpt-4o",
      template: "translate",
      arg: ["language=French"],
    });
    expect(getCustomCommandNames(config)).toEqual(["translate"]);
  });

  it("reports TOML syntax errors", () => {
    expect(() => parseConfig("[complete\nmodel = 1", "/tmp/bad.toml")).toThrow(
      /^\/tmp\/bad\.toml: Invalid TOML syntax: /,
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "promptloom-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns an empty config when the file is missing", () => {
    expect(loadConfig(join(dir, "missing.toml"))).toEqual(emptyConfig());
  });

  it("reads the file", () => {
    const path = join(dir, "cli.toml");
    writeFileSync(path, '[global]\nlog-level = "info"\n');
    expect(loadConfig(path).global).toEqual({ "log-level": "info" });
  });
});
