import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { LoomError } from "../core/errors.js";
import { isValidTemplateName } from "../core/template-store.js";
import { isLogLevelName, LOG_LEVEL_NAMES, type LogLevelName } from "../logging/logger.js";
import { COMMANDS, OUTPUT_FORMATS, type OutputFormat } from "./constants.js";

/** Environment variable that overrides the config file location */
export const CONFIG_PATH_ENV_VAR = "PROMPTLOOM_CONFIG";

/**
 * Global CLI options that apply to all commands.
 */
export interface GlobalConfig {
  "log-level"?: LogLevelName;
  "log-file"?: string;
  "log-reset"?: boolean;
  "api-key"?: string;
  "api-base"?: string;
  "templates-dir"?: string;
}

/**
 * Defaults for the complete command, keyed like its long options.
 */
export interface CompleteConfig {
  inherits?: string[];
  model?: string;
  template?: string;
  /** Template values as `key=value` */
  arg?: string[];
  "chunk-size"?: number;
  "force-chunk"?: boolean;
  "hard-cut"?: boolean;
  "in-prefix"?: string;
  "out-prefix"?: string;
  temperature?: number;
  "max-tokens"?: number;
  count?: number;
  stop?: string[];
  "presence-penalty"?: number;
  "frequency-penalty"?: number;
  "top-p"?: number;
  logprobs?: number;
  "logit-bias"?: string[];
  format?: OutputFormat;
  echo?: boolean;
  encode?: string;
  retries?: number;
  timeout?: number;
  partial?: boolean;
  append?: boolean;
}

/**
 * A config section that becomes its own command.
 */
export interface CustomCommandConfig extends CompleteConfig {
  description?: string;
}

/** Named templates from the `[prompts]` section */
export type PromptsConfig = Record<string, string>;

/**
 * Configuration loaded from ~/.promptloom/cli.toml.
 */
export interface CLIConfig {
  global: GlobalConfig;
  complete: CompleteConfig;
  prompts: PromptsConfig;
  /** Every other section, by command name */
  commands: Record<string, CustomCommandConfig>;
}

/** Sections with a fixed meaning; everything else is a custom command */
const RESERVED_SECTIONS = new Set(["global", "complete", "prompts"]);

/** Built-in commands a custom section may not shadow */
const BUILTIN_COMMAND_NAMES = new Set<string>(Object.values(COMMANDS));

const GLOBAL_CONFIG_KEYS = new Set(["log-level", "log-file", "log-reset", "api-key", "api-base", "templates-dir"]);

const COMPLETE_CONFIG_KEYS = new Set([
  "inherits",
  "model",
  "template",
  "arg",
  "chunk-size",
  "force-chunk",
  "hard-cut",
  "in-prefix",
  "out-prefix",
  "temperature",
  "max-tokens",
  "count",
  "stop",
  "presence-penalty",
  "frequency-penalty",
  "top-p",
  "logprobs",
  "logit-bias",
  "format",
  "echo",
  "encode",
  "retries",
  "timeout",
  "partial",
  "append",
]);

const CUSTOM_CONFIG_KEYS = new Set([...COMPLETE_CONFIG_KEYS, "description"]);

const COMMAND_NAME_PATTERN = /^[a-z][a-z0-9-]*$/;

export function emptyConfig(): CLIConfig {
  return { global: {}, complete: {}, prompts: {}, commands: {} };
}

/**
 * Returns the config file path: $PROMPTLOOM_CONFIG or ~/.promptloom/cli.toml
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV_VAR]?.trim();
  return override ? expandHome(override) : join(homedir(), ".promptloom", "cli.toml");
}

/**
 * Expands a leading `~/` to the home directory.
 */
export function expandHome(path: string): string {
  return path === "~" || path.startsWith("~/") ? join(homedir(), path.slice(1)) : path;
}

/**
 * Configuration validation error.
 */
export class ConfigError extends LoomError {
  readonly kind = "InvalidConfiguration" as const;

  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

function validateNumber(
  value: unknown,
  key: string,
  section: string,
  opts?: { min?: number; max?: number; integer?: boolean },
): number {
  if (typeof value !== "number") {
    throw new ConfigError(`[${section}].${key} must be a number`);
  }
  if (opts?.integer && !Number.isInteger(value)) {
    throw new ConfigError(`[${section}].${key} must be an integer`);
  }
  if (opts?.min !== undefined && value < opts.min) {
    throw new ConfigError(`[${section}].${key} must be >= ${opts.min}`);
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new ConfigError(`[${section}].${key} must be <= ${opts.max}`);
  }
  return value;
}

function validateBoolean(value: unknown, key: string, section: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`[${section}].${key} must be a boolean`);
  }
  return value;
}

/**
 * Accepts a string or an array of strings; a single string becomes a
 * one-element array.
 */
function validateStringList(value: unknown, key: string, section: string): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`[${section}].${key} must be a string or an array of strings`);
  }
  return value.map((item, index) => {
    if (typeof item !== "string") {
      throw new ConfigError(`[${section}].${key}[${index}] must be a string`);
    }
    return item;
  });
}

function validateLogLevel(value: unknown, section: string): LogLevelName {
  const level = validateString(value, "log-level", section);
  if (!isLogLevelName(level)) {
    throw new ConfigError(`[${section}].log-level must be one of: ${LOG_LEVEL_NAMES.join(", ")}`);
  }
  return level;
}

function validateFormat(value: unknown, section: string): OutputFormat {
  const format = validateString(value, "format", section);
  const match = OUTPUT_FORMATS.find((candidate) => candidate === format);
  if (!match) {
    throw new ConfigError(`[${section}].format must be one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return match;
}

function checkKeys(raw: Record<string, unknown>, allowed: ReadonlySet<string>, section: string): void {
  for (const key of Object.keys(raw)) {
    if (!allowed.has(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid option`);
    }
  }
}

function validateGlobalConfig(raw: unknown, section: string): GlobalConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  checkKeys(raw, GLOBAL_CONFIG_KEYS, section);

  const result: GlobalConfig = {};
  if ("log-level" in raw) result["log-level"] = validateLogLevel(raw["log-level"], section);
  if ("log-file" in raw) result["log-file"] = expandHome(validateString(raw["log-file"], "log-file", section));
  if ("log-reset" in raw) result["log-reset"] = validateBoolean(raw["log-reset"], "log-reset", section);
  if ("api-key" in raw) result["api-key"] = validateString(raw["api-key"], "api-key", section);
  if ("api-base" in raw) result["api-base"] = validateString(raw["api-base"], "api-base", section);
  if ("templates-dir" in raw) {
    result["templates-dir"] = expandHome(validateString(raw["templates-dir"], "templates-dir", section));
  }
  return result;
}

/**
 * Reads the complete-command keys shared by `[complete]` and custom sections.
 */
function validateCompleteFields(raw: Record<string, unknown>, section: string): CompleteConfig {
  const result: CompleteConfig = {};

  if ("inherits" in raw) result.inherits = validateStringList(raw.inherits, "inherits", section);
  if ("model" in raw) result.model = validateString(raw.model, "model", section);
  if ("template" in raw) result.template = validateString(raw.template, "template", section);
  if ("arg" in raw) result.arg = validateStringList(raw.arg, "arg", section);
  if ("chunk-size" in raw) {
    result["chunk-size"] = validateNumber(raw["chunk-size"], "chunk-size", section, { integer: true, min: 1 });
  }
  if ("force-chunk" in raw) result["force-chunk"] = validateBoolean(raw["force-chunk"], "force-chunk", section);
  if ("hard-cut" in raw) result["hard-cut"] = validateBoolean(raw["hard-cut"], "hard-cut", section);
  if ("in-prefix" in raw) result["in-prefix"] = validateString(raw["in-prefix"], "in-prefix", section);
  if ("out-prefix" in raw) result["out-prefix"] = validateString(raw["out-prefix"], "out-prefix", section);
  if ("temperature" in raw) {
    result.temperature = validateNumber(raw.temperature, "temperature", section, { min: 0, max: 2 });
  }
  if ("max-tokens" in raw) {
    result["max-tokens"] = validateNumber(raw["max-tokens"], "max-tokens", section, { integer: true, min: 1 });
  }
  if ("count" in raw) result.count = validateNumber(raw.count, "count", section, { integer: true, min: 1 });
  if ("stop" in raw) result.stop = validateStringList(raw.stop, "stop", section);
  if ("presence-penalty" in raw) {
    result["presence-penalty"] = validateNumber(raw["presence-penalty"], "presence-penalty", section, {
      min: -2,
      max: 2,
    });
  }
  if ("frequency-penalty" in raw) {
    result["frequency-penalty"] = validateNumber(raw["frequency-penalty"], "frequency-penalty", section, {
      min: -2,
      max: 2,
    });
  }
  if ("top-p" in raw) result["top-p"] = validateNumber(raw["top-p"], "top-p", section, { min: 0, max: 1 });
  if ("logprobs" in raw) {
    result.logprobs = validateNumber(raw.logprobs, "logprobs", section, { integer: true, min: 0, max: 20 });
  }
  if ("logit-bias" in raw) result["logit-bias"] = validateStringList(raw["logit-bias"], "logit-bias", section);
  if ("format" in raw) result.format = validateFormat(raw.format, section);
  if ("echo" in raw) result.echo = validateBoolean(raw.echo, "echo", section);
  if ("encode" in raw) result.encode = validateString(raw.encode, "encode", section);
  if ("retries" in raw) {
    result.retries = validateNumber(raw.retries, "retries", section, { integer: true, min: 0 });
  }
  if ("timeout" in raw) {
    result.timeout = validateNumber(raw.timeout, "timeout", section, { integer: true, min: 1 });
  }
  if ("partial" in raw) result.partial = validateBoolean(raw.partial, "partial", section);
  if ("append" in raw) result.append = validateBoolean(raw.append, "append", section);

  return result;
}

function validateCompleteConfig(raw: unknown, section: string): CompleteConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  checkKeys(raw, COMPLETE_CONFIG_KEYS, section);
  return validateCompleteFields(raw, section);
}

function validateCustomConfig(raw: unknown, section: string): CustomCommandConfig {
  if (!COMMAND_NAME_PATTERN.test(section)) {
    throw new ConfigError(`[${section}] is not a valid command name (use lowercase letters, digits and dashes)`);
  }
  if (BUILTIN_COMMAND_NAMES.has(section)) {
    throw new ConfigError(`[${section}] conflicts with the built-in ${section} command`);
  }
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  checkKeys(raw, CUSTOM_CONFIG_KEYS, section);

  const result: CustomCommandConfig = validateCompleteFields(raw, section);
  if ("description" in raw) {
    result.description = validateString(raw.description, "description", section);
  }
  return result;
}

/**
 * Each key is a template name and each value its Eta source.
 */
function validatePromptsConfig(raw: unknown, section: string): PromptsConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }

  const result: PromptsConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isValidTemplateName(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid template name`);
    }
    result[key] = validateString(value, key, section);
  }
  return result;
}

/**
 * Validates and normalizes a parsed TOML document.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result = emptyConfig();

  for (const [key, value] of Object.entries(raw)) {
    try {
      if (key === "global") {
        result.global = validateGlobalConfig(value, key);
      } else if (key === "complete") {
        result.complete = validateCompleteConfig(value, key);
      } else if (key === "prompts") {
        result.prompts = validatePromptsConfig(value, key);
      } else {
        result.commands[key] = validateCustomConfig(value, key);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Resolves `inherits` chains for `[complete]` and every custom section.
 *
 * - Parents are merged left to right, so later parents override earlier ones
 * - A section's own values override everything it inherits
 * - Arrays are replaced, not merged
 * - `description` is never inherited
 *
 * @throws ConfigError on circular inheritance or an unknown parent section
 */
export function resolveInheritance(config: CLIConfig, configPath?: string): CLIConfig {
  const sections: Record<string, CustomCommandConfig> = { complete: config.complete, ...config.commands };
  const resolved = new Map<string, CustomCommandConfig>();
  const resolving = new Set<string>();

  function resolveSection(name: string): CustomCommandConfig {
    const cached = resolved.get(name);
    if (cached) {
      return cached;
    }
    if (resolving.has(name)) {
      throw new ConfigError(`Circular inheritance detected: ${[...resolving, name].join(" -> ")}`, configPath);
    }

    const section = Object.hasOwn(sections, name) ? sections[name] : undefined;
    if (!section) {
      throw new ConfigError(`Cannot inherit from unknown section: ${name}`, configPath);
    }

    resolving.add(name);

    let merged: CustomCommandConfig = {};
    for (const parent of section.inherits ?? []) {
      const { description: _description, ...inherited } = resolveSection(parent);
      merged = { ...merged, ...inherited };
    }

    const { inherits: _inherits, ...ownValues } = section;
    merged = { ...merged, ...ownValues };

    resolving.delete(name);
    resolved.set(name, merged);
    return merged;
  }

  const commands: Record<string, CustomCommandConfig> = {};
  for (const name of Object.keys(config.commands)) {
    commands[name] = resolveSection(name);
  }

  return { ...config, complete: resolveSection("complete"), commands };
}

/**
 * Parses and validates TOML config text.
 *
 * @throws ConfigError on invalid syntax, unknown keys or wrong types
 */
export function parseConfig(content: string, configPath?: string): CLIConfig {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return resolveInheritance(validateConfig(raw, configPath), configPath);
}

/**
 * Loads configuration from `configPath` (default: {@link getConfigPath}).
 * Returns an empty config if the file doesn't exist.
 *
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return emptyConfig();
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return parseConfig(content, configPath);
}

/**
 * Gets the custom command names from config, in file order.
 */
export function getCustomCommandNames(config: CLIConfig): string[] {
  return Object.keys(config.commands).filter((name) => !RESERVED_SECTIONS.has(name));
}
