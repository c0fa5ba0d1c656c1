import { Eta } from "eta";
import type { ILogObj, Logger } from "tslog";
import { MissingTemplateKeyError, TemplateNotFoundError, TemplateSyntaxError } from "./errors.js";
import type { TemplateLookup } from "./template-store.js";

/**
 * Keys the renderer fills in itself. User overrides for these are ignored.
 */
export const RESERVED_KEYS = ["prompt", "index", "count", "previous", "env", "date"] as const;

export type ReservedKey = (typeof RESERVED_KEYS)[number];

export function isReservedKey(key: string): key is ReservedKey {
  return RESERVED_KEYS.some((reserved) => reserved === key);
}

/**
 * Per-chunk values for the reserved keys.
 */
export interface TemplateContext {
  index: number;
  count: number;
  /** First choice returned for the previous chunk ("" for the first chunk) */
  previous: string;
}

export type TemplateOverrides = Readonly<Record<string, string>>;

const TAG_PATTERN = /<%([\s\S]*?)%>/g;
// it.key or it["key"], an optional second segment, then an optional default operator
const REFERENCE_PATTERN =
  /\bit(?:\.([A-Za-z_$][\w$]*)|\[\s*["']([^"'\]]+)["']\s*\])(?:\.([A-Za-z_$][\w$]*)|\[\s*["']([^"'\]]+)["']\s*\])?(\s*(?:\?\?|\|\|))?/g;
const INCLUDE_PATTERN = /\binclude\(\s*["']@([^"']+)["']/g;
const FALLBACK_OPERATOR = /\?\?|\|\|/;

/**
 * How a placeholder is used across every reference to it.
 */
interface KeyUsage {
  /** Some reference is neither followed by a default nor part of one */
  required: boolean;
  /** Some reference is followed by `??` or `||` */
  defaulted: boolean;
}

/**
 * Placeholders a template references, with the partials it includes.
 */
interface TemplateReferences {
  keys: Map<string, KeyUsage>;
  envVars: Map<string, KeyUsage>;
  includes: Set<string>;
}

function mark(target: Map<string, KeyUsage>, key: string, usage: KeyUsage): void {
  const current = target.get(key);
  target.set(key, {
    required: (current?.required ?? false) || usage.required,
    defaulted: (current?.defaulted ?? false) || usage.defaulted,
  });
}

/**
 * True when the code before `offset`, within the same statement, already
 * contains a default operator, as for `it.style` in `it.tone ?? it.style`.
 */
function isInsideDefault(code: string, offset: number): boolean {
  const before = code.slice(0, offset);
  const statementStart = Math.max(before.lastIndexOf(";"), before.lastIndexOf("{"), before.lastIndexOf("}")) + 1;
  return FALLBACK_OPERATOR.test(before.slice(statementStart));
}

/**
 * Scans the code inside template tags for `it.<key>` and `it["key"]`
 * references and `include("@name")` partials.
 */
export function scanTemplate(source: string): TemplateReferences {
  const references: TemplateReferences = { keys: new Map(), envVars: new Map(), includes: new Set() };

  for (const tag of source.matchAll(TAG_PATTERN)) {
    const code = tag[1] ?? "";

    for (const match of code.matchAll(REFERENCE_PATTERN)) {
      const key = match[1] ?? match[2] ?? "";
      const property = match[3] ?? match[4];
      const defaulted = match[5] !== undefined;
      const usage = { required: !defaulted && !isInsideDefault(code, match.index ?? 0), defaulted };

      if (key === "env" && property) {
        mark(references.envVars, property, usage);
      } else {
        mark(references.keys, key, usage);
      }
    }

    for (const match of code.matchAll(INCLUDE_PATTERN)) {
      references.includes.add(match[1] ?? "");
    }
  }

  return references;
}

/**
 * Wraps `target` so that reading an unset key not covered by a default adds
 * `prefix + key` to `missing`.
 */
function trackMissing<T extends object>(
  target: T,
  usage: Map<string, KeyUsage>,
  missing: Set<string>,
  prefix = "",
): T {
  return new Proxy(target, {
    get(object, property, receiver) {
      const value: unknown = Reflect.get(object, property, receiver);
      if (typeof property === "string" && value === undefined && !usage.get(property)?.defaulted) {
        missing.add(`${prefix}${property}`);
      }
      return value;
    },
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A resolved, compiled template ready to render chunks.
 */
export class PreparedTemplate {
  private readonly warnedKeys = new Set<string>();

  constructor(
    readonly name: string,
    private readonly eta: Eta,
    private readonly references: TemplateReferences,
    private readonly env: NodeJS.ProcessEnv,
    private readonly now: () => Date,
    private readonly logger?: Logger<ILogObj>,
  ) {}

  /**
   * Placeholders with neither a supplied value nor a declared default.
   * Unset environment variables are reported as `env.NAME`.
   */
  missingKeys(overrides: TemplateOverrides = {}): string[] {
    const missing: string[] = [];

    for (const [key, usage] of this.references.keys) {
      if (!usage.required || isReservedKey(key)) continue;
      if (overrides[key] === undefined) {
        missing.push(key);
      }
    }

    for (const [name, usage] of this.references.envVars) {
      if (usage.required && this.env[name] === undefined) {
        missing.push(`env.${name}`);
      }
    }

    return missing;
  }

  /**
   * Renders the template for one chunk.
   *
   * Keys the scan cannot see, such as `it[name]`, are caught while rendering:
   * reading an unset key that has no default fails the render.
   *
   * @throws MissingTemplateKeyError listing every key without a value
   * @throws TemplateSyntaxError if the template fails while rendering
   */
  render(chunkText: string, overrides: TemplateOverrides, context: TemplateContext): string {
    const missing = this.missingKeys(overrides);
    if (missing.length > 0) {
      throw new MissingTemplateKeyError(this.name, missing);
    }

    const data: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(overrides)) {
      if (isReservedKey(key)) {
        if (!this.warnedKeys.has(key)) {
          this.warnedKeys.add(key);
          this.logger?.warn(`Ignoring value for reserved template key '${key}'`);
        }
        continue;
      }
      data[key] = value;
    }

    const unset = new Set<string>();

    Object.assign(data, {
      prompt: chunkText,
      index: context.index,
      count: context.count,
      previous: context.previous,
      env: trackMissing(this.env, this.references.envVars, unset, "env."),
      date: this.now().toISOString().split("T")[0], // "2025-12-01"
    });

    let output: string;
    try {
      output = this.eta.render(`@${this.name}`, trackMissing(data, this.references.keys, unset));
    } catch (error) {
      if (unset.size > 0) {
        throw new MissingTemplateKeyError(this.name, [...unset]);
      }
      throw new TemplateSyntaxError(errorMessage(error), this.name);
    }

    if (unset.size > 0) {
      throw new MissingTemplateKeyError(this.name, [...unset]);
    }
    return output;
  }
}

export interface TemplateRendererOptions {
  logger?: Logger<ILogObj>;
  /** Environment exposed as `it.env` (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Clock for `it.date` */
  now?: () => Date;
}

/**
 * Resolves templates through a {@link TemplateLookup} and compiles them with
 * Eta. Partials referenced with `include("@name")` are resolved the same way.
 */
export class TemplateRenderer {
  constructor(
    private readonly lookup: TemplateLookup,
    private readonly options: TemplateRendererOptions = {},
  ) {}

  /**
   * @throws TemplateNotFoundError if the template or one of its partials is unknown
   * @throws TemplateSyntaxError if any of them fails to compile
   */
  prepare(name: string): PreparedTemplate {
    const eta = new Eta({
      views: "/", // Required but we use named templates
      autoEscape: false, // Don't escape - these are prompts, not HTML
      autoTrim: false, // Preserve whitespace in prompts
    });

    const references: TemplateReferences = { keys: new Map(), envVars: new Map(), includes: new Set() };
    const pending = [name];
    const loaded = new Set<string>();

    while (pending.length > 0) {
      const current = pending.pop() ?? "";
      if (loaded.has(current)) continue;
      loaded.add(current);

      const template = this.lookup.get(current);
      if (!template) {
        throw new TemplateNotFoundError(current);
      }

      try {
        // loadTemplate compiles eagerly and throws on syntax errors
        eta.loadTemplate(`@${current}`, template.source);
      } catch (error) {
        throw new TemplateSyntaxError(errorMessage(error), current);
      }

      const scanned = scanTemplate(template.source);
      for (const [key, usage] of scanned.keys) mark(references.keys, key, usage);
      for (const [envVar, usage] of scanned.envVars) mark(references.envVars, envVar, usage);
      for (const include of scanned.includes) {
        references.includes.add(include);
        pending.push(include);
      }
    }

    this.options.logger?.debug("Prepared template", { name, partials: [...references.includes] });

    return new PreparedTemplate(
      name,
      eta,
      references,
      this.options.env ?? process.env,
      this.options.now ?? (() => new Date()),
      this.options.logger,
    );
  }

  /**
   * Names of every template the lookup knows.
   */
  list(): string[] {
    return this.lookup.list().map((template) => template.name);
  }
}
