import { existsSync, readdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Template file extension used by directory stores.
 */
export const TEMPLATE_EXTENSION = ".eta";

/**
 * Templates shipped with the package (`templates/` at the package root).
 */
export const BUILTIN_TEMPLATES_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

/**
 * Default location of user templates.
 */
export function getUserTemplatesDir(): string {
  return join(homedir(), ".promptloom", "templates");
}

/**
 * A named template and where it came from.
 */
export interface TemplateSource {
  name: string;
  source: string;
  /** Human-readable origin, e.g. "config", "user" or "builtin" */
  origin: string;
}

/**
 * Read-only name → template lookup.
 */
export interface TemplateLookup {
  get(name: string): TemplateSource | undefined;
  list(): TemplateSource[];
}

// Names map to file names, so anything that could escape the directory is rejected.
const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_][\w.-]*$/;

export function isValidTemplateName(name: string): boolean {
  return TEMPLATE_NAME_PATTERN.test(name);
}

/**
 * Templates defined inline in the `[prompts]` section of the config file.
 */
export class ConfigTemplateStore implements TemplateLookup {
  constructor(
    private readonly prompts: Readonly<Record<string, string>>,
    private readonly origin = "config",
  ) {}

  get(name: string): TemplateSource | undefined {
    if (!Object.hasOwn(this.prompts, name)) {
      return undefined;
    }
    return { name, source: this.prompts[name] ?? "", origin: this.origin };
  }

  list(): TemplateSource[] {
    return Object.keys(this.prompts)
      .sort()
      .map((name) => ({ name, source: this.prompts[name] ?? "", origin: this.origin }));
  }
}

/**
 * Templates stored as `<dir>/<name>.eta` files. A missing directory is an
 * empty store.
 */
export class DirectoryTemplateStore implements TemplateLookup {
  constructor(
    readonly directory: string,
    private readonly origin: string,
  ) {}

  get(name: string): TemplateSource | undefined {
    if (!isValidTemplateName(name)) {
      return undefined;
    }
    const path = join(this.directory, `${name}${TEMPLATE_EXTENSION}`);
    if (!existsSync(path)) {
      return undefined;
    }
    return { name, source: readFileSync(path, "utf-8"), origin: this.origin };
  }

  list(): TemplateSource[] {
    if (!existsSync(this.directory)) {
      return [];
    }
    return readdirSync(this.directory)
      .filter((file) => file.endsWith(TEMPLATE_EXTENSION))
      .map((file) => file.slice(0, -TEMPLATE_EXTENSION.length))
      .filter(isValidTemplateName)
      .sort()
      .flatMap((name) => {
        const template = this.get(name);
        return template ? [template] : [];
      });
  }
}

/**
 * Chains lookups; the first store that knows a name wins.
 */
export class CompositeTemplateStore implements TemplateLookup {
  constructor(private readonly stores: readonly TemplateLookup[]) {}

  get(name: string): TemplateSource | undefined {
    for (const store of this.stores) {
      const template = store.get(name);
      if (template) {
        return template;
      }
    }
    return undefined;
  }

  list(): TemplateSource[] {
    const seen = new Map<string, TemplateSource>();
    for (const store of this.stores) {
      for (const template of store.list()) {
        if (!seen.has(template.name)) {
          seen.set(template.name, template);
        }
      }
    }
    return [...seen.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}

export interface DefaultTemplateStoreOptions {
  /** Inline templates from the config file */
  prompts?: Readonly<Record<string, string>>;
  /** User templates directory (defaults to ~/.promptloom/templates) */
  userDir?: string;
  /** Built-in templates directory */
  builtinDir?: string;
}

/**
 * Config templates, then the user directory, then the built-ins.
 */
export function createTemplateStore(options: DefaultTemplateStoreOptions = {}): CompositeTemplateStore {
  return new CompositeTemplateStore([
    new ConfigTemplateStore(options.prompts ?? {}),
    new DirectoryTemplateStore(options.userDir ?? getUserTemplatesDir(), "user"),
    new DirectoryTemplateStore(options.builtinDir ?? BUILTIN_TEMPLATES_DIR, "builtin"),
  ]);
}
