import chalk from "chalk";
import type { Command } from "commander";
import { TemplateNotFoundError } from "../core/errors.js";
import { createTemplateStore, type TemplateLookup, type TemplateSource } from "../core/template-store.js";
import { isReservedKey, scanTemplate } from "../core/templates.js";
import type { CLIConfig } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./utils.js";

/**
 * Placeholders a template expects from `--arg`, with `?` marking those that
 * declare a default.
 */
export function describePlaceholders(source: string): string[] {
  const { keys } = scanTemplate(source);
  return [...keys]
    .filter(([key]) => !isReservedKey(key))
    .map(([key, usage]) => (usage.required ? key : `${key}?`))
    .sort();
}

/**
 * One row per template: name, origin and placeholders, in aligned columns.
 */
export function formatTemplateList(templates: readonly TemplateSource[]): string {
  const nameWidth = Math.max(4, ...templates.map((template) => template.name.length));
  const originWidth = Math.max(6, ...templates.map((template) => template.origin.length));

  return templates
    .map((template) => {
      const placeholders = describePlaceholders(template.source).join(", ");
      return `${template.name.padEnd(nameWidth)}  ${template.origin.padEnd(originWidth)}  ${placeholders}`.trimEnd();
    })
    .join("\n");
}

async function handleTemplatesCommand(
  name: string | undefined,
  lookup: TemplateLookup,
  env: CLIEnvironment,
): Promise<void> {
  if (!name) {
    const templates = lookup.list();
    if (templates.length === 0) {
      env.stderr.write(chalk.dim("No templates found.\n"));
      return;
    }
    env.stdout.write(`${formatTemplateList(templates)}\n`);
    return;
  }

  const template = lookup.get(name);
  if (!template) {
    throw new TemplateNotFoundError(name);
  }

  const placeholders = describePlaceholders(template.source);
  env.stderr.write(
    chalk.dim(`${template.name} (${template.origin})${placeholders.length > 0 ? `: ${placeholders.join(", ")}` : ""}\n`),
  );
  env.stdout.write(template.source.endsWith("\n") ? template.source : `${template.source}\n`);
}

/**
 * Registers the templates command: lists templates, or prints one.
 *
 * @param program - Commander program to register the command with
 * @param env - CLI environment for dependencies and I/O
 * @param config - Loaded configuration (`[prompts]` and templates-dir)
 */
export function registerTemplatesCommand(program: Command, env: CLIEnvironment, config: CLIConfig): void {
  program
    .command(COMMANDS.templates)
    .description("List available templates, or print the source of one.")
    .argument("[name]", "Template to print.")
    .action((name: string | undefined) =>
      executeAction(
        () =>
          handleTemplatesCommand(
            name,
            createTemplateStore({ prompts: config.prompts, userDir: config.global["templates-dir"] }),
            env,
          ),
        env,
      ),
    );
}
