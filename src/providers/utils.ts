/**
 * Common utility functions shared across client implementations
 */

/**
 * Safely read an environment variable
 * @param key - The environment variable key to read
 * @param env - Environment to read from (defaults to process.env)
 * @returns The value if found, undefined otherwise
 */
export function readEnvVar(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Check if a value is a non-empty string
 */
export function isNonEmpty(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Removes a single leading newline from a completion.
 */
export function stripLeadingNewline(text: string): string {
  return text.startsWith("\n") ? text.slice(1) : text;
}
