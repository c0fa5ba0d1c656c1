/**
 * Testing utilities: a scripted completion client and an in-memory CLI
 * environment, for exercising pipelines and commands without network access.
 *
 * @module testing
 *
 * @example
 * ```typescript
 * import { createMockClient, createTestEnvironment } from "promptloom/testing";
 *
 * const client = createMockClient(["Bonjour"]);
 * const env = createTestEnvironment({ client, args: ["-m", "gpt-4o-mini", "Hello"] });
 * await runCLI({ env, config: emptyConfig() });
 * expect(env.output()).toBe("Bonjour\n");
 * ```
 */

export {
  CapturingWritable,
  createMockReadable,
  createTestEnvironment,
  type TestEnvironment,
  type TestEnvironmentOptions,
  waitFor,
} from "./cli-helpers.js";
export {
  createMockClient,
  type MockClientOptions,
  MockCompletionClient,
  type MockOutcome,
} from "./mock-client.js";
