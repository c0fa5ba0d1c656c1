/** CLI program name */
export const CLI_NAME = "promptloom";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION =
  "Send prompts to text-generation APIs with templates, chunking and several output formats.";

/** Available CLI commands */
export const COMMANDS = {
  complete: "complete",
  chunk: "chunk",
  templates: "templates",
  init: "init",
  config: "config",
} as const;

/** Output formats of the complete command */
export const OUTPUT_FORMATS = ["clean", "json", "logprobs"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Command-line option flags */
export const OPTION_FLAGS = {
  file: "-f, --file <path>",
  template: "-t, --template <name>",
  arg: "-a, --arg <key=value>",
  chunkSize: "-c, --chunk-size <chars>",
  forceChunk: "--force-chunk",
  hardCut: "--hard-cut",
  inPrefix: "--in-prefix <text>",
  outPrefix: "--out-prefix <text>",
  model: "-m, --model <identifier>",
  temperature: "--temperature <value>",
  maxTokens: "--max-tokens <count>",
  count: "-n, --count <number>",
  stop: "--stop <sequence>",
  presencePenalty: "--presence-penalty <value>",
  frequencyPenalty: "--frequency-penalty <value>",
  topP: "--top-p <value>",
  logprobs: "--logprobs <k>",
  logitBias: "--logit-bias <spec>",
  format: "-o, --format <format>",
  echo: "-e, --echo",
  encode: "--encode <cypher>",
  retries: "--retries <count>",
  timeout: "--timeout <ms>",
  partial: "--partial",
  append: "--append",
  noColor: "--no-color",
  json: "--json",
  force: "--force",
  logLevel: "--log-level <level>",
  logFile: "--log-file <path>",
  logReset: "--log-reset",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  file: "Read the prompt from a file instead of the argument or stdin.",
  template: "Name of the template each chunk is rendered into.",
  arg: "Template value as key=value. Repeat, or separate pairs with commas.",
  chunkSize: "Split the input into chunks of at most this many characters.",
  forceChunk: "Split the last piece too, even when it would fit in one chunk.",
  hardCut: "Cut oversized pieces at the size limit instead of keeping them whole.",
  inPrefix: "Text put before each chunk, e.g. 'Human: '.",
  outPrefix: "Text put after each chunk, where the completion starts, e.g. 'AI:'.",
  model: "Model identifier, e.g. gpt-4o-mini. Use 'test' to echo prompts offline.",
  temperature: "Sampling temperature between 0 and 2.",
  maxTokens: "Maximum number of output tokens per completion.",
  count: "Number of completions to request per chunk.",
  stop: "Stop sequence. Repeat for up to 4 sequences.",
  presencePenalty: "Presence penalty between -2 and 2.",
  frequencyPenalty: "Frequency penalty between -2 and 2.",
  topP: "Nucleus sampling probability mass between 0 and 1.",
  logprobs: "Return log-probabilities for the k most likely tokens (0-20).",
  logitBias: "Bias a token: word=bias or token:<id>=bias. Repeatable.",
  format: "Output format: clean, json or logprobs.",
  echo: "Include the rendered prompt in the output.",
  encode: "Encode chunks before sending and decode completions: rot<N>, caesar<N>, base64, reverse.",
  retries: "Retries per chunk for rate limits, timeouts and server errors.",
  timeout: "Request timeout in milliseconds.",
  partial: "Print the completions collected so far when a run fails or is interrupted.",
  append: "Append the out-prefix and completion to the --file prompt file.",
  noColor: "Disable colored output.",
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  logFile: "Path to log file. When set, logs are written to file instead of stderr.",
  logReset: "Reset (truncate) the log file at session start instead of appending.",
} as const;

/** Prefix for summary output written to stderr */
export const SUMMARY_PREFIX = "[promptloom]";
