import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";
import { formatZodIssues } from "../core/runtime/runtime-config.js";
import type { FailurePolicy } from "../core/types.js";
import type { AppConfig } from "../utils/config.js";

export interface CliOptions {
  input: string;
  output: string | null;
  config: string | undefined;
  maxRetries: number | undefined;
  model: string | undefined;
  failurePolicy: FailurePolicy | undefined;
  runtime: boolean;
  json: string | undefined;
}

const FlagsSchema = z.object({
  config: z.string().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  model: z.string().min(1).optional(),
  failurePolicy: z.enum(["revert_to_original", "keep_last_candidate"]).optional(),
  runtime: z.boolean().default(true),
  json: z.string().optional(),
});

function parseRetries(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(value, 10);
}

export function buildProgram(): Command {
  return new Command()
    .name("ml-upgrader")
    .description("Upgrade legacy ML code, validating every candidate until it compiles and runs")
    .argument("<input>", "repository to upgrade")
    .argument("[output]", "copy the repository here first and upgrade the copy")
    .option("-c, --config <path>", "app config file (default ./config/config.yaml or CONFIG_PATH)")
    .option("--max-retries <n>", "retries per file after the first attempt", parseRetries)
    .option("--model <id>", "collaborator model")
    .option("--failure-policy <policy>", "revert_to_original or keep_last_candidate")
    .option("--no-runtime", "syntax-only validation")
    .option("--json <path>", "also write the run report as JSON")
    .showHelpAfterError();
}

/** Parse argv (including the node and script entries) into options. */
export function parseCli(argv: readonly string[], program: Command = buildProgram()): CliOptions {
  program.parse([...argv]);

  const [input, output] = program.args;
  if (!input) {
    throw new ConfigError("Missing input repository");
  }

  const flags = FlagsSchema.safeParse(program.opts());
  if (!flags.success) {
    throw new ConfigError(`Invalid options: ${formatZodIssues(flags.error)}`, { cause: flags.error });
  }

  return {
    input,
    output: output ?? null,
    config: flags.data.config,
    maxRetries: flags.data.maxRetries,
    model: flags.data.model,
    failurePolicy: flags.data.failurePolicy,
    runtime: flags.data.runtime,
    json: flags.data.json,
  };
}

/** Command-line flags take precedence over the config file and environment. */
export function applyCliOverrides(config: AppConfig, cli: CliOptions): AppConfig {
  return {
    ...config,
    llm: { ...config.llm, default_model: cli.model ?? config.llm.default_model },
    upgrade: {
      ...config.upgrade,
      max_retries: cli.maxRetries ?? config.upgrade.max_retries,
      failure_policy: cli.failurePolicy ?? config.upgrade.failure_policy,
    },
  };
}
