#!/usr/bin/env node
import { resolve } from "node:path";
import { CommanderError } from "commander";
import { applyCliOverrides, buildProgram, parseCli, type CliOptions } from "./cli/options.js";
import { LLMCollaborator } from "./core/collaborator/llm-collaborator.js";
import { ResilientCollaborator } from "./core/collaborator/resilient-collaborator.js";
import { ConfigError, UpgradeError } from "./core/errors.js";
import { CircuitBreaker } from "./core/llm/circuit-breaker.js";
import { createProvider } from "./core/llm/factory.js";
import { exitCodeFor, summarize, writeJsonReport } from "./core/report.js";
import { ChildProcessExecutor } from "./core/runtime/process-runner.js";
import { loadRuntimeSettings, resolvePython } from "./core/runtime/runtime-config.js";
import { RepositoryOrchestrator } from "./core/upgrade/orchestrator.js";
import { copyRepository } from "./core/upgrade/working-tree.js";
import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger();

async function main(argv: readonly string[]): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCli(argv, buildProgram().exitOverride());
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 2;
    throw err;
  }

  const config = applyCliOverrides(loadConfig(cli.config), cli);
  logger.info("Configuration loaded");

  let root = resolve(cli.input);
  if (cli.output) {
    await copyRepository(cli.input, cli.output);
    root = resolve(cli.output);
    logger.info({ from: resolve(cli.input), to: root }, "Repository copied");
  }

  const runtime = cli.runtime ? await loadRuntimeSettings(root) : null;
  if (!runtime) {
    logger.warn("Runtime validation disabled; candidates are checked for syntax only");
  } else if (runtime.commandNote) {
    logger.info({ command: runtime.command }, runtime.commandNote);
  }

  const providerName = config.llm.default_provider;
  const providerConfig = config.llm.providers[providerName];
  if (!providerConfig) {
    throw new ConfigError(`Default provider "${providerName}" is not configured`);
  }

  const collaborator = new ResilientCollaborator(
    new LLMCollaborator(
      createProvider(providerName, providerConfig),
      { model: config.llm.default_model, maxTokens: config.llm.max_tokens },
      logger
    ),
    new CircuitBreaker({
      failureThreshold: config.llm.circuit_breaker.failure_threshold,
      resetTimeoutMs: config.llm.circuit_breaker.reset_timeout_ms,
    }),
    logger,
    { timeoutMs: config.llm.timeout_ms, retryDelaysMs: config.llm.retry_delays_ms }
  );

  const syntaxCheck = config.upgrade.syntax_check;
  const orchestrator = new RepositoryOrchestrator(
    { collaborator, executor: new ChildProcessExecutor(), logger },
    {
      root,
      runtime,
      maxRetries: config.upgrade.max_retries,
      failurePolicy: config.upgrade.failure_policy,
      extensions: config.upgrade.extensions,
      reportFile: config.upgrade.report_file,
      compileCommand: syntaxCheck.use_interpreter ? syntaxCheck.compile_command : null,
      python: runtime?.python ?? resolvePython(process.env),
      compileTimeoutSeconds: syntaxCheck.timeout_seconds,
    }
  );

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Received signal, aborting run");
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    const report = await orchestrator.run(controller.signal);
    if (cli.json) {
      await writeJsonReport(report, resolve(cli.json));
    }
    logger.info({ ...summarize(report), aborted: report.aborted !== null }, "Done");
    return exitCodeFor(report);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof UpgradeError) {
      logger.error({ code: err.code }, err.message);
    } else {
      logger.fatal({ error: err }, "Fatal error");
    }
    process.exitCode = 2;
  }
);
