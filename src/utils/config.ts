import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "../core/errors.js";

const ProviderConfigSchema = z.object({
  type: z.enum(["anthropic", "google", "openai_compat"]),
  api_key: z.string(),
  base_url: z.string().optional(),
  models: z.array(z.string()).default([]),
  default_headers: z.record(z.string()).optional(),
});

const LLMConfigSchema = z.object({
  default_provider: z.string(),
  default_model: z.string(),
  timeout_ms: z.number().int().positive().default(120_000),
  max_tokens: z.number().int().positive().default(8192),
  retry_delays_ms: z.array(z.number().int().nonnegative()).default([1000, 2000, 4000]),
  circuit_breaker: z
    .object({
      failure_threshold: z.number().int().positive().default(5),
      reset_timeout_ms: z.number().int().nonnegative().default(60_000),
    })
    .default({}),
  providers: z.record(ProviderConfigSchema),
});

const SyntaxCheckSchema = z.object({
  /** Parse candidates with the Python interpreter after the built-in scan */
  use_interpreter: z.boolean().default(true),
  compile_command: z.array(z.string()).min(1).optional(),
  timeout_seconds: z.number().int().positive().default(30),
});

const UpgradeConfigSchema = z.object({
  max_retries: z.number().int().nonnegative().default(5),
  failure_policy: z.enum(["revert_to_original", "keep_last_candidate"]).default("revert_to_original"),
  extensions: z.array(z.string().startsWith(".")).min(1).default([".py"]),
  report_file: z.string().default("UPGRADE_REPORT.md"),
  syntax_check: SyntaxCheckSchema.default({}),
});

const AppConfigSchema = z.object({
  llm: LLMConfigSchema,
  upgrade: UpgradeConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type UpgradeConfig = z.infer<typeof UpgradeConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const path = configPath ?? env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    let loaded: unknown;
    try {
      loaded = yaml.load(readFileSync(path, "utf-8"));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to read config ${path}: ${message}`, { cause: err });
    }
    if (loaded !== undefined && loaded !== null) {
      if (!isRecord(loaded)) {
        throw new ConfigError(`Config ${path} must be a YAML mapping`);
      }
      rawConfig = loaded;
    }
  } else if (configPath) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  applyEnvOverrides(rawConfig, env);

  const parsed = AppConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`, { cause: parsed.error });
  }
  if (!(parsed.data.llm.default_provider in parsed.data.llm.providers)) {
    throw new ConfigError(
      `Default provider "${parsed.data.llm.default_provider}" is not configured; set an API key such as OPENROUTER_API_KEY`
    );
  }
  return parsed.data;
}

function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
  // Ensure nested objects exist
  const llm = ensureObject(config, "llm");
  const providers = ensureObject(llm, "providers");
  const upgrade = ensureObject(config, "upgrade");

  // LLM provider API key overrides
  if (env.OPENROUTER_API_KEY) {
    const openrouter = ensureObject(providers, "openrouter");
    openrouter.api_key = env.OPENROUTER_API_KEY;
    if (!openrouter.type) openrouter.type = "openai_compat";
    if (!openrouter.base_url) openrouter.base_url = "https://openrouter.ai/api/v1";
    if (!openrouter.models) openrouter.models = ["openai/gpt-4o-mini"];
  }

  if (env.OPENAI_API_KEY) {
    const openai = ensureObject(providers, "openai");
    openai.api_key = env.OPENAI_API_KEY;
    if (!openai.type) openai.type = "openai_compat";
    if (!openai.base_url) openai.base_url = "https://api.openai.com/v1";
    if (!openai.models) openai.models = ["gpt-4o-mini"];
  }

  if (env.ANTHROPIC_API_KEY) {
    const anthropic = ensureObject(providers, "anthropic");
    anthropic.api_key = env.ANTHROPIC_API_KEY;
    if (!anthropic.type) anthropic.type = "anthropic";
    if (!anthropic.models) anthropic.models = ["claude-sonnet-4-5"];
  }

  if (env.GOOGLE_API_KEY) {
    const google = ensureObject(providers, "google");
    google.api_key = env.GOOGLE_API_KEY;
    if (!google.type) google.type = "google";
    if (!google.models) google.models = ["gemini-2.0-flash"];
  }

  if (env.ML_UPGRADER_MODEL) llm.default_model = env.ML_UPGRADER_MODEL;

  if (env.ML_UPGRADER_MAX_RETRIES) {
    const value = env.ML_UPGRADER_MAX_RETRIES.trim();
    if (!/^\d+$/.test(value)) {
      throw new ConfigError(`ML_UPGRADER_MAX_RETRIES must be a non-negative integer, got '${value}'`);
    }
    upgrade.max_retries = Number.parseInt(value, 10);
  }

  if (env.ML_UPGRADER_FAILURE_POLICY) upgrade.failure_policy = env.ML_UPGRADER_FAILURE_POLICY.trim();

  // Set defaults for llm config
  if (!llm.default_provider) {
    llm.default_provider = Object.keys(providers)[0] ?? "openrouter";
  }
  if (!llm.default_model) {
    const defaultProvider = providers[String(llm.default_provider)];
    const models = isRecord(defaultProvider) ? defaultProvider.models : undefined;
    const first: unknown = Array.isArray(models) ? models[0] : undefined;
    llm.default_model = typeof first === "string" ? first : "openai/gpt-4o-mini";
  }
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
