import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { type LogLevel, LOG_LEVELS, isLogLevel } from "../core/observability.js";
import { FailurePolicy, parseFailurePolicy } from "../orchestrator/orchestrator.js";
import { DEFAULT_MAX_PARALLEL_AGENTS } from "../orchestrator/strategy.js";
import { isRecord } from "../types/index.js";
import { DurationParseError, parseDuration } from "./duration.js";

export const CONFIG_FILENAME = "superintendent.yaml";

export interface OrchestratorSettings {
  maxParallel: number;
  pollIntervalMs: number;
  failurePolicy: FailurePolicy;
  maxRetries: number;
}

export interface SuperintendentConfig {
  logLevel: LogLevel;
  /** Unset means checkpoints are not persisted. */
  checkpointDir?: string;
  orchestrator: OrchestratorSettings;
  strategy: { maxParallelAgents: number };
}

export class ConfigParseError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigParseError";
  }
}

export function defaultConfig(): SuperintendentConfig {
  return {
    logLevel: "info",
    orchestrator: {
      maxParallel: 3,
      pollIntervalMs: 5000,
      failurePolicy: FailurePolicy.SKIP,
      maxRetries: 1,
    },
    strategy: { maxParallelAgents: DEFAULT_MAX_PARALLEL_AGENTS },
  };
}

// ---------------------------------------------------------------------------
// Field validation
// ---------------------------------------------------------------------------

function optionalObject(value: unknown, field: string): Record<string, unknown> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value) || Array.isArray(value)) {
    throw new ConfigParseError(`"${field}" must be a mapping`);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigParseError(`"${field}" must be a non-empty string`);
  }
  return value;
}

function optionalInteger(value: unknown, field: string, min: number): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ConfigParseError(`"${field}" must be an integer`);
  }
  if (value < min) {
    throw new ConfigParseError(`"${field}" must be >= ${min}`);
  }
  return value;
}

function optionalLogLevel(value: unknown, field: string): LogLevel | undefined {
  const raw = optionalString(value, field);
  if (raw === undefined) return undefined;
  if (!isLogLevel(raw)) {
    throw new ConfigParseError(`"${field}" must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return raw;
}

function optionalFailurePolicy(value: unknown, field: string): FailurePolicy | undefined {
  const raw = optionalString(value, field);
  if (raw === undefined) return undefined;
  const policy = parseFailurePolicy(raw);
  if (policy === undefined) {
    throw new ConfigParseError(`"${field}" must be one of: ${Object.values(FailurePolicy).join(", ")}`);
  }
  return policy;
}

/** Duration strings ("5s", "1m30s"); bare numbers are seconds. */
function optionalDuration(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigParseError(`"${field}" must be a positive number of seconds`);
    }
    return value * 1000;
  }
  if (typeof value !== "string") {
    throw new ConfigParseError(`"${field}" must be a duration string`);
  }
  try {
    return parseDuration(value);
  } catch (err) {
    if (err instanceof DurationParseError) {
      throw new ConfigParseError(`"${field}": ${err.message}`);
    }
    throw err;
  }
}

function parseInteger(raw: string, field: string, min: number): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigParseError(`"${field}" must be an integer`);
  }
  return optionalInteger(Number(trimmed), field, min) ?? min;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Applies a parsed YAML document on top of `base`. */
export function parseConfig(
  text: string,
  base: SuperintendentConfig = defaultConfig(),
  source?: string,
): SuperintendentConfig {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (err) {
    throw new ConfigParseError(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  try {
    return applyDocument(doc, base);
  } catch (err) {
    if (err instanceof ConfigParseError && source !== undefined && err.source === undefined) {
      throw new ConfigParseError(err.message, source);
    }
    throw err;
  }
}

function applyDocument(doc: unknown, base: SuperintendentConfig): SuperintendentConfig {
  const root = optionalObject(doc, "<root>");
  if (root === undefined) return base;

  const version = root["version"];
  if (version !== undefined && String(version) !== "1") {
    throw new ConfigParseError(`unsupported "version": ${String(version)}`);
  }

  const orch = optionalObject(root["orchestrator"], "orchestrator") ?? {};
  const strategy = optionalObject(root["strategy"], "strategy") ?? {};

  const checkpointDir = optionalString(root["checkpoint_dir"], "checkpoint_dir") ?? base.checkpointDir;
  return {
    logLevel: optionalLogLevel(root["log_level"], "log_level") ?? base.logLevel,
    ...(checkpointDir !== undefined ? { checkpointDir } : {}),
    orchestrator: {
      maxParallel:
        optionalInteger(orch["max_parallel"], "orchestrator.max_parallel", 1) ?? base.orchestrator.maxParallel,
      pollIntervalMs:
        optionalDuration(orch["poll_interval"], "orchestrator.poll_interval") ?? base.orchestrator.pollIntervalMs,
      failurePolicy:
        optionalFailurePolicy(orch["failure_policy"], "orchestrator.failure_policy") ??
        base.orchestrator.failurePolicy,
      maxRetries:
        optionalInteger(orch["max_retries"], "orchestrator.max_retries", 0) ?? base.orchestrator.maxRetries,
    },
    strategy: {
      maxParallelAgents:
        optionalInteger(strategy["max_parallel_agents"], "strategy.max_parallel_agents", 1) ??
        base.strategy.maxParallelAgents,
    },
  };
}

/** `SUPERINTENDENT_*` variables override file values. */
export function applyEnv(
  config: SuperintendentConfig,
  env: NodeJS.ProcessEnv = process.env,
): SuperintendentConfig {
  const out: SuperintendentConfig = {
    ...config,
    orchestrator: { ...config.orchestrator },
    strategy: { ...config.strategy },
  };

  const logLevel = env["SUPERINTENDENT_LOG_LEVEL"];
  if (logLevel !== undefined && logLevel !== "") {
    out.logLevel = optionalLogLevel(logLevel, "SUPERINTENDENT_LOG_LEVEL") ?? out.logLevel;
  }
  const maxParallel = env["SUPERINTENDENT_MAX_PARALLEL"];
  if (maxParallel !== undefined && maxParallel !== "") {
    out.orchestrator.maxParallel = parseInteger(maxParallel, "SUPERINTENDENT_MAX_PARALLEL", 1);
  }
  const pollInterval = env["SUPERINTENDENT_POLL_INTERVAL"];
  if (pollInterval !== undefined && pollInterval !== "") {
    out.orchestrator.pollIntervalMs =
      optionalDuration(pollInterval, "SUPERINTENDENT_POLL_INTERVAL") ?? out.orchestrator.pollIntervalMs;
  }
  const policy = env["SUPERINTENDENT_FAILURE_POLICY"];
  if (policy !== undefined && policy !== "") {
    out.orchestrator.failurePolicy =
      optionalFailurePolicy(policy, "SUPERINTENDENT_FAILURE_POLICY") ?? out.orchestrator.failurePolicy;
  }
  const maxRetries = env["SUPERINTENDENT_MAX_RETRIES"];
  if (maxRetries !== undefined && maxRetries !== "") {
    out.orchestrator.maxRetries = parseInteger(maxRetries, "SUPERINTENDENT_MAX_RETRIES", 0);
  }
  const checkpointDir = env["SUPERINTENDENT_CHECKPOINT_DIR"];
  if (checkpointDir !== undefined && checkpointDir !== "") {
    out.checkpointDir = checkpointDir;
  }
  return out;
}

export interface LoadConfigOptions {
  /** Explicit file; must exist. */
  configPath?: string;
  /** Directory searched for `superintendent.yaml` when no path is given. */
  repoRoot?: string;
  env?: NodeJS.ProcessEnv;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<SuperintendentConfig> {
  let config = defaultConfig();

  if (options.configPath !== undefined) {
    const text = await readConfigFile(options.configPath, true);
    config = parseConfig(text ?? "", config, options.configPath);
  } else if (options.repoRoot !== undefined) {
    const file = path.join(options.repoRoot, CONFIG_FILENAME);
    const text = await readConfigFile(file, false);
    if (text !== null) config = parseConfig(text, config, file);
  }

  return applyEnv(config, options.env ?? process.env);
}

async function readConfigFile(file: string, required: boolean): Promise<string | null> {
  try {
    return await readFile(file, "utf-8");
  } catch (err) {
    if (!required && isRecord(err) && err["code"] === "ENOENT") return null;
    throw new ConfigParseError(`cannot read config: ${err instanceof Error ? err.message : String(err)}`, file);
  }
}
