/**
 * Release engine configuration
 *
 * Schema-validated settings loaded from an optional YAML file and
 * CHARTWISE_* environment variables (environment wins).
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { parseDuration } from "./duration.js";
import { ConfigError, errorMessage } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { WAIT_STRATEGIES, type WaitStrategy } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const durationSchema = z.string().refine(
  (value) => {
    try {
      parseDuration(value);
      return true;
    } catch {
      return false;
    }
  },
  { message: "expected a duration such as 5m0s or 90s" },
);

const waitStrategySchema = z.custom<WaitStrategy>(
  (value) => typeof value === "string" && WAIT_STRATEGIES.some((strategy) => strategy === value),
  { message: `expected one of ${WAIT_STRATEGIES.join(", ")}` },
);

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && LOG_LEVELS.some((level) => level === value),
  { message: `expected one of ${LOG_LEVELS.join(", ")}` },
);

export const engineConfigSchema = z.object({
  namespace: z.string().min(1).default("default"),
  kubeconfig: z.string().optional(),
  kubeContext: z.string().optional(),
  kubectlBinary: z.string().min(1).default("kubectl"),
  timeout: durationSchema.default("5m0s"),
  waitStrategy: waitStrategySchema.default("watcher"),
  wait: z.boolean().default(true),
  serverSideApply: z.boolean().default(false),
  logLevel: logLevelSchema.default("info"),
  /** Directory holding one YAML revision file per release. */
  storagePath: z.string().min(1).default(".chartwise/releases"),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

export type EngineConfig = z.output<typeof engineConfigSchema> & {
  /** `timeout` in milliseconds. */
  timeoutMs: number;
};

// =============================================================================
// Loading
// =============================================================================

const ENV_PREFIX = "CHARTWISE_";

const ENV_KEYS: Record<string, keyof EngineConfigInput> = {
  NAMESPACE: "namespace",
  KUBECONFIG: "kubeconfig",
  KUBE_CONTEXT: "kubeContext",
  KUBECTL: "kubectlBinary",
  TIMEOUT: "timeout",
  WAIT_STRATEGY: "waitStrategy",
  WAIT: "wait",
  SERVER_SIDE: "serverSideApply",
  LOG_LEVEL: "logLevel",
  STORAGE: "storagePath",
};

const BOOLEAN_KEYS = new Set<keyof EngineConfigInput>(["wait", "serverSideApply"]);

/** Collect CHARTWISE_* overrides from an environment map. */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const raw = env[`${ENV_PREFIX}${suffix}`];
    if (raw === undefined || raw === "") continue;
    result[key] = BOOLEAN_KEYS.has(key) ? ["1", "true", "yes"].includes(raw.toLowerCase()) : raw;
  }
  return result;
}

/** Validate a raw settings object and resolve derived fields. */
export function resolveEngineConfig(input: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return { ...parsed.data, timeoutMs: parseDuration(parsed.data.timeout) };
}

export async function loadEngineConfig(options: {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
} = {}): Promise<EngineConfig> {
  let fromFile: Record<string, unknown> = {};
  if (options.file) {
    let text: string;
    try {
      text = await readFile(options.file, "utf-8");
    } catch (err) {
      throw new ConfigError([`cannot read ${options.file}: ${errorMessage(err)}`]);
    }
    const doc: unknown = parseYaml(text);
    if (doc !== null && doc !== undefined) {
      if (typeof doc !== "object" || Array.isArray(doc)) {
        throw new ConfigError([`${options.file}: expected a mapping at the top level`]);
      }
      fromFile = { ...doc };
    }
  }

  return resolveEngineConfig({
    ...fromFile,
    ...configFromEnv(options.env ?? process.env),
    ...options.overrides,
  });
}
