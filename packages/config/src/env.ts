import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

const nodeEnvSchema = z.enum(["development", "test", "production"]).default("development");
const deployEnvSchema = z.enum(["development", "staging", "production"]);
const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
const unknownAssetsPolicySchema = z.enum(["ignore", "error"]);
const timeoutMsSchema = z.number().int().positive().nullable();

export type NodeEnv = z.infer<typeof nodeEnvSchema>;
export type DeployEnv = z.infer<typeof deployEnvSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
export type UnknownAssetsPolicy = z.infer<typeof unknownAssetsPolicySchema>;

const yamlConfigInputSchema = z
  .object({
    logLevel: logLevelSchema.optional(),
    loader: z
      .object({
        manifestPath: z.string().min(1).optional(),
        loadTimeoutMs: timeoutMsSchema.optional(),
        unloadTimeoutMs: timeoutMsSchema.optional(),
        unknownAssets: unknownAssetsPolicySchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const yamlConfigSchema = z
  .object({
    logLevel: logLevelSchema.default("info"),
    loader: z
      .object({
        manifestPath: z.string().min(1).default("config/assets.yaml"),
        loadTimeoutMs: timeoutMsSchema.default(30_000),
        unloadTimeoutMs: timeoutMsSchema.default(10_000),
        unknownAssets: unknownAssetsPolicySchema.default("ignore"),
      })
      .strict()
      .default({}),
  })
  .strict();

type YamlConfig = z.infer<typeof yamlConfigSchema>;

export interface LoaderConfig {
  manifestPath: string;
  loadTimeoutMs: number | null;
  unloadTimeoutMs: number | null;
  unknownAssets: UnknownAssetsPolicy;
}

export interface BaseEnv {
  NODE_ENV: NodeEnv;
  DEPLOY_ENV: DeployEnv;
  LOG_LEVEL: LogLevel;
}

export interface LoaderEnv extends BaseEnv {
  loader: LoaderConfig;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function resolveRepoRoot(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

function readYamlObject(filePath: string): Record<string, unknown> {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read config file: ${filePath}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    throw new Error(`Failed to parse YAML: ${filePath}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Expected YAML config to be a mapping/object: ${filePath}`);
  }
  return parsed;
}

function deepMerge(
  baseValue: Record<string, unknown>,
  overrideValue: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...baseValue };
  for (const [key, override] of Object.entries(overrideValue)) {
    const base = merged[key];
    if (isPlainObject(base) && isPlainObject(override)) {
      merged[key] = deepMerge(base, override);
      continue;
    }
    merged[key] = override;
  }
  return merged;
}

function loadYamlConfig(params: { deployEnv: DeployEnv; nodeEnv: NodeEnv }): YamlConfig {
  const repoRoot = resolveRepoRoot();
  const basePath = path.join(repoRoot, "config", "base.yaml");
  const envPath = path.join(repoRoot, "config", "env", `${params.deployEnv}.yaml`);

  const baseRaw = yamlConfigInputSchema.parse(readYamlObject(basePath));
  const envRaw =
    params.nodeEnv === "test" ? {} : yamlConfigInputSchema.parse(readYamlObject(envPath));
  return yamlConfigSchema.parse(deepMerge(baseRaw, envRaw));
}

function resolveDeployEnv(params: {
  nodeEnv: NodeEnv;
  deployEnv: DeployEnv | undefined;
}): DeployEnv {
  if (params.deployEnv) return params.deployEnv;
  return params.nodeEnv === "production" ? "production" : "development";
}

const baseEnvSchema = z.object({
  NODE_ENV: nodeEnvSchema,
  DEPLOY_ENV: deployEnvSchema.optional(),
  LOG_LEVEL: logLevelSchema.optional(),
});

const loaderOverridesEnvSchema = z
  .object({
    ASSET_MANIFEST_PATH: z.string().min(1).optional(),
    ASSET_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    ASSET_UNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    ASSET_UNKNOWN_POLICY: unknownAssetsPolicySchema.optional(),
  })
  .strip();

function resolveLoaderConfig(yaml: YamlConfig, env: NodeJS.ProcessEnv): LoaderConfig {
  const overrides = loaderOverridesEnvSchema.parse(env);
  const manifestPath = overrides.ASSET_MANIFEST_PATH ?? yaml.loader.manifestPath;
  return {
    manifestPath: path.resolve(resolveRepoRoot(), manifestPath),
    loadTimeoutMs: overrides.ASSET_LOAD_TIMEOUT_MS ?? yaml.loader.loadTimeoutMs,
    unloadTimeoutMs: overrides.ASSET_UNLOAD_TIMEOUT_MS ?? yaml.loader.unloadTimeoutMs,
    unknownAssets: overrides.ASSET_UNKNOWN_POLICY ?? yaml.loader.unknownAssets,
  };
}

function loadBaseParts(env: NodeJS.ProcessEnv): { base: BaseEnv; yaml: YamlConfig } {
  const parsed = baseEnvSchema.parse(env);
  const deployEnv = resolveDeployEnv({ nodeEnv: parsed.NODE_ENV, deployEnv: parsed.DEPLOY_ENV });
  const yaml = loadYamlConfig({ deployEnv, nodeEnv: parsed.NODE_ENV });
  return {
    base: {
      NODE_ENV: parsed.NODE_ENV,
      DEPLOY_ENV: deployEnv,
      LOG_LEVEL: parsed.LOG_LEVEL ?? yaml.logLevel,
    },
    yaml,
  };
}

export function loadBaseEnv(env: NodeJS.ProcessEnv = process.env): BaseEnv {
  return loadBaseParts(env).base;
}

export function loadLoaderEnv(env: NodeJS.ProcessEnv = process.env): LoaderEnv {
  const { base, yaml } = loadBaseParts(env);
  return {
    ...base,
    loader: resolveLoaderConfig(yaml, env),
  };
}
