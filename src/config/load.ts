import { access, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { parse as parseDotEnv } from "dotenv";
import { parse as parseToml } from "smol-toml";
import { ConfigurationError } from "../provision/errors.js";
import type { ResolvedProvisionConfig } from "./schema.js";
import { defaultConfig } from "./defaults.js";

type JsonRecord = Record<string, unknown>;

export const PROVISION_CONFIG_FILENAME = "provision.config.toml";

export interface LoadConfigOptions {
  configPath?: string;
  envPath?: string;
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedProvisionConfig {
  config: ResolvedProvisionConfig;
  configPath: string | undefined;
  env: Record<string, string | undefined>;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedProvisionConfig> {
  const loaded = await loadConfigWithMetadata(options);
  return loaded.config;
}

export async function loadConfigWithMetadata(options: LoadConfigOptions = {}): Promise<LoadedProvisionConfig> {
  const cwd = options.cwd ?? process.cwd();
  const envPath = options.envPath ?? resolve(cwd, ".env");
  const parsedEnv = await readEnvFile(envPath);
  const mergedEnv: Record<string, string | undefined> = {
    ...parsedEnv,
    ...(options.env ?? process.env)
  };

  const configPath = await resolveConfigPath(options, mergedEnv);
  const rawConfig = configPath === undefined ? {} : await readTomlConfig(configPath);

  const appRaw = getOptionalTable(rawConfig, "app", "app");
  const manifestRaw = getOptionalTable(rawConfig, "manifest", "manifest");
  const installRaw = getOptionalTable(rawConfig, "install", "install");
  const runRaw = getOptionalTable(rawConfig, "run", "run");
  const buildRaw = getOptionalTable(rawConfig, "build", "build");
  const runtimeRaw = getOptionalTable(rawConfig, "runtime", "runtime");

  const resolved: ResolvedProvisionConfig = {
    app: {
      repo_url: getOptionalString(appRaw, "repo_url", "app.repo_url") ?? defaultConfig.app.repo_url,
      ref: envValue(mergedEnv, "COMFY_REF") ?? getOptionalString(appRaw, "ref", "app.ref") ?? defaultConfig.app.ref,
      dir_name: getOptionalString(appRaw, "dir_name", "app.dir_name") ?? defaultConfig.app.dir_name,
      requirements_exclude:
        getOptionalStringArray(appRaw, "requirements_exclude", "app.requirements_exclude") ??
        defaultConfig.app.requirements_exclude
    },
    manifest: {
      path:
        envValue(mergedEnv, "MANIFEST_PATH") ??
        getOptionalString(manifestRaw, "path", "manifest.path") ??
        defaultConfig.manifest.path,
      url:
        envValue(mergedEnv, "MANIFEST_URL") ??
        getOptionalString(manifestRaw, "url", "manifest.url") ??
        defaultConfig.manifest.url
    },
    install: {
      python:
        envValue(mergedEnv, "PYTHON") ??
        getOptionalString(installRaw, "python", "install.python") ??
        defaultConfig.install.python,
      constraints_path:
        envValue(mergedEnv, "CONSTRAINTS_PATH") ??
        getOptionalString(installRaw, "constraints_path", "install.constraints_path") ??
        defaultConfig.install.constraints_path,
      requirements_file:
        getOptionalString(installRaw, "requirements_file", "install.requirements_file") ??
        defaultConfig.install.requirements_file
    },
    run: {
      work_root:
        envValue(mergedEnv, "WORKROOT") ??
        getOptionalString(runRaw, "work_root", "run.work_root") ??
        defaultConfig.run.work_root,
      concurrency: getOptionalNumber(runRaw, "concurrency", "run.concurrency") ?? defaultConfig.run.concurrency,
      fetch_timeout_ms:
        getOptionalNumber(runRaw, "fetch_timeout_ms", "run.fetch_timeout_ms") ?? defaultConfig.run.fetch_timeout_ms,
      install_timeout_ms:
        getOptionalNumber(runRaw, "install_timeout_ms", "run.install_timeout_ms") ??
        defaultConfig.run.install_timeout_ms,
      probe_timeout_ms:
        getOptionalNumber(runRaw, "probe_timeout_ms", "run.probe_timeout_ms") ?? defaultConfig.run.probe_timeout_ms,
      fetch_retries: getOptionalNumber(runRaw, "fetch_retries", "run.fetch_retries") ?? defaultConfig.run.fetch_retries,
      retry_delay_ms:
        getOptionalNumber(runRaw, "retry_delay_ms", "run.retry_delay_ms") ?? defaultConfig.run.retry_delay_ms,
      probe_candidate_limit:
        getOptionalNumber(runRaw, "probe_candidate_limit", "run.probe_candidate_limit") ??
        defaultConfig.run.probe_candidate_limit
    },
    build: {
      image: getOptionalString(buildRaw, "image", "build.image") ?? defaultConfig.build.image,
      tag: getOptionalString(buildRaw, "tag", "build.tag") ?? defaultConfig.build.tag,
      platform: getOptionalString(buildRaw, "platform", "build.platform") ?? defaultConfig.build.platform,
      target: getOptionalString(buildRaw, "target", "build.target") ?? defaultConfig.build.target,
      context: getOptionalString(buildRaw, "context", "build.context") ?? defaultConfig.build.context,
      push: getOptionalBoolean(buildRaw, "push", "build.push") ?? defaultConfig.build.push,
      use_sudo: getOptionalBoolean(buildRaw, "use_sudo", "build.use_sudo") ?? defaultConfig.build.use_sudo,
      image_version:
        getOptionalString(buildRaw, "image_version", "build.image_version") ?? defaultConfig.build.image_version,
      torch_index: getOptionalString(buildRaw, "torch_index", "build.torch_index") ?? defaultConfig.build.torch_index,
      torch_version:
        getOptionalString(buildRaw, "torch_version", "build.torch_version") ?? defaultConfig.build.torch_version,
      torchvision_version:
        getOptionalString(buildRaw, "torchvision_version", "build.torchvision_version") ??
        defaultConfig.build.torchvision_version
    },
    runtime: {
      repo_url:
        envValue(mergedEnv, "RUNTIME_REPO_URL") ??
        getOptionalString(runtimeRaw, "repo_url", "runtime.repo_url") ??
        defaultConfig.runtime.repo_url,
      dir:
        envValue(mergedEnv, "RUNTIME_DIR") ??
        getOptionalString(runtimeRaw, "dir", "runtime.dir") ??
        defaultConfig.runtime.dir,
      home_dir:
        getOptionalString(runtimeRaw, "home_dir", "runtime.home_dir") ??
        (defaultConfig.runtime.home_dir || (options.homeDir ?? homedir()))
    }
  };

  validateResolvedConfig(resolved);

  return {
    config: resolved,
    configPath,
    env: mergedEnv
  };
}

export function validateResolvedConfig(config: ResolvedProvisionConfig): void {
  requireNonEmpty(config.app.repo_url, "app.repo_url");
  requireNonEmpty(config.app.ref, "app.ref");
  requireNonEmpty(config.app.dir_name, "app.dir_name");
  if (/[\\/]/.test(config.app.dir_name) || config.app.dir_name === "." || config.app.dir_name === "..") {
    throw new ConfigurationError("Invalid app.dir_name: expected a single directory name.");
  }
  requireNonEmpty(config.install.python, "install.python");
  requireNonEmpty(config.install.requirements_file, "install.requirements_file");
  requireNonEmpty(config.run.work_root, "run.work_root");

  requirePositiveInteger(config.run.concurrency, "run.concurrency");
  requirePositiveInteger(config.run.fetch_timeout_ms, "run.fetch_timeout_ms");
  requirePositiveInteger(config.run.install_timeout_ms, "run.install_timeout_ms");
  requirePositiveInteger(config.run.probe_timeout_ms, "run.probe_timeout_ms");
  requirePositiveInteger(config.run.probe_candidate_limit, "run.probe_candidate_limit");

  if (config.run.fetch_retries < 0 || !Number.isInteger(config.run.fetch_retries)) {
    throw new ConfigurationError("Invalid run.fetch_retries: expected an integer greater than or equal to 0.");
  }

  if (config.run.retry_delay_ms < 0 || !Number.isInteger(config.run.retry_delay_ms)) {
    throw new ConfigurationError("Invalid run.retry_delay_ms: expected an integer greater than or equal to 0.");
  }

  requireNonEmpty(config.build.image, "build.image");
  requireNonEmpty(config.build.tag, "build.tag");
  requireNonEmpty(config.build.platform, "build.platform");
  requireNonEmpty(config.build.target, "build.target");
  requireNonEmpty(config.runtime.repo_url, "runtime.repo_url");
  requireNonEmpty(config.runtime.dir, "runtime.dir");
}

async function resolveConfigPath(
  options: LoadConfigOptions,
  env: Record<string, string | undefined>
): Promise<string | undefined> {
  const explicitPath = options.configPath ?? envValue(env, "COMFY_PROVISION_CONFIG");
  if (explicitPath !== undefined) {
    return explicitPath;
  }

  const localPath = resolve(options.cwd ?? process.cwd(), PROVISION_CONFIG_FILENAME);
  return (await pathExists(localPath)) ? localPath : undefined;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

async function readTomlConfig(configPath: string): Promise<JsonRecord> {
  let source: string;
  try {
    source = await readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfigurationError(`Cannot load provision config at '${configPath}': file does not exist.`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseToml(source);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot parse provision config at '${configPath}': ${detail}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError("Invalid provision config root: expected a TOML table.");
  }

  return parsed;
}

async function readEnvFile(envPath: string): Promise<Record<string, string>> {
  try {
    const source = await readFile(envPath, "utf8");
    return parseDotEnv(source);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return {};
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read env file at '${envPath}': ${detail}`, { cause: error });
  }
}

function envValue(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return value.trim();
}

function requireNonEmpty(value: string, path: string): void {
  if (value.trim() === "") {
    throw new ConfigurationError(`Invalid ${path}: expected a non-empty string.`);
  }
}

function requirePositiveInteger(value: number, path: string): void {
  if (value <= 0 || !Number.isInteger(value)) {
    throw new ConfigurationError(`Invalid ${path}: expected a positive integer.`);
  }
}

function getOptionalTable(parent: JsonRecord, key: string, path: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`Invalid ${path}: expected a TOML table.`);
  }
  return value;
}

function getOptionalString(parent: JsonRecord | undefined, key: string, path: string): string | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`Invalid ${path}: expected a string.`);
  }
  return value;
}

function getOptionalNumber(parent: JsonRecord | undefined, key: string, path: string): number | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ConfigurationError(`Invalid ${path}: expected a number.`);
  }
  return value;
}

function getOptionalBoolean(parent: JsonRecord | undefined, key: string, path: string): boolean | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`Invalid ${path}: expected a boolean.`);
  }
  return value;
}

function getOptionalStringArray(
  parent: JsonRecord | undefined,
  key: string,
  path: string
): string[] | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
    throw new ConfigurationError(`Invalid ${path}: expected an array of strings.`);
  }
  return [...value];
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
