import { loadConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedProvisionConfig } from "../config/schema.js";
import {
  renderBuildSettings,
  resolveBuildOptions,
  runImageBuild,
  type ImageBuildDeps,
  type ImageBuildOptions
} from "../image/buildx.js";
import { logger } from "../logging/logger.js";
import { ConfigurationError } from "../provision/errors.js";
import type { CommandResult } from "../types/index.js";
import { readFlagValue } from "../utils/argv.js";

export interface BuildCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedProvisionConfig>;
  image: Partial<ImageBuildDeps>;
}

const defaultDeps: BuildCommandDeps = {
  loadConfig,
  image: {}
};

export async function runBuildCommand(args: string[], deps: Partial<BuildCommandDeps> = {}): Promise<CommandResult> {
  const resolvedDeps: BuildCommandDeps = { ...defaultDeps, ...deps };
  const { configPath, rest } = extractConfigPath(args);
  const config = await resolvedDeps.loadConfig({ configPath });
  const options = await resolveBuildOptions(parseBuildArgs(rest, config), resolvedDeps.image);

  logger.section("Build settings");
  for (const line of renderBuildSettings(options)) {
    logger.info(line);
  }

  logger.section("Build");
  const result = await runImageBuild(options, (line) => logger.info(line), resolvedDeps.image);

  if (result.exitCode !== 0) {
    return {
      message: `Build of ${result.reference} failed with exit code ${result.exitCode}.`,
      exitCode: result.exitCode
    };
  }

  return {
    message: result.pushed ? `Built and pushed ${result.reference}.` : `Built ${result.reference} (loaded locally).`,
    exitCode: 0
  };
}

/** Build flags over the `[build]` config section and the application ref. */
export function parseBuildArgs(args: string[], config: ResolvedProvisionConfig): ImageBuildOptions {
  const options: ImageBuildOptions = {
    image: config.build.image,
    tag: config.build.tag,
    platform: config.build.platform,
    target: config.build.target,
    context: config.build.context,
    push: config.build.push,
    load: false,
    noCache: false,
    prune: false,
    pruneHard: false,
    useSudo: config.build.use_sudo,
    imageVersion: config.build.image_version,
    torchIndex: config.build.torch_index,
    torchVersion: config.build.torch_version,
    torchvisionVersion: config.build.torchvision_version,
    comfyRef: config.app.ref,
    extraBuildArgs: []
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    switch (token) {
      case "--no-push":
        options.push = false;
        continue;
      case "--load":
        options.load = true;
        options.push = false;
        continue;
      case "--no-cache":
        options.noCache = true;
        continue;
      case "--prune":
        options.prune = true;
        continue;
      case "--prune-hard":
        options.pruneHard = true;
        continue;
      case "--sudo":
        options.useSudo = true;
        continue;
    }

    const value = readValueFlag(args, index);
    switch (token) {
      case "--platform":
        options.platform = value;
        break;
      case "--tag":
        options.tag = value;
        break;
      case "--image":
        options.image = value;
        break;
      case "--image-version":
        options.imageVersion = value;
        break;
      case "--build-date":
        options.buildDate = value;
        break;
      case "--vcs-ref":
        options.vcsRef = value;
        break;
      case "--torch":
        options.torchVersion = value;
        break;
      case "--torchvision":
        options.torchvisionVersion = value;
        break;
      case "--torch-index":
        options.torchIndex = value;
        break;
      case "--comfy-ref":
        options.comfyRef = value;
        break;
      case "--context":
        options.context = value;
        break;
      case "--build-arg":
        if (!/^[A-Za-z_][A-Za-z0-9_]*=/.test(value)) {
          throw new ConfigurationError(`Invalid value for --build-arg: expected KEY=VALUE, got '${value}'.`);
        }
        options.extraBuildArgs.push(value);
        break;
    }
    index += 1;
  }

  return options;
}

const VALUE_FLAGS = new Set([
  "--platform",
  "--tag",
  "--image",
  "--image-version",
  "--build-date",
  "--vcs-ref",
  "--torch",
  "--torchvision",
  "--torch-index",
  "--comfy-ref",
  "--context",
  "--build-arg"
]);

function readValueFlag(args: string[], index: number): string {
  const token = args[index];
  if (!VALUE_FLAGS.has(token)) {
    throw new ConfigurationError(`Unknown option for build: ${token}`);
  }
  return readFlagValue(args, index);
}

function extractConfigPath(args: string[]): { configPath?: string; rest: string[] } {
  const index = args.indexOf("--config");
  if (index === -1) {
    return { rest: args };
  }
  return {
    configPath: readFlagValue(args, index),
    rest: [...args.slice(0, index), ...args.slice(index + 2)]
  };
}
