import { loadConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedProvisionConfig } from "../config/schema.js";
import { logger } from "../logging/logger.js";
import { ConfigurationError } from "../provision/errors.js";
import { runRuntimeHandoff, type RuntimeHandoffDeps, type RuntimeHandoffEvent } from "../runtime/handoff.js";
import type { CommandResult } from "../types/index.js";
import { readFlagValue } from "../utils/argv.js";

export interface StartCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedProvisionConfig>;
  handoff: Partial<RuntimeHandoffDeps>;
}

const defaultDeps: StartCommandDeps = {
  loadConfig,
  handoff: {}
};

export async function runStartCommand(args: string[], deps: Partial<StartCommandDeps> = {}): Promise<CommandResult> {
  const resolvedDeps: StartCommandDeps = { ...defaultDeps, ...deps };
  const config = await resolvedDeps.loadConfig({ configPath: parseStartArgs(args).configPath });

  logger.info(`Runtime repository: ${config.runtime.repo_url} -> ${config.runtime.dir}`);
  const stopLoading = logger.startLoading("Syncing runtime repository...");
  const exitCode = await runRuntimeHandoff(
    {
      repoUrl: config.runtime.repo_url,
      dir: config.runtime.dir,
      homeDir: config.runtime.home_dir,
      onEvent: (event) => {
        if (event.type === "sync") {
          stopLoading();
        }
        logHandoffEvent(event);
      }
    },
    resolvedDeps.handoff
  ).finally(stopLoading);

  return {
    message: `start.sh exited with code ${exitCode}.`,
    exitCode
  };
}

function parseStartArgs(args: string[]): { configPath?: string } {
  let configPath: string | undefined;

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token !== "--config") {
      throw new ConfigurationError(`Unknown option for start: ${token}`);
    }
    configPath = readFlagValue(args, index);
    index += 1;
  }

  return { configPath };
}

function logHandoffEvent(event: RuntimeHandoffEvent): void {
  if (event.type === "sync") {
    if (event.result === "update_failed") {
      logger.warn(`git pull failed; continuing with existing checkout${event.detail ? ` (${event.detail})` : ""}.`);
    } else {
      logger.info(event.result === "cloned" ? "Runtime repository cloned." : "Runtime repository updated.");
    }
    return;
  }

  if (event.type === "dotfile") {
    logger.verbose(`Installed ${event.name} -> ${event.path}`);
    return;
  }

  logger.info(`Handing off to ${event.scriptPath}`);
}
