import { loadConfig, validateResolvedConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedProvisionConfig } from "../config/schema.js";
import { logger } from "../logging/logger.js";
import { ConfigurationError } from "../provision/errors.js";
import { resolveRunLayout } from "../provision/layout.js";
import { renderSummary } from "../provision/report.js";
import { runSanityCheck, type SanityRunConfig, type SanityRunOptions, type SanityRunResult } from "../provision/runner.js";
import type { ProvisionEvent } from "../provision/types.js";
import type { CommandResult } from "../types/index.js";
import { parseIntegerFlag, readFlagValue } from "../utils/argv.js";

export const CANCELLED_EXIT_CODE = 130;
const CANCEL_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface SanityCommandArgs {
  configPath?: string;
  comfyRef?: string;
  manifestPath?: string;
  manifestUrl?: string;
  constraintsPath?: string;
  workRoot?: string;
  concurrency?: number;
  fetchRetries?: number;
}

export interface SanityCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedProvisionConfig>;
  runSanityCheck: (config: SanityRunConfig, options?: SanityRunOptions) => Promise<SanityRunResult>;
  cancelSignals: NodeJS.Signals[];
}

const defaultDeps: SanityCommandDeps = {
  loadConfig,
  runSanityCheck,
  cancelSignals: CANCEL_SIGNALS
};

export async function runSanityCommand(args: string[], deps: Partial<SanityCommandDeps> = {}): Promise<CommandResult> {
  const resolvedDeps: SanityCommandDeps = { ...defaultDeps, ...deps };
  const parsed = parseSanityArgs(args);
  const config = applySanityOverrides(await resolvedDeps.loadConfig({ configPath: parsed.configPath }), parsed);

  printSettings(config);

  const controller = new AbortController();
  const onSignal = (): void => {
    if (!controller.signal.aborted) {
      logger.warn("Cancelling: stopping running tools and recording remaining entries as cancelled.");
      controller.abort();
    }
  };
  for (const signal of resolvedDeps.cancelSignals) {
    process.on(signal, onSignal);
  }

  const result = await resolvedDeps
    .runSanityCheck(config, { signal: controller.signal, onEvent: logProvisionEvent })
    .finally(() => {
      for (const signal of resolvedDeps.cancelSignals) {
        process.off(signal, onSignal);
      }
    });

  logger.section(result.cancelled ? "Cancelled" : "Finished");
  const lines = renderSummary(result.summary, result.layout.logDir);
  if (result.probe) {
    lines.push(`Import report      : ${result.probe.reportPath}`);
  }
  if (result.pipCheckOk === false) {
    lines.push("pip check          : reported problems (informational)");
  }

  return {
    message: lines.join("\n"),
    exitCode: result.cancelled ? CANCELLED_EXIT_CODE : result.summary.exitCode
  };
}

export function parseSanityArgs(args: string[]): SanityCommandArgs {
  const parsed: SanityCommandArgs = {};

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    switch (token) {
      case "--config":
        parsed.configPath = readFlagValue(args, index);
        break;
      case "--comfy-ref":
        parsed.comfyRef = readFlagValue(args, index);
        break;
      case "--manifest":
        parsed.manifestPath = readFlagValue(args, index);
        break;
      case "--manifest-url":
        parsed.manifestUrl = readFlagValue(args, index);
        break;
      case "--constraints":
        parsed.constraintsPath = readFlagValue(args, index);
        break;
      case "--work-root":
        parsed.workRoot = readFlagValue(args, index);
        break;
      case "--concurrency":
        parsed.concurrency = parseIntegerFlag(token, readFlagValue(args, index), 1);
        break;
      case "--fetch-retries":
        parsed.fetchRetries = parseIntegerFlag(token, readFlagValue(args, index), 0);
        break;
      default:
        throw new ConfigurationError(`Unknown option for sanity: ${token}`);
    }
    index += 1;
  }

  return parsed;
}

export function applySanityOverrides(config: ResolvedProvisionConfig, args: SanityCommandArgs): ResolvedProvisionConfig {
  const next: ResolvedProvisionConfig = {
    ...config,
    app: { ...config.app, ref: args.comfyRef ?? config.app.ref },
    manifest: {
      path: args.manifestPath ?? config.manifest.path,
      url: args.manifestUrl ?? config.manifest.url
    },
    install: { ...config.install, constraints_path: args.constraintsPath ?? config.install.constraints_path },
    run: {
      ...config.run,
      work_root: args.workRoot ?? config.run.work_root,
      concurrency: args.concurrency ?? config.run.concurrency,
      fetch_retries: args.fetchRetries ?? config.run.fetch_retries
    }
  };
  validateResolvedConfig(next);
  return next;
}

function printSettings(config: ResolvedProvisionConfig): void {
  const layout = resolveRunLayout(config.run.work_root, config.app.dir_name);
  logger.section("Settings");
  logger.info(`COMFY_REF        = ${config.app.ref}`);
  logger.info(`MANIFEST_PATH    = ${config.manifest.path || "(unset)"}`);
  logger.info(`MANIFEST_URL     = ${config.manifest.url || "(unset)"}`);
  logger.info(`CONSTRAINTS_PATH = ${config.install.constraints_path || "(unset)"}`);
  logger.info(`WORKROOT         = ${layout.workRoot}`);
  logger.info(`RUNROOT          = ${layout.runRoot}`);
  logger.info(`CONCURRENCY      = ${config.run.concurrency}`);
}

export function logProvisionEvent(event: ProvisionEvent): void {
  switch (event.type) {
    case "step":
      logger.section(event.message);
      return;
    case "entry:start":
      if (event.phase === "fetch") {
        const recursive = event.entry.recursive ? " --recursive" : "";
        logger.info(`-> ${event.entry.targetDir} (${event.entry.repositoryUrl})${recursive}`);
      } else if (event.phase === "install") {
        logger.info(`-- requirements: ${event.entry.targetDir}`);
      } else {
        logger.verbose(`probe: ${event.entry.targetDir}`);
      }
      return;
    case "entry:retry":
      logger.warn(`Retrying ${event.entry.targetDir} (attempt ${event.nextAttempt}): ${event.error}`);
      return;
    case "entry:output":
      logger.verbose(`   ${event.line}`);
      return;
    case "entry:done": {
      const { outcome } = event;
      if (outcome.status === "ok") {
        return;
      }
      const name = outcome.entry.targetDir;
      if (outcome.phase === "fetch") {
        logger.error(`!! CLONE FAILED: ${name} (${outcome.error ?? "unknown error"}; see ${outcome.logPath})`);
      } else if (outcome.phase === "install") {
        logger.error(`!! REQUIREMENTS FAILED: ${name} (${outcome.error ?? "unknown error"}; see ${outcome.logPath})`);
      } else {
        logger.warn(`Import failed: ${name}${outcome.error ? ` (${outcome.error})` : ""}`);
      }
      return;
    }
    case "probe:core":
      if (event.ok) {
        logger.info("Core import ok.");
      } else {
        logger.warn(`Core import failed${event.detail ? `: ${event.detail}` : ""}`);
      }
      return;
  }
}
