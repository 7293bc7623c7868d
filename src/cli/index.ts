#!/usr/bin/env node

import { logger, setVerboseLoggingEnabled } from "../logging/logger.js";
import { isConfigurationError } from "../provision/errors.js";
import type { CommandResult } from "../types/index.js";
import { runBuildCommand } from "./commands.build.js";
import { runSanityCommand } from "./commands.sanity.js";
import { runStartCommand } from "./commands.start.js";
import { parseGlobalCliOptions, renderHelp, resolveCliCommand } from "./router.js";

export async function runCli(argv: string[]): Promise<number> {
  try {
    const globalOptions = parseGlobalCliOptions(argv);
    setVerboseLoggingEnabled(globalOptions.verbose);
    const resolved = resolveCliCommand(globalOptions.args);

    if (resolved.command === "help") {
      logger.info(renderHelp());
      return 0;
    }

    let result: CommandResult;
    if (resolved.command === "sanity") {
      result = await runSanityCommand(resolved.args);
    } else if (resolved.command === "build") {
      result = await runBuildCommand(resolved.args);
    } else {
      result = await runStartCommand(resolved.args);
    }

    const exitCode = result.exitCode ?? 0;
    if (exitCode === 0) {
      logger.info(result.message);
    } else {
      logger.error(result.message);
    }
    return exitCode;
  } catch (error) {
    if (isConfigurationError(error)) {
      logger.error(error.message);
      return 1;
    }

    const message = error instanceof Error ? error.message : "Unexpected CLI failure";
    logger.error(message);
    if (error instanceof Error && error.stack) {
      logger.verbose(error.stack);
    }
    return 1;
  }
}

const exitCode = await runCli(process.argv.slice(2));
process.exit(exitCode);
