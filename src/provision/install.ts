import { stat } from "node:fs/promises";
import { join } from "node:path";
import type { ManifestEntry } from "../manifest/types.js";
import { describeRunFailure, isSuccessfulRun } from "../process/run.js";
import type { DependencyInstaller } from "../tools/pip.js";
import { InstallError, RunCancelledError, isRunCancelledError, toErrorMessage } from "./errors.js";
import { entryLogPath, entryPath, topLevelDirectory, type RunLayout } from "./layout.js";
import { mapInLanes } from "./pool.js";
import { createOutcome, type PhaseOutcome, type ProvisionEvent } from "./types.js";

export interface InstallPhaseOptions {
  layout: RunLayout;
  installer: DependencyInstaller;
  requirementsFile: string;
  constraintsPath?: string;
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: (event: ProvisionEvent) => void;
}

/**
 * Second pass over the manifest, run only once every fetch has finished. Entries without a
 * requirements file are ok (skipped); installer failures are recorded and the phase moves on.
 */
export async function runInstallPhase(
  entries: readonly ManifestEntry[],
  options: InstallPhaseOptions
): Promise<PhaseOutcome[]> {
  return mapInLanes(
    entries,
    options.concurrency ?? 1,
    (entry) => topLevelDirectory(entry.targetDir),
    (entry) => installEntry(entry, options)
  );
}

async function installEntry(entry: ManifestEntry, options: InstallPhaseOptions): Promise<PhaseOutcome> {
  const requirementsPath = join(entryPath(options.layout, entry.targetDir), options.requirementsFile);
  const logPath = entryLogPath(options.layout, "install", entry.targetDir);
  let outcome: PhaseOutcome;

  try {
    if (!(await isFile(requirementsPath))) {
      outcome = createOutcome({ entry, phase: "install", status: "ok", logPath, attempts: 0, skipped: true });
      options.onEvent?.({ type: "entry:done", outcome });
      return outcome;
    }

    if (options.signal?.aborted) {
      throw new RunCancelledError();
    }

    options.onEvent?.({ type: "entry:start", phase: "install", entry, attempt: 1 });
    const result = await options.installer.install(requirementsPath, {
      constraintsPath: options.constraintsPath,
      logPath,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onLine: (line) => options.onEvent?.({ type: "entry:output", phase: "install", entry, line })
    });

    if (result.cancelled) {
      throw new RunCancelledError();
    }
    if (!isSuccessfulRun(result)) {
      throw new InstallError(describeRunFailure("pip install", result));
    }

    outcome = createOutcome({ entry, phase: "install", status: "ok", logPath, attempts: 1, skipped: false });
  } catch (error) {
    outcome = createOutcome({
      entry,
      phase: "install",
      status: "failed",
      logPath,
      attempts: 1,
      skipped: false,
      error: isRunCancelledError(error) ? "cancelled" : toErrorMessage(error)
    });
  }

  options.onEvent?.({ type: "entry:done", outcome });
  return outcome;
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
