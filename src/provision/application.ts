import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ManifestEntry } from "../manifest/types.js";
import { describeRunFailure, isSuccessfulRun, type ProcessRunResult } from "../process/run.js";
import type { RepositoryFetcher } from "../tools/git.js";
import type { DependencyInstaller } from "../tools/pip.js";
import { FetchError, InstallError, RunCancelledError, isRunCancelledError, toErrorMessage } from "./errors.js";
import { isFile } from "./install.js";
import { namedLogPath, type RunLayout } from "./layout.js";
import { createOutcome, type PhaseOutcome, type ProvisionEvent } from "./types.js";

export interface PrepareApplicationOptions {
  layout: RunLayout;
  app: {
    repo_url: string;
    ref: string;
    dir_name: string;
    requirements_exclude: string[];
  };
  requirementsFile: string;
  constraintsPath?: string;
  fetcher: RepositoryFetcher;
  installer: DependencyInstaller;
  fetchTimeoutMs?: number;
  installTimeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: (event: ProvisionEvent) => void;
}

export interface PrepareApplicationResult {
  ok: boolean;
  outcomes: PhaseOutcome[];
}

/**
 * Clones the host application at its ref and installs its filtered requirements. This runs once
 * before the manifest phases; its outcomes count as fetch and install results for the exit code.
 */
export async function prepareApplication(options: PrepareApplicationOptions): Promise<PrepareApplicationResult> {
  const entry: ManifestEntry = {
    repositoryUrl: options.app.repo_url,
    targetDir: options.app.dir_name,
    recursive: false,
    line: 0
  };

  const fetchOutcome = await fetchApplication(entry, options);
  options.onEvent?.({ type: "entry:done", outcome: fetchOutcome });
  if (fetchOutcome.status !== "ok") {
    return { ok: false, outcomes: [fetchOutcome] };
  }

  const installOutcome = await installApplicationRequirements(entry, options);
  options.onEvent?.({ type: "entry:done", outcome: installOutcome });
  return {
    ok: installOutcome.status === "ok",
    outcomes: [fetchOutcome, installOutcome]
  };
}

/**
 * Drops requirement lines whose first token starts with an excluded package name (case-insensitive).
 * Blank lines and comments are kept.
 */
export function filterRequirements(text: string, exclude: readonly string[]): string {
  const excluded = exclude.map((name) => name.trim().toLowerCase()).filter((name) => name !== "");
  const lines = text.split(/\r?\n/);
  if (lines.at(-1) === "") {
    lines.pop();
  }

  const kept = lines.filter((line) => {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      return true;
    }
    const firstToken = trimmed.split(/\s+/)[0].toLowerCase();
    return !excluded.some((name) => firstToken.startsWith(name));
  });

  return `${kept.join("\n")}\n`;
}

async function fetchApplication(entry: ManifestEntry, options: PrepareApplicationOptions): Promise<PhaseOutcome> {
  const { layout, fetcher } = options;
  const logPath = namedLogPath(layout, `app_clone_${entry.targetDir}`);

  try {
    throwIfCancelled(options.signal);
    options.onEvent?.({ type: "step", message: `Clone ${entry.targetDir} @ ${options.app.ref}` });
    const clone = await fetcher.clone(entry.repositoryUrl, layout.appDir, {
      logPath,
      timeoutMs: options.fetchTimeoutMs,
      signal: options.signal
    });
    assertRun(clone, "git clone", FetchError);

    // Result ignored: an unknown ref fails at checkout.
    await fetcher.fetchTags(layout.appDir, {
      logPath: namedLogPath(layout, `app_fetch_tags_${entry.targetDir}`),
      timeoutMs: options.fetchTimeoutMs,
      signal: options.signal
    });

    const checkout = await fetcher.checkout(layout.appDir, options.app.ref, {
      logPath: namedLogPath(layout, `app_checkout_${entry.targetDir}`),
      timeoutMs: options.fetchTimeoutMs,
      signal: options.signal
    });
    assertRun(checkout, `git checkout ${options.app.ref}`, FetchError);

    return createOutcome({ entry, phase: "fetch", status: "ok", logPath, attempts: 1 });
  } catch (error) {
    return createOutcome({ entry, phase: "fetch", status: "failed", logPath, attempts: 1, error: describeError(error) });
  }
}

async function installApplicationRequirements(
  entry: ManifestEntry,
  options: PrepareApplicationOptions
): Promise<PhaseOutcome> {
  const { layout } = options;
  const logPath = namedLogPath(layout, `app_install_${entry.targetDir}`);
  const requirementsPath = join(layout.appDir, options.requirementsFile);

  try {
    if (!(await isFile(requirementsPath))) {
      return createOutcome({ entry, phase: "install", status: "ok", logPath, attempts: 0, skipped: true });
    }

    const filtered = filterRequirements(await readFile(requirementsPath, "utf8"), options.app.requirements_exclude);
    await writeFile(layout.filteredRequirementsPath, filtered, "utf8");

    throwIfCancelled(options.signal);
    const excluded = options.app.requirements_exclude.join(", ");
    options.onEvent?.({
      type: "step",
      message: `Install ${entry.targetDir} requirements${excluded ? ` (without ${excluded})` : ""}`
    });
    const result = await options.installer.install(layout.filteredRequirementsPath, {
      constraintsPath: options.constraintsPath,
      logPath,
      timeoutMs: options.installTimeoutMs,
      signal: options.signal
    });
    assertRun(result, "pip install", InstallError);

    return createOutcome({ entry, phase: "install", status: "ok", logPath, attempts: 1, skipped: false });
  } catch (error) {
    return createOutcome({
      entry,
      phase: "install",
      status: "failed",
      logPath,
      attempts: 1,
      skipped: false,
      error: describeError(error)
    });
  }
}

function assertRun(
  result: ProcessRunResult,
  command: string,
  ErrorType: typeof FetchError | typeof InstallError
): void {
  if (result.cancelled) {
    throw new RunCancelledError();
  }
  if (!isSuccessfulRun(result)) {
    throw new ErrorType(describeRunFailure(command, result));
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}

function describeError(error: unknown): string {
  return isRunCancelledError(error) ? "cancelled" : toErrorMessage(error);
}
