import type { PhaseOutcome, RunSummary } from "./types.js";

export const FAILURE_EXIT_CODE = 2;

export interface SummarizeRunOptions {
  pluginCount: number;
  coreImportOk?: boolean;
}

export function summarizeRun(outcomes: readonly PhaseOutcome[], options: SummarizeRunOptions): RunSummary {
  const failedFetches = namesWith(outcomes, "fetch", "failed");
  const failedInstalls = namesWith(outcomes, "install", "failed");
  const warnedNames = namesWith(outcomes, "import_probe", "warned");

  return {
    fetchFailures: failedFetches.length,
    installFailures: failedInstalls.length,
    importWarnings: warnedNames.length,
    warnedNames,
    failedFetches,
    failedInstalls,
    pluginCount: options.pluginCount,
    coreImportOk: options.coreImportOk,
    exitCode: resolveExitCode(failedFetches.length, failedInstalls.length)
  };
}

/** Only structural failures count; import warnings never change the exit code. */
export function resolveExitCode(fetchFailures: number, installFailures: number): 0 | 2 {
  return fetchFailures > 0 || installFailures > 0 ? FAILURE_EXIT_CODE : 0;
}

export function renderSummary(summary: RunSummary, logDir: string): string[] {
  const lines = [
    `Clone failures     : ${summary.fetchFailures}`,
    `Requirements fails : ${summary.installFailures}`,
    `Import warnings    : ${summary.importWarnings} of ${summary.pluginCount}`
  ];

  if (summary.failedFetches.length > 0) {
    lines.push(`Failed clones      : ${summary.failedFetches.join(", ")}`);
  }
  if (summary.failedInstalls.length > 0) {
    lines.push(`Failed installs    : ${summary.failedInstalls.join(", ")}`);
  }
  if (summary.warnedNames.length > 0) {
    lines.push(`Warn list          : ${summary.warnedNames.join(", ")}`);
  }
  if (summary.coreImportOk === false) {
    lines.push("Core import        : failed");
  }

  lines.push(`Logs directory     : ${logDir}`);
  return lines;
}

function namesWith(
  outcomes: readonly PhaseOutcome[],
  phase: PhaseOutcome["phase"],
  status: PhaseOutcome["status"]
): string[] {
  return outcomes
    .filter((outcome) => outcome.phase === phase && outcome.status === status)
    .map((outcome) => outcome.entry.targetDir);
}
