import { join, resolve } from "node:path";
import type { ProvisionPhase } from "./types.js";

export const CUSTOM_NODES_DIRNAME = "custom_nodes";
export const IMPORT_REPORT_FILENAME = "import_sanity.log";

export interface RunLayout {
  workRoot: string;
  runRoot: string;
  appDir: string;
  customNodesRoot: string;
  logDir: string;
  filteredRequirementsPath: string;
  importReportPath: string;
}

export function resolveRunLayout(workRoot: string, appDirName: string): RunLayout {
  const root = resolve(workRoot);
  const runRoot = join(root, "run");
  const appDir = join(runRoot, appDirName);
  const logDir = join(root, "logs");

  return {
    workRoot: root,
    runRoot,
    appDir,
    customNodesRoot: join(appDir, CUSTOM_NODES_DIRNAME),
    logDir,
    filteredRequirementsPath: join(root, "requirements.filtered.txt"),
    importReportPath: join(logDir, IMPORT_REPORT_FILENAME)
  };
}

/** First path segment of a target directory; nested entries share it with their parent. */
export function topLevelDirectory(targetDir: string): string {
  return targetDir.split(/[\\/]+/).find((segment) => segment !== "" && segment !== ".") ?? targetDir;
}

export function entryPath(layout: RunLayout, targetDir: string): string {
  return join(layout.customNodesRoot, targetDir);
}

/** `<logDir>/<phase>_<targetDir>.log`, with path separators in the target flattened to `__`. */
export function entryLogPath(layout: RunLayout, phase: Exclude<ProvisionPhase, "import_probe">, targetDir: string): string {
  return join(layout.logDir, `${phase}_${targetDir.replace(/[\\/]+/g, "__")}.log`);
}

export function namedLogPath(layout: RunLayout, name: string): string {
  return join(layout.logDir, `${name}.log`);
}
