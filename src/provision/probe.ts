import type { Dirent } from "node:fs";
import { readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ManifestEntry } from "../manifest/types.js";
import type { ImportProbeHost, ImportProbeResult } from "../tools/python-probe.js";
import { ImportWarning, toErrorMessage } from "./errors.js";
import { CUSTOM_NODES_DIRNAME, topLevelDirectory, type RunLayout } from "./layout.js";
import { createOutcome, type PhaseOutcome, type ProvisionEvent } from "./types.js";

export const CORE_MODULE = "nodes";
const PACKAGE_INITIALIZER = "__init__.py";
const SKIPPED_DIRECTORY_NAMES = new Set(["__pycache__"]);

export interface ImportProbeOptions {
  layout: RunLayout;
  host: ImportProbeHost;
  appName: string;
  candidateLimit: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  onEvent?: (event: ProvisionEvent) => void;
}

export interface ImportProbeReport {
  outcomes: PhaseOutcome[];
  pluginCount: number;
  warnedNames: string[];
  coreImportOk: boolean;
  reportPath: string;
}

/**
 * Probes the application core and then every directory under the custom nodes root, manifested or
 * not. Never produces a failed outcome: a plugin that imports is ok, anything else is warned.
 */
export async function runImportProbePhase(
  entries: readonly ManifestEntry[],
  options: ImportProbeOptions
): Promise<ImportProbeReport> {
  const { layout } = options;
  const reportLines: string[] = [];

  const core = await probeSafely(options, [CORE_MODULE]);
  const coreImportOk = core.importedModule !== undefined;
  if (coreImportOk) {
    reportLines.push(`[OK] import ${options.appName} ${CORE_MODULE}`);
  } else {
    reportLines.push(`[WARN] import ${options.appName} ${CORE_MODULE} failed${formatFailureSuffix(core)}`);
  }
  options.onEvent?.({ type: "probe:core", ok: coreImportOk, detail: coreImportOk ? undefined : lastFailure(core) });

  const entryByDir = indexEntriesByDirectory(entries);
  const pluginNames = await listPluginDirectories(layout.customNodesRoot);
  const outcomes: PhaseOutcome[] = [];
  const warnedNames: string[] = [];

  for (const name of pluginNames) {
    const entry = entryByDir.get(name) ?? { repositoryUrl: "", targetDir: name, recursive: false, line: 0 };
    const candidates = await buildImportCandidates(join(layout.customNodesRoot, name), name, options.candidateLimit);
    options.onEvent?.({ type: "entry:start", phase: "import_probe", entry, attempt: 1 });

    const result: ImportProbeResult =
      candidates.length === 0
        ? { importedModule: undefined, failures: ["no importable modules found"], timedOut: false, cancelled: false }
        : await probeSafely(options, candidates, entry);

    let outcome: PhaseOutcome;
    if (result.importedModule !== undefined) {
      reportLines.push(`[OK]  ${name}`);
      outcome = createOutcome({ entry, phase: "import_probe", status: "ok", logPath: layout.importReportPath, attempts: 1 });
    } else {
      const warning = new ImportWarning(`${name} (import failed; could be GPU-only or missing deps)`);
      reportLines.push(`[WARN] ${warning.message}`);
      const detail = lastFailure(result);
      if (detail) {
        reportLines.push(`       ${detail}`);
      }
      warnedNames.push(name);
      outcome = createOutcome({
        entry,
        phase: "import_probe",
        status: "warned",
        logPath: layout.importReportPath,
        attempts: 1,
        error: detail ?? warning.message
      });
    }

    outcomes.push(outcome);
    options.onEvent?.({ type: "entry:done", outcome });
  }

  reportLines.push(
    "",
    "Summary:",
    `  ${CUSTOM_NODES_DIRNAME} total: ${pluginNames.length}`,
    `  warnings: ${warnedNames.length}`
  );
  if (warnedNames.length > 0) {
    reportLines.push(`  warn list: ${warnedNames.join(", ")}`);
  }
  await writeFile(layout.importReportPath, `${reportLines.join("\n")}\n`, "utf8");

  return {
    outcomes,
    pluginCount: pluginNames.length,
    warnedNames,
    coreImportOk,
    reportPath: layout.importReportPath
  };
}

/** Plugin directories directly under `root`, sorted by name; hidden and cache directories are left out. */
export async function listPluginDirectories(root: string): Promise<string[]> {
  const dirents = await readdir(root, { withFileTypes: true }).catch((error: unknown): Dirent[] => {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  });

  const names: string[] = [];
  for (const dirent of dirents) {
    if (dirent.name.startsWith(".") || SKIPPED_DIRECTORY_NAMES.has(dirent.name)) {
      continue;
    }
    if (await isEntryOfKind(root, dirent, "directory")) {
      names.push(dirent.name);
    }
  }
  return names.sort();
}

/**
 * Module names to try for one plugin directory: the package itself when it has an `__init__.py`,
 * otherwise its top-level `.py` files sorted by name, capped at `limit`.
 */
export async function buildImportCandidates(pluginDir: string, name: string, limit: number): Promise<string[]> {
  const dirents = await readdir(pluginDir, { withFileTypes: true });
  const packageName = `${CUSTOM_NODES_DIRNAME}.${name}`;

  const sourceFiles: string[] = [];
  for (const dirent of dirents) {
    if (dirent.name.endsWith(".py") && (await isEntryOfKind(pluginDir, dirent, "file"))) {
      sourceFiles.push(dirent.name);
    }
  }

  if (sourceFiles.includes(PACKAGE_INITIALIZER)) {
    return [packageName];
  }

  return sourceFiles
    .sort()
    .slice(0, limit)
    .map((fileName) => `${packageName}.${fileName.slice(0, -".py".length)}`);
}

async function probeSafely(
  options: ImportProbeOptions,
  modules: string[],
  entry?: ManifestEntry
): Promise<ImportProbeResult> {
  try {
    return await options.host.probe(options.layout.appDir, modules, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onLine: entry
        ? (line) => options.onEvent?.({ type: "entry:output", phase: "import_probe", entry, line })
        : undefined
    });
  } catch (error) {
    return { importedModule: undefined, failures: [toErrorMessage(error)], timedOut: false, cancelled: false };
  }
}

/** Symlinks are followed; a dangling link is neither a file nor a directory. */
async function isEntryOfKind(parent: string, dirent: Dirent, kind: "file" | "directory"): Promise<boolean> {
  if (!dirent.isSymbolicLink()) {
    return kind === "file" ? dirent.isFile() : dirent.isDirectory();
  }

  try {
    const target = await stat(join(parent, dirent.name));
    return kind === "file" ? target.isFile() : target.isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ELOOP")) {
      return false;
    }
    throw error;
  }
}

function indexEntriesByDirectory(entries: readonly ManifestEntry[]): Map<string, ManifestEntry> {
  const byDir = new Map<string, ManifestEntry>();
  for (const entry of entries) {
    byDir.set(topLevelDirectory(entry.targetDir), entry);
  }
  return byDir;
}

function lastFailure(result: ImportProbeResult): string | undefined {
  if (result.cancelled) {
    return "cancelled";
  }
  if (result.timedOut) {
    return "timed out";
  }
  return result.failures.at(-1);
}

function formatFailureSuffix(result: ImportProbeResult): string {
  const detail = lastFailure(result);
  return detail ? `: ${detail}` : "";
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
