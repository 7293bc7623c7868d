import { mkdir, rm, stat } from "node:fs/promises";
import { resolve } from "node:path";
import type { ResolvedProvisionConfig } from "../config/schema.js";
import { loadManifest, type LoadedManifest, type LoadManifestOptions } from "../manifest/load.js";
import type { Manifest } from "../manifest/types.js";
import { isSuccessfulRun } from "../process/run.js";
import type { SleepFn } from "../process/retry.js";
import { createGitFetcher, type RepositoryFetcher } from "../tools/git.js";
import { createPipInstaller, type DependencyInstaller } from "../tools/pip.js";
import { createPythonImportProbe, type ImportProbeHost } from "../tools/python-probe.js";
import { prepareApplication } from "./application.js";
import { ConfigurationError, RunRootResetError } from "./errors.js";
import { runFetchPhase } from "./fetch.js";
import { isFile, runInstallPhase } from "./install.js";
import { namedLogPath, resolveRunLayout, type RunLayout } from "./layout.js";
import { runImportProbePhase, type ImportProbeReport } from "./probe.js";
import { summarizeRun } from "./report.js";
import type { PhaseOutcome, ProvisionEvent, RunSummary } from "./types.js";

export type SanityRunConfig = Pick<ResolvedProvisionConfig, "app" | "manifest" | "install" | "run">;

export interface SanityRunDeps {
  fetcher: RepositoryFetcher;
  installer: DependencyInstaller;
  probeHost: ImportProbeHost;
  loadManifest: (options: LoadManifestOptions) => Promise<LoadedManifest>;
  sleep?: SleepFn;
}

export interface SanityRunOptions {
  deps?: Partial<SanityRunDeps>;
  signal?: AbortSignal;
  onEvent?: (event: ProvisionEvent) => void;
}

export interface SanityRunResult {
  layout: RunLayout;
  manifest: Manifest;
  outcomes: PhaseOutcome[];
  summary: RunSummary;
  applicationOk: boolean;
  probe: ImportProbeReport | null;
  pipCheckOk: boolean | undefined;
  cancelled: boolean;
}

/**
 * Provisioning batch run: manifest load, run root reset, application preparation, then the fetch,
 * install and import-probe passes over one in-memory manifest. Configuration problems throw before
 * any phase runs; per-entry problems become outcomes.
 */
export async function runSanityCheck(config: SanityRunConfig, options: SanityRunOptions = {}): Promise<SanityRunResult> {
  const deps: SanityRunDeps = {
    fetcher: createGitFetcher(),
    installer: createPipInstaller(config.install.python),
    probeHost: createPythonImportProbe(config.install.python),
    loadManifest,
    ...(options.deps ?? {})
  };
  const { signal, onEvent } = options;
  const layout = resolveRunLayout(config.run.work_root, config.app.dir_name);

  await mkdir(layout.logDir, { recursive: true });

  const { manifest } = await deps.loadManifest({
    path: config.manifest.path,
    url: config.manifest.url,
    workRoot: layout.workRoot
  });
  const constraintsPath = await resolveConstraintsPath(config.install.constraints_path);

  await resetRunRoot(layout);

  const application = await prepareApplication({
    layout,
    app: config.app,
    requirementsFile: config.install.requirements_file,
    constraintsPath,
    fetcher: deps.fetcher,
    installer: deps.installer,
    fetchTimeoutMs: config.run.fetch_timeout_ms,
    installTimeoutMs: config.run.install_timeout_ms,
    signal,
    onEvent
  });

  const outcomes: PhaseOutcome[] = [...application.outcomes];
  if (!application.ok || signal?.aborted) {
    return finish({ layout, manifest, outcomes, applicationOk: application.ok, probe: null, pipCheckOk: undefined, signal });
  }

  await mkdir(layout.customNodesRoot, { recursive: true });

  onEvent?.({ type: "step", message: `Clone custom nodes from manifest (${manifest.entries.length} entries)` });
  outcomes.push(
    ...(await runFetchPhase(manifest.entries, {
      layout,
      fetcher: deps.fetcher,
      concurrency: config.run.concurrency,
      timeoutMs: config.run.fetch_timeout_ms,
      retryPolicy: { attempts: config.run.fetch_retries + 1, delayMs: config.run.retry_delay_ms },
      signal,
      sleep: deps.sleep,
      onEvent
    }))
  );

  onEvent?.({ type: "step", message: "Install requirements for each custom node (if present)" });
  outcomes.push(
    ...(await runInstallPhase(manifest.entries, {
      layout,
      installer: deps.installer,
      requirementsFile: config.install.requirements_file,
      constraintsPath,
      concurrency: config.run.concurrency,
      timeoutMs: config.run.install_timeout_ms,
      signal,
      onEvent
    }))
  );

  if (signal?.aborted) {
    return finish({ layout, manifest, outcomes, applicationOk: true, probe: null, pipCheckOk: undefined, signal });
  }

  onEvent?.({ type: "step", message: "Import sanity (best-effort)" });
  const probe = await runImportProbePhase(manifest.entries, {
    layout,
    host: deps.probeHost,
    appName: config.app.dir_name,
    candidateLimit: config.run.probe_candidate_limit,
    timeoutMs: config.run.probe_timeout_ms,
    signal,
    onEvent
  });
  outcomes.push(...probe.outcomes);

  onEvent?.({ type: "step", message: "pip check (informational)" });
  const pipCheckOk = await runPipCheck(deps.installer, layout, config.run.install_timeout_ms, signal);

  return finish({ layout, manifest, outcomes, applicationOk: true, probe, pipCheckOk, signal });
}

async function resolveConstraintsPath(constraintsPath: string): Promise<string | undefined> {
  if (constraintsPath.trim() === "") {
    return undefined;
  }

  const absolutePath = resolve(constraintsPath);
  if (!(await isFile(absolutePath))) {
    throw new ConfigurationError(`Constraints file not found: ${constraintsPath} (is it mounted?)`);
  }
  return absolutePath;
}

async function resetRunRoot(layout: RunLayout): Promise<void> {
  await rm(layout.runRoot, { recursive: true, force: true });
  await mkdir(layout.runRoot, { recursive: true });

  const leftover = await stat(layout.appDir).then(
    () => true,
    () => false
  );
  if (leftover) {
    throw new RunRootResetError(`${layout.appDir} still exists after resetting ${layout.runRoot}.`);
  }
}

async function runPipCheck(
  installer: DependencyInstaller,
  layout: RunLayout,
  timeoutMs: number,
  signal: AbortSignal | undefined
): Promise<boolean> {
  try {
    const result = await installer.check({ logPath: namedLogPath(layout, "pip_check"), timeoutMs, signal });
    return isSuccessfulRun(result);
  } catch {
    return false;
  }
}

function finish(state: {
  layout: RunLayout;
  manifest: Manifest;
  outcomes: PhaseOutcome[];
  applicationOk: boolean;
  probe: ImportProbeReport | null;
  pipCheckOk: boolean | undefined;
  signal: AbortSignal | undefined;
}): SanityRunResult {
  return {
    layout: state.layout,
    manifest: state.manifest,
    outcomes: state.outcomes,
    summary: summarizeRun(state.outcomes, {
      pluginCount: state.probe?.pluginCount ?? 0,
      coreImportOk: state.probe?.coreImportOk
    }),
    applicationOk: state.applicationOk,
    probe: state.probe,
    pipCheckOk: state.pipCheckOk,
    cancelled: state.signal?.aborted ?? false
  };
}
