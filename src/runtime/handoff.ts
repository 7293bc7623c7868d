import { spawn } from "node:child_process";
import { constants as osConstants } from "node:os";
import { chmod, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describeRunFailure, isSuccessfulRun } from "../process/run.js";
import { ConfigurationError, toErrorMessage } from "../provision/errors.js";
import { createGitFetcher, type RepositoryFetcher } from "../tools/git.js";

const REPO_ROOT_PLACEHOLDER = "REPO_ROOT=<CHANGEME>";
const DOTFILE_MODE = 0o644;
const FORWARDED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
export const RUNTIME_DOTFILES = [".bashrc", ".bash_functions", ".bash_aliases"] as const;
export const START_SCRIPT = "start.sh";

export type RuntimeSyncResult = "cloned" | "updated" | "update_failed";

export type RuntimeHandoffEvent =
  | { type: "sync"; result: RuntimeSyncResult; detail?: string }
  | { type: "dotfile"; name: string; path: string }
  | { type: "start"; scriptPath: string };

export interface RuntimeHandoffOptions {
  repoUrl: string;
  dir: string;
  homeDir: string;
  onEvent?: (event: RuntimeHandoffEvent) => void;
}

export interface RuntimeHandoffDeps {
  fetcher: RepositoryFetcher;
  runStartScript: (scriptPath: string, cwd: string) => Promise<number>;
}

const defaultDeps: RuntimeHandoffDeps = {
  fetcher: createGitFetcher(),
  runStartScript
};

/** Syncs the runtime repository, installs its dotfiles and runs its start script; resolves to its exit code. */
export async function runRuntimeHandoff(
  options: RuntimeHandoffOptions,
  deps: Partial<RuntimeHandoffDeps> = {}
): Promise<number> {
  const resolvedDeps: RuntimeHandoffDeps = { ...defaultDeps, ...deps };

  await syncRuntimeRepository(options, resolvedDeps.fetcher);

  for (const installed of await installDotfiles(options.dir, options.homeDir)) {
    options.onEvent?.({ type: "dotfile", ...installed });
  }

  const scriptPath = join(options.dir, START_SCRIPT);
  await ensureExecutable(scriptPath);
  options.onEvent?.({ type: "start", scriptPath });
  return resolvedDeps.runStartScript(scriptPath, options.dir);
}

/** Pulls an existing checkout (a failed pull only warns) or shallow-clones a fresh one (a failed clone throws). */
export async function syncRuntimeRepository(
  options: Pick<RuntimeHandoffOptions, "repoUrl" | "dir" | "onEvent">,
  fetcher: RepositoryFetcher
): Promise<RuntimeSyncResult> {
  if (await exists(join(options.dir, ".git"))) {
    let detail: string | undefined;
    try {
      const pull = await fetcher.pull(options.dir);
      if (!isSuccessfulRun(pull)) {
        detail = describeRunFailure("git pull", pull);
      }
    } catch (error) {
      detail = toErrorMessage(error);
    }

    if (detail !== undefined) {
      options.onEvent?.({ type: "sync", result: "update_failed", detail });
      return "update_failed";
    }
    options.onEvent?.({ type: "sync", result: "updated" });
    return "updated";
  }

  const clone = await fetcher.clone(options.repoUrl, options.dir, { depth: 1 });
  if (!isSuccessfulRun(clone)) {
    throw new Error(`Cannot clone runtime repository ${options.repoUrl}: ${describeRunFailure("git clone", clone)}`);
  }
  options.onEvent?.({ type: "sync", result: "cloned" });
  return "cloned";
}

export function applyRepoRootPlaceholder(text: string, dir: string): string {
  return text.replaceAll(REPO_ROOT_PLACEHOLDER, () => `REPO_ROOT="${dir}"`);
}

export async function installDotfiles(dir: string, homeDir: string): Promise<Array<{ name: string; path: string }>> {
  const installed: Array<{ name: string; path: string }> = [];

  for (const name of RUNTIME_DOTFILES) {
    const source = join(dir, name);
    const text = await readFile(source, "utf8").catch((error: unknown) => {
      throw new ConfigurationError(`Runtime dotfile missing: ${source}`, { cause: error });
    });
    const target = join(homeDir, name);
    await writeFile(target, name === ".bashrc" ? applyRepoRootPlaceholder(text, dir) : text, "utf8");
    await chmod(target, DOTFILE_MODE);
    installed.push({ name, path: target });
  }

  return installed;
}

export async function ensureExecutable(path: string): Promise<void> {
  const info = await stat(path).catch((error: unknown) => {
    throw new ConfigurationError(`Runtime start script missing: ${path}`, { cause: error });
  });
  if ((info.mode & 0o111) !== 0o111) {
    await chmod(path, (info.mode & 0o7777) | 0o111);
  }
}

/** Runs the start script in the foreground, forwarding termination signals until it exits. */
export function runStartScript(scriptPath: string, cwd: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const child = spawn(scriptPath, [], { cwd, stdio: "inherit" });
    const handlers = new Map<NodeJS.Signals, () => void>();

    const removeSignalHandlers = (): void => {
      for (const [signal, handler] of handlers) {
        process.off(signal, handler);
      }
      handlers.clear();
    };

    for (const signal of FORWARDED_SIGNALS) {
      const handler = (): void => {
        child.kill(signal);
      };
      handlers.set(signal, handler);
      process.on(signal, handler);
    }

    child.once("error", (error: Error) => {
      removeSignalHandlers();
      reject(new Error(`Failed to start '${scriptPath}': ${error.message}`, { cause: error }));
    });

    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      removeSignalHandlers();
      resolve(code ?? (signal ? 128 + osConstants.signals[signal] : 1));
    });
  });
}

async function exists(path: string): Promise<boolean> {
  return stat(path).then(
    () => true,
    () => false
  );
}
