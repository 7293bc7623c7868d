import { runProcess, type ProcessRunner, type ProcessRunResult } from "../process/run.js";

export interface ToolCallOptions {
  logPath?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  onLine?: (line: string) => void;
}

export interface CloneOptions extends ToolCallOptions {
  recursive?: boolean;
  depth?: number;
}

/** The version-control client, reached only through these calls. */
export interface RepositoryFetcher {
  clone(url: string, targetPath: string, options?: CloneOptions): Promise<ProcessRunResult>;
  fetchTags(repoPath: string, options?: ToolCallOptions): Promise<ProcessRunResult>;
  checkout(repoPath: string, ref: string, options?: ToolCallOptions): Promise<ProcessRunResult>;
  pull(repoPath: string, options?: ToolCallOptions): Promise<ProcessRunResult>;
  shortHead(repoPath: string, options?: ToolCallOptions): Promise<string | undefined>;
}

export function createGitFetcher(run: ProcessRunner = runProcess, gitCommand = "git"): RepositoryFetcher {
  const env = { GIT_TERMINAL_PROMPT: "0" };

  return {
    clone(url, targetPath, options = {}) {
      const args = ["clone"];
      if (options.recursive) {
        args.push("--recursive");
      }
      if (options.depth !== undefined) {
        args.push("--depth", String(options.depth));
      }
      args.push(url, targetPath);
      return run(gitCommand, args, { ...toRunOptions(options), env });
    },
    fetchTags(repoPath, options = {}) {
      return run(gitCommand, ["-C", repoPath, "fetch", "--tags"], { ...toRunOptions(options), env });
    },
    checkout(repoPath, ref, options = {}) {
      return run(gitCommand, ["-C", repoPath, "checkout", ref], toRunOptions(options));
    },
    pull(repoPath, options = {}) {
      return run(gitCommand, ["-C", repoPath, "pull", "--rebase", "--autostash"], { ...toRunOptions(options), env });
    },
    async shortHead(repoPath, options = {}) {
      const lines: string[] = [];
      const result = await run(gitCommand, ["-C", repoPath, "rev-parse", "--short", "HEAD"], {
        ...toRunOptions(options),
        onLine: (line) => lines.push(line)
      });
      const head = lines.find((line) => line.trim() !== "")?.trim();
      return result.exitCode === 0 ? head : undefined;
    }
  };
}

export function toRunOptions(options: ToolCallOptions): ToolCallOptions {
  return {
    logPath: options.logPath,
    timeoutMs: options.timeoutMs,
    signal: options.signal,
    onLine: options.onLine
  };
}
