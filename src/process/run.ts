import { spawn } from "node:child_process";
import { once } from "node:events";
import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

const KILL_GRACE_MS = 5_000;
const RECENT_OUTPUT_LINES = 20;

export interface ProcessRunOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Combined stdout/stderr is written here, replacing any previous log. */
  logPath?: string;
  onLine?: (line: string) => void;
}

export interface ProcessRunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  cancelled: boolean;
  recentOutput: string[];
}

export type ProcessRunner = (command: string, args: string[], options?: ProcessRunOptions) => Promise<ProcessRunResult>;

export const runProcess: ProcessRunner = async (command, args, options = {}) => {
  if (options.signal?.aborted) {
    return { exitCode: null, signal: null, timedOut: false, cancelled: true, recentOutput: [] };
  }

  const logStream = options.logPath ? await openLogStream(options.logPath) : undefined;
  const logFailure: { error?: Error } = {};
  logStream?.on("error", (error: Error) => {
    logFailure.error ??= error;
  });
  logStream?.write(`$ ${formatCommandLine(command, args)}\n`);

  let result: ProcessRunResult;
  try {
    result = await new Promise<ProcessRunResult>((resolve, reject) => {
      const recentOutput: string[] = [];
      let timedOut = false;
      let cancelled = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...(options.env ?? {}) },
        stdio: ["ignore", "pipe", "pipe"]
      });

      const terminate = (): void => {
        if (child.exitCode !== null || child.signalCode !== null) {
          return;
        }

        child.kill("SIGTERM");
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill("SIGKILL");
          }
        }, KILL_GRACE_MS);
        killTimer.unref();
      };

      const timeout =
        options.timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              timedOut = true;
              logStream?.write(`\n[timed out after ${options.timeoutMs}ms]\n`);
              terminate();
            }, options.timeoutMs);

      const onAbort = (): void => {
        cancelled = true;
        logStream?.write("\n[cancelled]\n");
        terminate();
      };
      options.signal?.addEventListener("abort", onAbort, { once: true });

      const cleanup = (): void => {
        settled = true;
        if (timeout) {
          clearTimeout(timeout);
        }
        if (killTimer) {
          clearTimeout(killTimer);
        }
        options.signal?.removeEventListener("abort", onAbort);
      };

      const onLine = (line: string): void => {
        logStream?.write(`${line}\n`);
        pushRecentOutput(recentOutput, line);
        options.onLine?.(line);
      };
      const flushStdout = attachLineReader(child.stdout, onLine);
      const flushStderr = attachLineReader(child.stderr, onLine);

      child.once("error", (error: Error) => {
        if (settled) {
          return;
        }
        cleanup();
        logStream?.write(`[failed to start: ${error.message}]\n`);
        reject(new Error(`Failed to start '${command}': ${error.message}`, { cause: error }));
      });

      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) {
          return;
        }
        cleanup();
        flushStdout();
        flushStderr();
        resolve({ exitCode: code, signal, timedOut, cancelled, recentOutput });
      });
    });
  } finally {
    await closeLogStream(logStream);
  }

  if (logFailure.error) {
    throw new Error(`Cannot write log file '${options.logPath}': ${logFailure.error.message}`, {
      cause: logFailure.error
    });
  }
  return result;
};

export function isSuccessfulRun(result: ProcessRunResult): boolean {
  return result.exitCode === 0 && !result.timedOut && !result.cancelled;
}

export function describeRunFailure(command: string, result: ProcessRunResult): string {
  if (result.cancelled) {
    return `'${command}' was cancelled`;
  }

  if (result.timedOut) {
    return `'${command}' timed out`;
  }

  const status =
    result.exitCode === null ? `was killed by ${result.signal ?? "an unknown signal"}` : `exited with code ${result.exitCode}`;
  const lastLine = result.recentOutput.at(-1);
  return lastLine === undefined ? `'${command}' ${status}` : `'${command}' ${status}: ${lastLine}`;
}

export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : quoteShellArg(part))).join(" ");
}

function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

function attachLineReader(stream: NodeJS.ReadableStream | null, onLine: (line: string) => void): () => void {
  if (!stream) {
    return () => {};
  }

  stream.setEncoding("utf8");
  let buffer = "";

  stream.on("data", (chunk: string) => {
    buffer += chunk;
    const lines = buffer.split(/\r?\n/);
    buffer = lines.pop() ?? "";

    for (const line of lines) {
      onLine(line);
    }
  });

  return () => {
    if (buffer !== "") {
      onLine(buffer);
      buffer = "";
    }
  };
}

function pushRecentOutput(recentOutput: string[], line: string): void {
  const normalized = line.trim();
  if (normalized === "") {
    return;
  }

  recentOutput.push(normalized);
  if (recentOutput.length > RECENT_OUTPUT_LINES) {
    recentOutput.shift();
  }
}

/** Resolves once the file is open; an open failure rejects instead of surfacing as a stream `error` event. */
async function openLogStream(logPath: string): Promise<WriteStream> {
  await mkdir(dirname(logPath), { recursive: true });
  const stream = createWriteStream(logPath, { flags: "w", encoding: "utf8" });
  try {
    await once(stream, "open");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot open log file '${logPath}': ${detail}`, { cause: error });
  }
  return stream;
}

async function closeLogStream(stream: WriteStream | undefined): Promise<void> {
  if (!stream || stream.destroyed) {
    return;
  }

  await new Promise<void>((resolve) => {
    stream.end(() => resolve());
  });
}
