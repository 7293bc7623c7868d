import { rm } from "node:fs/promises";
import type { ManifestEntry } from "../manifest/types.js";
import { describeRunFailure, isSuccessfulRun } from "../process/run.js";
import { resolveRetryPolicy, withRetry, type RetryPolicy, type SleepFn } from "../process/retry.js";
import type { RepositoryFetcher } from "../tools/git.js";
import { FetchError, RunCancelledError, isRunCancelledError, toErrorMessage } from "./errors.js";
import { entryLogPath, entryPath, topLevelDirectory, type RunLayout } from "./layout.js";
import { mapInLanes } from "./pool.js";
import { createOutcome, type PhaseOutcome, type ProvisionEvent } from "./types.js";

export interface FetchPhaseOptions {
  layout: RunLayout;
  fetcher: RepositoryFetcher;
  concurrency?: number;
  timeoutMs?: number;
  retryPolicy?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  sleep?: SleepFn;
  onEvent?: (event: ProvisionEvent) => void;
}

/**
 * Clones every entry into `<customNodesRoot>/<targetDir>`, replacing whatever was there.
 * A failing entry is recorded and the phase moves on.
 */
export async function runFetchPhase(entries: readonly ManifestEntry[], options: FetchPhaseOptions): Promise<PhaseOutcome[]> {
  const retryPolicy = resolveRetryPolicy(options.retryPolicy);

  return mapInLanes(
    entries,
    options.concurrency ?? 1,
    (entry) => topLevelDirectory(entry.targetDir),
    (entry) => fetchEntry(entry, retryPolicy, options)
  );
}

async function fetchEntry(entry: ManifestEntry, retryPolicy: RetryPolicy, options: FetchPhaseOptions): Promise<PhaseOutcome> {
  const targetPath = entryPath(options.layout, entry.targetDir);
  const logPath = entryLogPath(options.layout, "fetch", entry.targetDir);
  let attempts = 0;
  let outcome: PhaseOutcome;

  try {
    await withRetry(
      async (attempt) => {
        if (options.signal?.aborted) {
          throw new RunCancelledError();
        }

        attempts = attempt;
        options.onEvent?.({ type: "entry:start", phase: "fetch", entry, attempt });
        await rm(targetPath, { recursive: true, force: true });

        const result = await options.fetcher.clone(entry.repositoryUrl, targetPath, {
          recursive: entry.recursive,
          logPath,
          timeoutMs: options.timeoutMs,
          signal: options.signal,
          onLine: (line) => options.onEvent?.({ type: "entry:output", phase: "fetch", entry, line })
        });

        if (result.cancelled) {
          throw new RunCancelledError();
        }
        if (!isSuccessfulRun(result)) {
          throw new FetchError(describeRunFailure("git clone", result));
        }
      },
      retryPolicy,
      {
        sleep: options.sleep,
        signal: options.signal,
        onRetry: (error, attempt, nextAttempt) => {
          options.onEvent?.({
            type: "entry:retry",
            phase: "fetch",
            entry,
            attempt,
            nextAttempt,
            error: toErrorMessage(error)
          });
        }
      }
    );

    outcome = createOutcome({ entry, phase: "fetch", status: "ok", logPath, attempts });
  } catch (error) {
    outcome = createOutcome({
      entry,
      phase: "fetch",
      status: "failed",
      logPath,
      attempts,
      error: isRunCancelledError(error) ? "cancelled" : toErrorMessage(error)
    });
  }

  options.onEvent?.({ type: "entry:done", outcome });
  return outcome;
}
