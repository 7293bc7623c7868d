import type { ManifestEntry } from "../manifest/types.js";

export type ProvisionPhase = "fetch" | "install" | "import_probe";

export type OutcomeStatus = "ok" | "failed" | "warned";

export interface PhaseOutcome {
  readonly entry: ManifestEntry;
  readonly phase: ProvisionPhase;
  readonly status: OutcomeStatus;
  readonly logPath: string;
  readonly attempts?: number;
  /** Install only: no requirements file was present. */
  readonly skipped?: boolean;
  readonly error?: string;
}

export interface RunSummary {
  fetchFailures: number;
  installFailures: number;
  importWarnings: number;
  warnedNames: string[];
  failedFetches: string[];
  failedInstalls: string[];
  pluginCount: number;
  coreImportOk: boolean | undefined;
  exitCode: 0 | 2;
}

export function createOutcome(outcome: PhaseOutcome): PhaseOutcome {
  return Object.freeze({ ...outcome, entry: Object.freeze({ ...outcome.entry }) });
}

export type ProvisionEvent =
  | { type: "step"; message: string }
  | { type: "entry:start"; phase: ProvisionPhase; entry: ManifestEntry; attempt: number }
  | { type: "entry:retry"; phase: ProvisionPhase; entry: ManifestEntry; attempt: number; nextAttempt: number; error: string }
  | { type: "entry:output"; phase: ProvisionPhase; entry: ManifestEntry; line: string }
  | { type: "entry:done"; outcome: PhaseOutcome }
  | { type: "probe:core"; ok: boolean; detail?: string };
