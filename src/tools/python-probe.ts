import { runProcess, type ProcessRunner } from "../process/run.js";
import type { ToolCallOptions } from "./git.js";

const IMPORTED_MARKER = "[IMPORTED] ";
const FAILED_MARKER = "[FAIL] ";

// argv: <sys.path root> <module> [<module> ...]; stops at the first module that imports.
const PROBE_SCRIPT = [
  "import importlib, sys",
  "sys.path.insert(0, sys.argv[1])",
  "for name in sys.argv[2:]:",
  "    try:",
  "        importlib.import_module(name)",
  "    except Exception as exc:",
  "        detail = str(exc).splitlines()[0] if str(exc) else ''",
  "        print('[FAIL] ' + name + ': ' + type(exc).__name__ + (': ' + detail if detail else ''), flush=True)",
  "        continue",
  "    print('[IMPORTED] ' + name, flush=True)",
  "    sys.exit(0)",
  "sys.exit(1)"
].join("\n");

export interface ImportProbeResult {
  importedModule: string | undefined;
  failures: string[];
  timedOut: boolean;
  cancelled: boolean;
}

/** Attempts module imports with the application directory on the interpreter's path. */
export interface ImportProbeHost {
  probe(rootDir: string, modules: string[], options?: ToolCallOptions): Promise<ImportProbeResult>;
}

export function createPythonImportProbe(python: string, run: ProcessRunner = runProcess): ImportProbeHost {
  return {
    async probe(rootDir, modules, options = {}) {
      const failures: string[] = [];
      let importedModule: string | undefined;

      const result = await run(python, ["-c", PROBE_SCRIPT, rootDir, ...modules], {
        cwd: rootDir,
        env: { PYTHONDONTWRITEBYTECODE: "1" },
        timeoutMs: options.timeoutMs,
        signal: options.signal,
        logPath: options.logPath,
        onLine: (line) => {
          options.onLine?.(line);
          if (line.startsWith(IMPORTED_MARKER)) {
            importedModule = line.slice(IMPORTED_MARKER.length).trim();
          } else if (line.startsWith(FAILED_MARKER)) {
            failures.push(line.slice(FAILED_MARKER.length).trim());
          }
        }
      });

      const succeeded = result.exitCode === 0 && !result.timedOut && !result.cancelled;
      return {
        importedModule: succeeded ? importedModule : undefined,
        failures,
        timedOut: result.timedOut,
        cancelled: result.cancelled
      };
    }
  };
}
