import { runProcess, type ProcessRunner, type ProcessRunResult } from "../process/run.js";
import { toRunOptions, type ToolCallOptions } from "./git.js";

export interface InstallCallOptions extends ToolCallOptions {
  constraintsPath?: string;
}

/** The dependency installer: a requirements file plus an optional shared constraints file. */
export interface DependencyInstaller {
  install(requirementsPath: string, options?: InstallCallOptions): Promise<ProcessRunResult>;
  check(options?: ToolCallOptions): Promise<ProcessRunResult>;
}

export function buildPipInstallArgs(requirementsPath: string, constraintsPath?: string): string[] {
  const args = ["-m", "pip", "install"];
  if (constraintsPath) {
    args.push("-c", constraintsPath);
  }
  args.push("-r", requirementsPath);
  return args;
}

export function createPipInstaller(python: string, run: ProcessRunner = runProcess): DependencyInstaller {
  const env = {
    PIP_DISABLE_PIP_VERSION_CHECK: "1",
    PIP_NO_INPUT: "1"
  };

  return {
    install(requirementsPath, options = {}) {
      return run(python, buildPipInstallArgs(requirementsPath, options.constraintsPath), {
        ...toRunOptions(options),
        env
      });
    },
    check(options = {}) {
      return run(python, ["-m", "pip", "check"], { ...toRunOptions(options), env });
    }
  };
}
