export type CliCommandName = "sanity" | "build" | "start" | "help";

export interface CommandResult {
  message: string;
  exitCode?: number;
}
