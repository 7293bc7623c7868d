import { isHelpFlag } from "../utils/argv.js";
import type { CliCommandName } from "../types/index.js";

export interface ResolvedCliCommand {
  command: CliCommandName;
  args: string[];
}

export interface GlobalCliOptions {
  args: string[];
  verbose: boolean;
}

const commands = new Set<string>(["sanity", "build", "start", "help"]);

export function parseGlobalCliOptions(argv: string[]): GlobalCliOptions {
  let verbose = false;
  const args: string[] = [];

  for (const token of argv) {
    if (token === "--verbose") {
      verbose = true;
      continue;
    }

    args.push(token);
  }

  return { args, verbose };
}

export function resolveCliCommand(argv: string[]): ResolvedCliCommand {
  const [first, ...rest] = argv;

  if (!first || isHelpFlag(first) || rest.some(isHelpFlag)) {
    return { command: "help", args: [] };
  }

  if (isCliCommandName(first)) {
    return { command: first, args: rest };
  }

  throw new Error(`Unknown command: ${first}. Use --help for usage.`);
}

function isCliCommandName(value: string): value is CliCommandName {
  return commands.has(value);
}

export function renderHelp(): string {
  return [
    "comfy-provision CLI",
    "",
    "Usage:",
    "  comfy-provision <command> [options]",
    "",
    "Local development usage:",
    "  npm run dev -- <command> [options]",
    "",
    "Config resolution:",
    "  defaults -> ./provision.config.toml (or COMFY_PROVISION_CONFIG) -> environment/.env -> flags",
    "",
    "Commands:",
    "  sanity   Clone ComfyUI and every manifest entry, install requirements, probe imports",
    "  build    Build (and push) the container image with docker buildx",
    "  start    Sync the runtime repository, install its dotfiles and run its start.sh",
    "",
    "Sanity options:",
    "  --comfy-ref <ref>         ComfyUI git ref to check out",
    "  --manifest <path>         Manifest file (preferred over --manifest-url)",
    "  --manifest-url <url>      Manifest download URL",
    "  --constraints <path>      pip constraints file applied to every install",
    "  --work-root <dir>         Work root (run/, logs/ and manifest.list live here)",
    "  --concurrency <n>         Parallel fetch/install lanes (default 1)",
    "  --fetch-retries <n>       Extra clone attempts per entry (default 0)",
    "",
    "Build options:",
    "  --no-push | --load        Keep the image local (--load implies --no-push)",
    "  --platform <p>            Target platform (default linux/amd64)",
    "  --tag <t> --image <name>  Image reference parts",
    "  --image-version <v>       IMAGE_VERSION build arg",
    "  --build-date <iso>        BUILD_DATE build arg (default now, UTC)",
    "  --vcs-ref <sha>           VCS_REF build arg (default git short HEAD)",
    "  --torch <v> --torchvision <v> --torch-index <url>",
    "                            Torch pins passed as build args",
    "  --comfy-ref <ref>         COMFYUI_REF build arg",
    "  --build-arg KEY=VALUE     Extra build arg (repeatable)",
    "  --context <dir>           Build context (default .)",
    "  --no-cache --prune --prune-hard --sudo",
    "",
    "Options:",
    "  --config <path>           Config file for any command",
    "  --verbose                 Echo tool output and detailed progress",
    "  -h, --help                Show help"
  ].join("\n");
}
