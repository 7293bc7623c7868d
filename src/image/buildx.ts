import { runProcess, isSuccessfulRun, type ProcessRunner } from "../process/run.js";
import { ConfigurationError, toErrorMessage } from "../provision/errors.js";
import { createGitFetcher } from "../tools/git.js";

export interface ImageBuildOptions {
  image: string;
  tag: string;
  platform: string;
  target: string;
  context: string;
  push: boolean;
  load: boolean;
  noCache: boolean;
  prune: boolean;
  pruneHard: boolean;
  useSudo: boolean;
  imageVersion: string;
  buildDate?: string;
  vcsRef?: string;
  torchIndex: string;
  torchVersion: string;
  torchvisionVersion: string;
  comfyRef: string;
  extraBuildArgs: string[];
}

export type ResolvedImageBuildOptions = ImageBuildOptions & { buildDate: string; vcsRef: string };

export interface ImageBuildDeps {
  run: ProcessRunner;
  now: () => Date;
  resolveVcsRef: (context: string) => Promise<string | undefined>;
}

export interface ImageBuildResult {
  exitCode: number;
  reference: string;
  pushed: boolean;
}

export const BUILDER_NAME = "comfy-builder";

const defaultDeps: ImageBuildDeps = {
  run: runProcess,
  now: () => new Date(),
  resolveVcsRef: (context) => createGitFetcher().shortHead(context).catch(() => undefined)
};

export function imageReference(options: Pick<ImageBuildOptions, "image" | "tag">): string {
  return `${options.image}:${options.tag}`;
}

/** `buildx build` arguments; `--push` wins unless loading locally was requested. */
export function buildBuildxArgs(options: ResolvedImageBuildOptions): string[] {
  const buildArgs: Record<string, string> = {
    BUILD_DATE: options.buildDate,
    VCS_REF: options.vcsRef,
    IMAGE_VERSION: options.imageVersion,
    BUILD_GIT_SHA: options.vcsRef,
    IMAGE_TAG: options.tag,
    TORCH_INDEX: options.torchIndex,
    TORCH_VER: options.torchVersion,
    TORCHVISION_VER: options.torchvisionVersion,
    COMFYUI_REF: options.comfyRef
  };

  const args = ["buildx", "build", "-t", imageReference(options), "--platform", options.platform, "--target", options.target];
  for (const [key, value] of Object.entries(buildArgs)) {
    args.push("--build-arg", `${key}=${value}`);
  }

  if (options.noCache) {
    args.push("--no-cache");
  }

  args.push(options.push && !options.load ? "--push" : "--load");

  for (const extra of options.extraBuildArgs) {
    args.push("--build-arg", extra);
  }

  args.push(options.context);
  return args;
}

export function renderBuildSettings(options: ResolvedImageBuildOptions): string[] {
  return [
    `Image       : ${imageReference(options)}`,
    `Platform    : ${options.platform}`,
    `Push        : ${options.push && !options.load}`,
    `Load        : ${options.load}`,
    `No-cache    : ${options.noCache}`,
    `Prune       : ${options.prune}`,
    `Prune-hard  : ${options.pruneHard}`,
    `Build date  : ${options.buildDate}`,
    `VCS ref     : ${options.vcsRef}`,
    `Version     : ${options.imageVersion}`,
    "Pins        :",
    `  TORCH_INDEX     = ${options.torchIndex}`,
    `  TORCH_VER       = ${options.torchVersion}`,
    `  TORCHVISION_VER = ${options.torchvisionVersion}`,
    `  COMFYUI_REF     = ${options.comfyRef}`
  ];
}

export function formatBuildDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export async function resolveBuildOptions(
  options: ImageBuildOptions,
  deps: Partial<ImageBuildDeps> = {}
): Promise<ResolvedImageBuildOptions> {
  const now = deps.now ?? defaultDeps.now;
  const resolveVcsRef = deps.resolveVcsRef ?? defaultDeps.resolveVcsRef;

  return {
    ...options,
    buildDate: options.buildDate ?? formatBuildDate(now()),
    vcsRef: options.vcsRef ?? (await resolveVcsRef(options.context)) ?? "unknown"
  };
}

/**
 * Runs the image build: buildx availability check, optional prune, builder selection, then
 * `docker buildx build`. Prune and disk-usage steps are informational and never fail the build.
 */
export async function runImageBuild(
  options: ResolvedImageBuildOptions,
  onLine: (line: string) => void,
  deps: Partial<ImageBuildDeps> = {}
): Promise<ImageBuildResult> {
  const run = deps.run ?? defaultDeps.run;
  const docker = (args: string[]) => {
    return options.useSudo ? run("sudo", ["docker", ...args], { onLine }) : run("docker", args, { onLine });
  };
  const bestEffort = async (args: string[]): Promise<void> => {
    try {
      await docker(args);
    } catch (error) {
      onLine(`docker ${args.join(" ")} could not run: ${toErrorMessage(error)}`);
    }
  };

  const buildxVersion = await docker(["buildx", "version"]).catch(() => undefined);
  if (!buildxVersion || !isSuccessfulRun(buildxVersion)) {
    throw new ConfigurationError("docker buildx not available.");
  }

  if (options.pruneHard) {
    await bestEffort(["system", "prune", "-af"]);
  } else if (options.prune) {
    await bestEffort(["container", "prune", "-f"]);
    await bestEffort(["image", "prune", "-f"]);
    await bestEffort(["builder", "prune", "-f"]);
  }

  await bestEffort(["system", "df"]);

  const inspect = await docker(["buildx", "inspect"]).catch(() => undefined);
  if (!inspect || !isSuccessfulRun(inspect)) {
    const created = await docker(["buildx", "create", "--use", "--name", BUILDER_NAME]);
    if (!isSuccessfulRun(created)) {
      throw new Error(`Failed to create buildx builder '${BUILDER_NAME}'.`);
    }
  }

  const build = await docker(buildBuildxArgs(options));
  const pushed = options.push && !options.load;

  await bestEffort(["system", "df"]);

  return {
    exitCode: isSuccessfulRun(build) ? 0 : (build.exitCode ?? 1),
    reference: imageReference(options),
    pushed
  };
}
