import { describe, expect, it, vi } from "vitest";
import {
  buildBuildxArgs,
  formatBuildDate,
  renderBuildSettings,
  resolveBuildOptions,
  runImageBuild,
  type ImageBuildOptions,
  type ResolvedImageBuildOptions
} from "../src/image/buildx.js";
import type { ProcessRunResult, ProcessRunner } from "../src/process/run.js";

const ok: ProcessRunResult = { exitCode: 0, signal: null, timedOut: false, cancelled: false, recentOutput: [] };

const baseOptions: ImageBuildOptions = {
  image: "registry.example.test/comfy",
  tag: "t1",
  platform: "linux/amd64",
  target: "final",
  context: ".",
  push: true,
  load: false,
  noCache: false,
  prune: false,
  pruneHard: false,
  useSudo: false,
  imageVersion: "0.1.0",
  torchIndex: "https://download.example.test/whl/cu128",
  torchVersion: "2.10.0",
  torchvisionVersion: "0.25.0",
  comfyRef: "v0.9.2",
  extraBuildArgs: []
};

const resolved: ResolvedImageBuildOptions = {
  ...baseOptions,
  buildDate: "2026-01-02T03:04:05Z",
  vcsRef: "abc1234"
};

function scriptedDocker(responses: Record<string, ProcessRunResult> = {}) {
  return vi.fn<ProcessRunner>(async (command, args) => {
    const key = (command === "sudo" ? args.slice(1) : args).join(" ");
    return responses[key] ?? ok;
  });
}

describe("buildBuildxArgs", () => {
  it("passes pins as build args and pushes by default", () => {
    expect(buildBuildxArgs({ ...resolved, noCache: true, extraBuildArgs: ["EXTRA_PIP=xformers"] })).toEqual([
      "buildx",
      "build",
      "-t",
      "registry.example.test/comfy:t1",
      "--platform",
      "linux/amd64",
      "--target",
      "final",
      "--build-arg",
      "BUILD_DATE=2026-01-02T03:04:05Z",
      "--build-arg",
      "VCS_REF=abc1234",
      "--build-arg",
      "IMAGE_VERSION=0.1.0",
      "--build-arg",
      "BUILD_GIT_SHA=abc1234",
      "--build-arg",
      "IMAGE_TAG=t1",
      "--build-arg",
      "TORCH_INDEX=https://download.example.test/whl/cu128",
      "--build-arg",
      "TORCH_VER=2.10.0",
      "--build-arg",
      "TORCHVISION_VER=0.25.0",
      "--build-arg",
      "COMFYUI_REF=v0.9.2",
      "--no-cache",
      "--push",
      "--build-arg",
      "EXTRA_PIP=xformers",
      "."
    ]);
  });

  it("loads locally when asked to, even with push enabled", () => {
    const args = buildBuildxArgs({ ...resolved, load: true });

    expect(args).toContain("--load");
    expect(args).not.toContain("--push");
  });
});

describe("resolveBuildOptions", () => {
  it("fills the build date and vcs ref", async () => {
    const options = await resolveBuildOptions(baseOptions, {
      now: () => new Date("2026-03-04T05:06:07.890Z"),
      resolveVcsRef: async () => "def5678"
    });

    expect(options.buildDate).toBe("2026-03-04T05:06:07Z");
    expect(options.vcsRef).toBe("def5678");
  });

  it("keeps explicit values and falls back to unknown", async () => {
    const options = await resolveBuildOptions(
      { ...baseOptions, buildDate: "2025-12-31T00:00:00Z" },
      { resolveVcsRef: async () => undefined }
    );

    expect(options.buildDate).toBe("2025-12-31T00:00:00Z");
    expect(options.vcsRef).toBe("unknown");
  });

  it("formats dates without milliseconds", () => {
    expect(formatBuildDate(new Date("2026-01-02T03:04:05.678Z"))).toBe("2026-01-02T03:04:05Z");
  });
});

describe("renderBuildSettings", () => {
  it("shows the effective push mode and pins", () => {
    const lines = renderBuildSettings({ ...resolved, load: true });

    expect(lines[0]).toBe("Image       : registry.example.test/comfy:t1");
    expect(lines).toContain("Push        : false");
    expect(lines).toContain("  COMFYUI_REF     = v0.9.2");
  });
});

describe("runImageBuild", () => {
  it("prunes, creates a builder when none is usable and runs the build through sudo", async () => {
    const run = scriptedDocker({
      "buildx inspect": { ...ok, exitCode: 1 }
    });

    const result = await runImageBuild({ ...resolved, prune: true, useSudo: true }, () => {}, { run });

    expect(result).toEqual({ exitCode: 0, reference: "registry.example.test/comfy:t1", pushed: true });
    expect(run.mock.calls.map(([command, args]) => [command, ...args.slice(0, 4)].join(" "))).toEqual([
      "sudo docker buildx version",
      "sudo docker container prune -f",
      "sudo docker image prune -f",
      "sudo docker builder prune -f",
      "sudo docker system df",
      "sudo docker buildx inspect",
      "sudo docker buildx create --use",
      "sudo docker buildx build -t",
      "sudo docker system df"
    ]);
  });

  it("uses a single hard prune and skips builder creation when one exists", async () => {
    const run = scriptedDocker();

    await runImageBuild({ ...resolved, prune: true, pruneHard: true }, () => {}, { run });

    expect(run.mock.calls.map(([, args]) => args.slice(0, 3).join(" "))).toEqual([
      "buildx version",
      "system prune -af",
      "system df",
      "buildx inspect",
      "buildx build -t",
      "system df"
    ]);
  });

  it("returns the build exit code", async () => {
    const buildKey = buildBuildxArgs(resolved).join(" ");
    const run = scriptedDocker({ [buildKey]: { ...ok, exitCode: 17 } });

    const result = await runImageBuild(resolved, () => {}, { run });

    expect(result.exitCode).toBe(17);
  });

  it("fails when buildx is not available", async () => {
    const run = scriptedDocker({ "buildx version": { ...ok, exitCode: 1 } });

    await expect(runImageBuild(resolved, () => {}, { run })).rejects.toThrow("docker buildx not available.");
  });

  it("keeps going when a prune cannot run", async () => {
    const run = scriptedDocker();
    run.mockImplementation(async (_command, args) => {
      if (args[0] === "system" && args[1] === "prune") {
        throw new Error("Failed to start 'docker': permission denied");
      }
      return ok;
    });
    const lines: string[] = [];

    const result = await runImageBuild({ ...resolved, pruneHard: true }, (line) => lines.push(line), { run });

    expect(result.exitCode).toBe(0);
    expect(lines).toEqual(["docker system prune -af could not run: Failed to start 'docker': permission denied"]);
  });
});
