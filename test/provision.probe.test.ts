import { mkdir, mkdtemp, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { ManifestEntry } from "../src/manifest/types.js";
import { resolveRunLayout, type RunLayout } from "../src/provision/layout.js";
import { buildImportCandidates, listPluginDirectories, runImportProbePhase } from "../src/provision/probe.js";
import type { ImportProbeHost, ImportProbeResult } from "../src/tools/python-probe.js";

function entry(targetDir: string, line: number): ManifestEntry {
  return { repositoryUrl: `https://example.test/${targetDir}.git`, targetDir, recursive: false, line };
}

function imported(module: string): ImportProbeResult {
  return { importedModule: module, failures: [], timedOut: false, cancelled: false };
}

function failed(...failures: string[]): ImportProbeResult {
  return { importedModule: undefined, failures, timedOut: false, cancelled: false };
}

describe("import probe phase", () => {
  const tempRoots: string[] = [];

  async function createLayout(files: string[]): Promise<RunLayout> {
    const root = await mkdtemp(join(tmpdir(), "comfy-provision-probe-"));
    tempRoots.push(root);
    const layout = resolveRunLayout(root, "ComfyUI");
    await mkdir(layout.customNodesRoot, { recursive: true });
    await mkdir(layout.logDir, { recursive: true });
    for (const file of files) {
      const path = join(layout.customNodesRoot, file);
      if (file.endsWith("/")) {
        await mkdir(path, { recursive: true });
        continue;
      }
      await mkdir(join(path, ".."), { recursive: true });
      await writeFile(path, "", "utf8");
    }
    return layout;
  }

  afterEach(async () => {
    await Promise.all(tempRoots.map((dir) => rm(dir, { recursive: true, force: true })));
    tempRoots.length = 0;
  });

  it("lists plugin directories sorted, without hidden and cache directories", async () => {
    const layout = await createLayout(["b/", "a/", ".git/", "__pycache__/", "loose.py"]);

    await expect(listPluginDirectories(layout.customNodesRoot)).resolves.toEqual(["a", "b"]);
    await expect(listPluginDirectories(join(layout.workRoot, "missing"))).resolves.toEqual([]);
  });

  it("follows symlinked plugin directories and package initializers", async () => {
    const layout = await createLayout(["local/"]);
    const shared = join(layout.workRoot, "shared");
    await mkdir(join(shared, "linked-node"), { recursive: true });
    await writeFile(join(shared, "linked-node", "nodes.py"), "", "utf8");
    await writeFile(join(shared, "init.py"), "", "utf8");
    await symlink(join(shared, "linked-node"), join(layout.customNodesRoot, "linked"));
    await symlink(join(shared, "gone"), join(layout.customNodesRoot, "dangling"));
    await symlink(join(shared, "init.py"), join(layout.customNodesRoot, "local", "__init__.py"));

    await expect(listPluginDirectories(layout.customNodesRoot)).resolves.toEqual(["linked", "local"]);
    await expect(buildImportCandidates(join(layout.customNodesRoot, "linked"), "linked", 50)).resolves.toEqual([
      "custom_nodes.linked.nodes"
    ]);
    await expect(buildImportCandidates(join(layout.customNodesRoot, "local"), "local", 50)).resolves.toEqual([
      "custom_nodes.local"
    ]);
  });

  it("prefers the package itself when it has an __init__.py", async () => {
    const layout = await createLayout(["pkg/__init__.py", "pkg/helpers.py", "flat/b.py", "flat/a.py", "flat/c.py", "flat/README.md"]);

    await expect(buildImportCandidates(join(layout.customNodesRoot, "pkg"), "pkg", 50)).resolves.toEqual([
      "custom_nodes.pkg"
    ]);
    await expect(buildImportCandidates(join(layout.customNodesRoot, "flat"), "flat", 2)).resolves.toEqual([
      "custom_nodes.flat.a",
      "custom_nodes.flat.b"
    ]);
  });

  it("probes every plugin directory, warns on failures and writes the report", async () => {
    const layout = await createLayout([
      "pkgA/__init__.py",
      "scripts/b.py",
      "scripts/a.py",
      "gpuNode/__init__.py",
      "empty/",
      "extraNode/__init__.py"
    ]);
    const host: ImportProbeHost = {
      probe: vi.fn(async (_root: string, modules: string[]) => {
        if (modules[0] === "custom_nodes.gpuNode") {
          return failed("custom_nodes.gpuNode: RuntimeError: CUDA unavailable");
        }
        return imported(modules[0] ?? "");
      })
    };

    const report = await runImportProbePhase(
      [entry("pkgA", 1), entry("scripts", 2), entry("gpuNode", 3), entry("empty", 4)],
      { layout, host, appName: "ComfyUI", candidateLimit: 50 }
    );

    expect(report.pluginCount).toBe(5);
    expect(report.coreImportOk).toBe(true);
    expect(report.warnedNames).toEqual(["empty", "gpuNode"]);
    expect(report.outcomes.map((outcome) => [outcome.entry.targetDir, outcome.status])).toEqual([
      ["empty", "warned"],
      ["extraNode", "ok"],
      ["gpuNode", "warned"],
      ["pkgA", "ok"],
      ["scripts", "ok"]
    ]);
    expect(report.outcomes[1]?.entry).toEqual({ repositoryUrl: "", targetDir: "extraNode", recursive: false, line: 0 });
    expect(report.outcomes[2]?.error).toBe("custom_nodes.gpuNode: RuntimeError: CUDA unavailable");
    expect(host.probe).toHaveBeenCalledWith(layout.appDir, ["custom_nodes.scripts.a", "custom_nodes.scripts.b"], expect.anything());

    await expect(readFile(layout.importReportPath, "utf8")).resolves.toBe(
      [
        "[OK] import ComfyUI nodes",
        "[WARN] empty (import failed; could be GPU-only or missing deps)",
        "       no importable modules found",
        "[OK]  extraNode",
        "[WARN] gpuNode (import failed; could be GPU-only or missing deps)",
        "       custom_nodes.gpuNode: RuntimeError: CUDA unavailable",
        "[OK]  pkgA",
        "[OK]  scripts",
        "",
        "Summary:",
        "  custom_nodes total: 5",
        "  warnings: 2",
        "  warn list: empty, gpuNode",
        ""
      ].join("\n")
    );
  });

  it("reports a core import failure without failing plugins", async () => {
    const layout = await createLayout(["pkgA/__init__.py"]);
    const host: ImportProbeHost = {
      probe: vi.fn(async (_root: string, modules: string[]) =>
        modules[0] === "nodes" ? failed("nodes: ModuleNotFoundError: No module named 'torch'") : imported(modules[0] ?? "")
      )
    };

    const report = await runImportProbePhase([entry("pkgA", 1)], { layout, host, appName: "ComfyUI", candidateLimit: 50 });

    expect(report.coreImportOk).toBe(false);
    expect(report.warnedNames).toEqual([]);
    const text = await readFile(layout.importReportPath, "utf8");
    expect(text.split("\n")[0]).toBe("[WARN] import ComfyUI nodes failed: nodes: ModuleNotFoundError: No module named 'torch'");
  });

  it("turns a probe host error into a warning", async () => {
    const layout = await createLayout(["pkgA/__init__.py"]);
    const host: ImportProbeHost = {
      probe: vi.fn(async (_root: string, modules: string[]) => {
        if (modules[0] === "nodes") {
          return imported("nodes");
        }
        throw new Error("Failed to start 'python': spawn python ENOENT");
      })
    };

    const report = await runImportProbePhase([entry("pkgA", 1)], { layout, host, appName: "ComfyUI", candidateLimit: 50 });

    expect(report.outcomes[0]).toMatchObject({
      status: "warned",
      error: "Failed to start 'python': spawn python ENOENT"
    });
  });
});
