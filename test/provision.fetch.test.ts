import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi, type Mock } from "vitest";
import type { ManifestEntry } from "../src/manifest/types.js";
import { runProcess, type ProcessRunResult } from "../src/process/run.js";
import { runFetchPhase } from "../src/provision/fetch.js";
import { resolveRunLayout, type RunLayout } from "../src/provision/layout.js";
import type { ProvisionEvent } from "../src/provision/types.js";
import type { RepositoryFetcher } from "../src/tools/git.js";

const ok: ProcessRunResult = { exitCode: 0, signal: null, timedOut: false, cancelled: false, recentOutput: [] };
const notFound: ProcessRunResult = {
  exitCode: 128,
  signal: null,
  timedOut: false,
  cancelled: false,
  recentOutput: ["fatal: repository not found"]
};

function entry(targetDir: string, recursive = false, line = 1): ManifestEntry {
  return { repositoryUrl: `https://example.test/${targetDir}.git`, targetDir, recursive, line };
}

type FakeFetcher = RepositoryFetcher & { clone: Mock<RepositoryFetcher["clone"]> };

function createFetcher(failing: Map<string, number> = new Map()): FakeFetcher {
  const clone = vi.fn<RepositoryFetcher["clone"]>(async (url, targetPath) => {
    const remaining = failing.get(url) ?? 0;
    if (remaining > 0) {
      failing.set(url, remaining - 1);
      return notFound;
    }
    await mkdir(targetPath, { recursive: true });
    await writeFile(join(targetPath, "cloned.txt"), url, "utf8");
    return ok;
  });

  return {
    clone,
    fetchTags: vi.fn(async () => ok),
    checkout: vi.fn(async () => ok),
    pull: vi.fn(async () => ok),
    shortHead: vi.fn(async () => "abc1234")
  };
}

describe("runFetchPhase", () => {
  const tempRoots: string[] = [];

  async function createLayout(): Promise<RunLayout> {
    const root = await mkdtemp(join(tmpdir(), "comfy-provision-fetch-"));
    tempRoots.push(root);
    const layout = resolveRunLayout(root, "ComfyUI");
    await mkdir(layout.customNodesRoot, { recursive: true });
    return layout;
  }

  afterEach(async () => {
    await Promise.all(tempRoots.map((dir) => rm(dir, { recursive: true, force: true })));
    tempRoots.length = 0;
  });

  it("isolates failures per entry and honours the recursive flag", async () => {
    const layout = await createLayout();
    const fetcher = createFetcher(new Map([["https://example.test/nodeB.git", 1]]));

    const outcomes = await runFetchPhase([entry("nodeA"), entry("nodeB", false, 2), entry("nodeC", true, 3)], {
      layout,
      fetcher
    });

    expect(outcomes.map((outcome) => [outcome.entry.targetDir, outcome.status, outcome.attempts])).toEqual([
      ["nodeA", "ok", 1],
      ["nodeB", "failed", 1],
      ["nodeC", "ok", 1]
    ]);
    expect(outcomes[1]?.error).toBe("'git clone' exited with code 128: fatal: repository not found");
    expect(outcomes[1]?.logPath).toBe(join(layout.logDir, "fetch_nodeB.log"));
    expect(fetcher.clone.mock.calls[2]?.[2]?.recursive).toBe(true);
    expect(fetcher.clone.mock.calls[0]?.[2]?.recursive).toBe(false);
    expect(Object.isFrozen(outcomes[0])).toBe(true);
  });

  it("removes an existing checkout before cloning again", async () => {
    const layout = await createLayout();
    const target = join(layout.customNodesRoot, "nodeA");
    await mkdir(target, { recursive: true });
    await writeFile(join(target, "stale.txt"), "old", "utf8");

    await runFetchPhase([entry("nodeA")], { layout, fetcher: createFetcher() });

    await expect(readdir(target)).resolves.toEqual(["cloned.txt"]);
  });

  it("retries a failed clone within the retry policy", async () => {
    const layout = await createLayout();
    const fetcher = createFetcher(new Map([["https://example.test/nodeA.git", 1]]));
    const events: ProvisionEvent[] = [];

    const outcomes = await runFetchPhase([entry("nodeA")], {
      layout,
      fetcher,
      retryPolicy: { attempts: 2, delayMs: 0 },
      onEvent: (event) => events.push(event)
    });

    expect(outcomes[0]?.status).toBe("ok");
    expect(outcomes[0]?.attempts).toBe(2);
    expect(events.map((event) => event.type)).toEqual(["entry:start", "entry:retry", "entry:start", "entry:done"]);
  });

  it("records a clone that could not start as a failure", async () => {
    const layout = await createLayout();
    const fetcher = createFetcher();
    fetcher.clone.mockRejectedValueOnce(new Error("Failed to start 'git': spawn git ENOENT"));

    const outcomes = await runFetchPhase([entry("nodeA"), entry("nodeB")], { layout, fetcher });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["failed", "ok"]);
    expect(outcomes[0]?.error).toBe("Failed to start 'git': spawn git ENOENT");
  });

  it("records an unwritable log as that entry's failure and moves on", async () => {
    const layout = await createLayout();
    const blockedLog = join(layout.logDir, "fetch_nodeA.log");
    await mkdir(blockedLog, { recursive: true });
    const fetcher = createFetcher();
    fetcher.clone.mockImplementationOnce((url, targetPath, options) =>
      runProcess("git", ["clone", url, targetPath], { logPath: options?.logPath })
    );

    const outcomes = await runFetchPhase([entry("nodeA"), entry("nodeB", false, 2)], { layout, fetcher });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["failed", "ok"]);
    expect(outcomes[0]?.error).toContain(`Cannot open log file '${blockedLog}': EISDIR`);
  });

  it("marks every entry cancelled once the run is aborted", async () => {
    const layout = await createLayout();
    const fetcher = createFetcher();
    const controller = new AbortController();
    controller.abort();

    const outcomes = await runFetchPhase([entry("nodeA"), entry("nodeB")], {
      layout,
      fetcher,
      signal: controller.signal
    });

    expect(fetcher.clone).not.toHaveBeenCalled();
    expect(outcomes.map((outcome) => [outcome.status, outcome.error])).toEqual([
      ["failed", "cancelled"],
      ["failed", "cancelled"]
    ]);
  });

  it("clones distinct entries concurrently and keeps manifest order", async () => {
    const layout = await createLayout();
    const fetcher = createFetcher();

    const outcomes = await runFetchPhase([entry("nodeA"), entry("nodeB"), entry("nodeC")], {
      layout,
      fetcher,
      concurrency: 3
    });

    expect(outcomes.map((outcome) => outcome.entry.targetDir)).toEqual(["nodeA", "nodeB", "nodeC"]);
    expect(outcomes.every((outcome) => outcome.status === "ok")).toBe(true);
  });

  it.each([1, 3])("leaves one directory per target with the last duplicate's source (concurrency %i)", async (concurrency) => {
    const layout = await createLayout();
    const first = { ...entry("x"), repositoryUrl: "https://example.test/first.git" };
    const last = { ...entry("x", false, 3), repositoryUrl: "https://example.test/last.git" };

    const outcomes = await runFetchPhase([first, entry("y", false, 2), last], {
      layout,
      fetcher: createFetcher(),
      concurrency
    });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["ok", "ok", "ok"]);
    expect((await readdir(layout.customNodesRoot)).sort()).toEqual(["x", "y"]);
    await expect(readFile(join(layout.customNodesRoot, "x", "cloned.txt"), "utf8")).resolves.toBe(
      "https://example.test/last.git"
    );
  });

  it("clones nested target directories after their parent even with spare lanes", async () => {
    const layout = await createLayout();
    const fetcher = createFetcher();
    // Like git, refuse to clone into a non-empty destination.
    fetcher.clone.mockImplementation(async (url, targetPath) => {
      if (url.endsWith("/a.git")) {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      const existing = await readdir(targetPath).catch((): string[] => []);
      if (existing.length > 0) {
        return { ...notFound, recentOutput: [`fatal: destination path '${targetPath}' already exists and is not an empty directory.`] };
      }
      await mkdir(targetPath, { recursive: true });
      await writeFile(join(targetPath, "cloned.txt"), url, "utf8");
      return ok;
    });

    const outcomes = await runFetchPhase([entry("a"), entry("a/b", false, 2)], { layout, fetcher, concurrency: 2 });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["ok", "ok"]);
    expect((await readdir(join(layout.customNodesRoot, "a"))).sort()).toEqual(["b", "cloned.txt"]);
  });
});
