import { isAbsolute, win32 } from "node:path";
import { ManifestError } from "../provision/errors.js";
import type { Manifest, ManifestEntry } from "./types.js";

export const RECURSIVE_FLAG = "--recursive";

/**
 * Parses `<repository-url> <target-dir> [--recursive]` lines in source order.
 * Blank lines, `#` comments and lines with fewer than two fields are skipped; duplicates are kept.
 */
export function parseManifest(source: string, text: string): Manifest {
  const entries: ManifestEntry[] = [];
  const lines = text.split("\n");

  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.replace(/\r+$/, "");
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) {
      continue;
    }

    const [repositoryUrl, targetDir, flag] = trimmed.split(/\s+/);
    if (!repositoryUrl || !targetDir) {
      continue;
    }

    const problem = describeTargetDirProblem(targetDir);
    if (problem) {
      throw new ManifestError(
        `Invalid manifest entry at ${source}:${index + 1}: target directory '${targetDir}' ${problem}.`
      );
    }

    entries.push({
      repositoryUrl,
      targetDir,
      recursive: flag === RECURSIVE_FLAG,
      line: index + 1
    });
  }

  return { source, entries };
}

export function describeTargetDirProblem(targetDir: string): string | undefined {
  if (isAbsolute(targetDir) || win32.isAbsolute(targetDir)) {
    return "must be a relative path";
  }

  const segments = targetDir.split(/[\\/]+/).filter((segment) => segment !== "" && segment !== ".");
  if (segments.length === 0) {
    return "must name a directory below the custom nodes root";
  }

  if (segments.includes("..")) {
    return "must not contain '..' segments";
  }

  return undefined;
}
