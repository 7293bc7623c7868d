import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ConfigurationError, ManifestUnavailableError } from "../provision/errors.js";
import { parseManifest } from "./parse.js";
import type { Manifest } from "./types.js";

export const MANIFEST_COPY_FILENAME = "manifest.list";

export interface LoadManifestOptions {
  path?: string;
  url?: string;
  /** The manifest text is copied to `<workRoot>/manifest.list`. */
  workRoot: string;
  fetchText?: (url: string) => Promise<string>;
}

export interface LoadedManifest {
  manifest: Manifest;
  copyPath: string;
}

export async function loadManifest(options: LoadManifestOptions): Promise<LoadedManifest> {
  const path = options.path?.trim() ? options.path.trim() : undefined;
  const url = options.url?.trim() ? options.url.trim() : undefined;

  if (path === undefined && url === undefined) {
    throw new ConfigurationError("No manifest source configured. Set MANIFEST_PATH (preferred) or MANIFEST_URL.");
  }

  const source = path ?? url ?? "";
  const text = path !== undefined ? await readLocalManifest(path) : await readRemoteManifest(source, options.fetchText);

  const copyPath = join(options.workRoot, MANIFEST_COPY_FILENAME);
  await mkdir(dirname(copyPath), { recursive: true });
  await writeFile(copyPath, text, "utf8");

  if (text.trim() === "") {
    throw new ManifestUnavailableError(`Manifest empty: ${source}`);
  }

  return {
    manifest: parseManifest(source, text),
    copyPath
  };
}

async function readLocalManifest(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      throw new ManifestUnavailableError(`Manifest not found: ${path} (is it mounted?)`, { cause: error });
    }
    throw error;
  }
}

async function readRemoteManifest(url: string, fetchText: (url: string) => Promise<string> = fetchManifestText): Promise<string> {
  try {
    return await fetchText(url);
  } catch (error) {
    if (error instanceof ManifestUnavailableError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new ManifestUnavailableError(`Cannot download manifest from ${url}: ${detail}`, { cause: error });
  }
}

async function fetchManifestText(url: string): Promise<string> {
  const response = await fetch(url, { redirect: "follow" });
  if (!response.ok) {
    throw new ManifestUnavailableError(`Cannot download manifest from ${url}: HTTP ${response.status}`);
  }
  return response.text();
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
