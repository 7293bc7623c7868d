export interface ManifestEntry {
  repositoryUrl: string;
  /** Relative to the custom nodes root; never escapes it. */
  targetDir: string;
  recursive: boolean;
  /** 1-based source line, 0 for entries that did not come from a manifest file. */
  line: number;
}

export interface Manifest {
  source: string;
  entries: ManifestEntry[];
}
