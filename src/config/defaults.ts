import type { ResolvedProvisionConfig } from "./schema.js";

export const defaultConfig: ResolvedProvisionConfig = {
  app: {
    repo_url: "https://github.com/comfyanonymous/ComfyUI.git",
    ref: "v0.9.2",
    dir_name: "ComfyUI",
    requirements_exclude: ["torchaudio"]
  },
  manifest: {
    path: "",
    url: ""
  },
  install: {
    python: "python",
    constraints_path: "",
    requirements_file: "requirements.txt"
  },
  run: {
    work_root: "/workspace",
    concurrency: 1,
    fetch_timeout_ms: 10 * 60 * 1000,
    install_timeout_ms: 30 * 60 * 1000,
    probe_timeout_ms: 2 * 60 * 1000,
    fetch_retries: 0,
    retry_delay_ms: 2_000,
    probe_candidate_limit: 50
  },
  build: {
    image: "comfyui-inference",
    tag: "latest",
    platform: "linux/amd64",
    target: "final",
    context: ".",
    push: true,
    use_sudo: false,
    image_version: "0.1.0",
    torch_index: "https://download.pytorch.org/whl/nightly/cu128",
    torch_version: "2.10.0.dev20251202+cu128",
    torchvision_version: "0.25.0.dev20251202+cu128"
  },
  runtime: {
    repo_url: "https://github.com/example/pod-runtime.git",
    dir: "/workspace/pod-runtime",
    home_dir: ""
  }
};
