export interface ResolvedProvisionConfig {
  app: {
    repo_url: string;
    ref: string;
    dir_name: string;
    requirements_exclude: string[];
  };
  manifest: {
    path: string;
    url: string;
  };
  install: {
    python: string;
    constraints_path: string;
    requirements_file: string;
  };
  run: {
    work_root: string;
    concurrency: number;
    fetch_timeout_ms: number;
    install_timeout_ms: number;
    probe_timeout_ms: number;
    fetch_retries: number;
    retry_delay_ms: number;
    probe_candidate_limit: number;
  };
  build: {
    image: string;
    tag: string;
    platform: string;
    target: string;
    context: string;
    push: boolean;
    use_sudo: boolean;
    image_version: string;
    torch_index: string;
    torch_version: string;
    torchvision_version: string;
  };
  runtime: {
    repo_url: string;
    dir: string;
    home_dir: string;
  };
}
