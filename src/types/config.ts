/** Orchestrator settings: layered config system (base.yaml ← <env>.yaml ← WAB_* env vars). */
export type FailurePolicy = "stop-dispatch" | "continue";

export type OutputFormat = "human" | "jsonl";

export type BuildSettings = {
  max_concurrency: number;
  failure_policy: FailurePolicy;
  profile?: string;
};

export type OutputSettings = {
  format: OutputFormat;
  verbose: boolean;
};

export type BuilderConfig = {
  schema_version: string;
  build: BuildSettings;
  output: OutputSettings;
};
