import type { ArtifactStore } from '../artifacts/store.js';
import type { Settings } from '../workspace/types.js';

export type RunStatus = 'completed' | 'dry_run' | 'disabled' | 'failed';

export interface StepSpec {
  id: string;
  handler_key: string;
  /** One artifact, or named artifacts, produced by earlier steps. */
  input_from?: string | Record<string, string>;
  output: string;
  config?: Record<string, unknown>;
}

export interface StepPlan {
  pipeline: string;
  steps: StepSpec[];
}

/** What a handler returns under dry-run instead of writing anything. */
export interface PlannedArtifacts {
  output_path: string;
  planned_paths: string[];
  dry_run: true;
}

export interface RunContext {
  runId: string;
  /** Root-relative run directory, `output/<runId>`. */
  runDir: string;
  store: ArtifactStore;
  dryRun: boolean;
  params: Record<string, unknown>;
  settings: Settings;
}

export type StepOutput = string | PlannedArtifacts;

export type StepHandler = (step: StepSpec, run: RunContext) => Promise<StepOutput>;

export interface StepResult {
  id: string;
  handler_key: string;
  status: 'ok' | 'error';
  output?: string;
  planned_paths?: string[];
  error?: string;
}

export interface RunSummary {
  schema_version: 'v1';
  engine: 'pipeline.runner';
  pipeline: string;
  run_id: string;
  started_at: string;
  finished_at: string;
  total_steps: number;
  successful: number;
  failed: number;
  results: StepResult[];
  output_dir: string;
  status: RunStatus;
  planned_paths?: string[];
}

export function isPlannedArtifacts(value: StepOutput): value is PlannedArtifacts {
  return typeof value === 'object' && value.dry_run === true;
}

export function configString(step: StepSpec, key: string): string | undefined {
  const value = step.config?.[key];
  return typeof value === 'string' ? value : undefined;
}
