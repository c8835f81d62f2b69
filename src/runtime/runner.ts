import { isAbsolute, resolve } from 'node:path';
import { ArtifactStore, assertRunId, assertSafeRelative } from '../artifacts/store.js';
import { ConfigurationError, StepFailedError, errorMessage, toError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SCHEMA_VERSION } from '../shared/schemas.js';
import { runDirRel } from '../workspace/paths.js';
import type { Settings } from '../workspace/types.js';
import { isDryRunPlan, loadStepPlan } from './pipelines.js';
import { createDefaultRegistry, type StepRegistry } from './registry.js';
import {
  isPlannedArtifacts,
  type RunContext,
  type RunSummary,
  type StepHandler,
  type StepResult,
  type StepSpec,
} from './types.js';

export const PIPELINE_SUMMARY_FILENAME = 'pipeline_summary.json';

export interface PipelineContext {
  /** Project root; relative plan paths and every artifact resolve against it. */
  root: string;
  settings: Settings;
  /** Job params, exposed to handlers as `run.params` and to `{{name}}` templates. */
  params?: Record<string, unknown>;
  registry?: StepRegistry;
  now?: () => Date;
}

/**
 * Resolve {{varName}} and {{step.<id>.output}} template expressions in a value.
 * Works recursively on strings, arrays, and plain objects.
 */
export function resolveTemplate(
  value: unknown,
  vars: Record<string, unknown>,
  stepOutputs: Map<string, string>,
): unknown {
  if (typeof value === 'string') {
    return value.replace(/\{\{([^}]+)\}\}/g, (match, expr: string) => {
      const trimmed = expr.trim();

      const stepMatch = /^step\.([^.]+)\.output$/.exec(trimmed);
      if (stepMatch) {
        return stepOutputs.get(stepMatch[1] ?? '') ?? match;
      }

      if (Object.prototype.hasOwnProperty.call(vars, trimmed)) {
        const v = vars[trimmed];
        return typeof v === 'string' ? v : JSON.stringify(v);
      }

      return match; // unresolvable, keep as-is
    });
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveTemplate(item, vars, stepOutputs));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveTemplate(v, vars, stepOutputs);
    }
    return result;
  }

  return value;
}

function resolveConfig(
  config: Record<string, unknown> | undefined,
  vars: Record<string, unknown>,
  stepOutputs: Map<string, string>,
): Record<string, unknown> | undefined {
  if (config === undefined) return undefined;
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(config)) {
    result[k] = resolveTemplate(v, vars, stepOutputs);
  }
  return result;
}

export async function runPipeline(planPath: string, runId: string, ctx: PipelineContext): Promise<RunSummary> {
  if (!ctx.settings.pipelineEnabled) {
    logger.warn('Pipeline disabled by PIPELINE_ENABLED=false', { run_id: runId });
    const at = (ctx.now ?? (() => new Date()))().toISOString();
    return {
      schema_version: SCHEMA_VERSION,
      engine: 'pipeline.runner',
      pipeline: 'unknown',
      run_id: runId,
      started_at: at,
      finished_at: at,
      total_steps: 0,
      successful: 0,
      failed: 0,
      results: [],
      output_dir: '',
      status: 'disabled',
    };
  }

  const now = ctx.now ?? (() => new Date());
  assertRunId(runId);
  const absPlan = isAbsolute(planPath) ? planPath : resolve(ctx.root, planPath);
  const plan = loadStepPlan(absPlan);

  // Every key is resolved before anything runs, so an unknown key never leaves partial output.
  const registry = ctx.registry ?? createDefaultRegistry();
  const handlers = new Map<string, StepHandler>();
  for (const step of plan.steps) {
    handlers.set(step.id, registry.resolve(step.handler_key, step.id));
  }

  const dryRun = isDryRunPlan(plan);
  const baseStore = new ArtifactStore(ctx.root);
  const run: RunContext = {
    runId,
    runDir: runDirRel(runId),
    store: dryRun ? baseStore.asReadOnly() : baseStore,
    dryRun,
    params: ctx.params ?? {},
    settings: ctx.settings,
  };

  const summary: RunSummary = {
    schema_version: SCHEMA_VERSION,
    engine: 'pipeline.runner',
    pipeline: plan.pipeline,
    run_id: runId,
    started_at: now().toISOString(),
    finished_at: '',
    total_steps: plan.steps.length,
    successful: 0,
    failed: 0,
    results: [],
    output_dir: run.runDir,
    status: dryRun ? 'dry_run' : 'completed',
  };
  const plannedPaths: string[] = [];
  const stepOutputs = new Map<string, string>();
  const vars: Record<string, unknown> = { ...run.params, run_id: runId };

  logger.info('Run started', { run_id: runId, pipeline: plan.pipeline, steps: plan.steps.length, dry_run: dryRun });

  for (const planned of plan.steps) {
    const step: StepSpec = { ...planned, config: resolveConfig(planned.config, vars, stepOutputs) };
    const handler = handlers.get(step.id);
    if (!handler) throw new ConfigurationError(`No handler resolved for step ${step.id}`);

    const result: StepResult = { id: step.id, handler_key: step.handler_key, status: 'ok' };
    try {
      const output = await handler(step, run);
      if (dryRun) {
        if (!isPlannedArtifacts(output)) {
          throw new ConfigurationError(`Step ${step.id} must return planned artifacts under dry-run`);
        }
        const paths = output.planned_paths.map((p) => assertSafeRelative(p));
        result.output = assertSafeRelative(output.output_path);
        result.planned_paths = paths;
        plannedPaths.push(...paths);
      } else {
        result.output = isPlannedArtifacts(output) ? output.output_path : output;
      }
      stepOutputs.set(step.id, result.output);
      summary.results.push(result);
      summary.successful += 1;
      logger.info('Step completed', { run_id: runId, step: step.id, handler: step.handler_key });
    } catch (err) {
      result.status = 'error';
      result.error = errorMessage(err);
      summary.results.push(result);
      summary.failed += 1;
      summary.status = 'failed';
      summary.finished_at = now().toISOString();
      logger.error('Step failed', { run_id: runId, step: step.id, handler: step.handler_key, error: result.error });
      throw new StepFailedError(step.id, summary, toError(err));
    }
  }

  summary.finished_at = now().toISOString();
  if (dryRun) {
    summary.planned_paths = plannedPaths;
    logger.info('Dry run planned', { run_id: runId, planned_paths: plannedPaths.length });
    return summary;
  }

  run.store.writeJson(`${run.runDir}/${PIPELINE_SUMMARY_FILENAME}`, summary);
  logger.info('Run completed', { run_id: runId, status: summary.status, successful: summary.successful });
  return summary;
}
