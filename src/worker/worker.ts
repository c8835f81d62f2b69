/**
 * Drains at most one queued job per invocation and records what happened in
 * `output/worker/artifacts/worker_summary_<jobId|none>.json`.
 */
import { isAbsolute, resolve } from 'node:path';
import { ArtifactStore, assertSafeRelative } from '../artifacts/store.js';
import { FileQueue, jobIdFromFilename, type QueueItem } from '../queue/file-queue.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SCHEMA_VERSION, type JobError } from '../shared/schemas.js';
import type { StepRegistry } from '../runtime/registry.js';
import { runPipeline, type PipelineContext } from '../runtime/runner.js';
import type { RunSummary } from '../runtime/types.js';
import type { Settings } from '../workspace/types.js';

export const WORKER_ARTIFACTS_DIR = 'output/worker/artifacts';

export type WorkerDecision = 'done' | 'failed' | 'skipped';

export interface WorkerSummary {
  schema_version: typeof SCHEMA_VERSION;
  engine: 'worker';
  checked_at: string;
  job_id: string | null;
  run_id: string | null;
  pipeline_path: string | null;
  decision: WorkerDecision;
  error: JobError | null;
  dry_run: boolean;
}

export interface WorkerOutcome {
  summaryPath: string;
  summary: WorkerSummary;
}

export interface WorkerOptions {
  root: string;
  settings: Settings;
  queueDir?: string;
  dryRun?: boolean;
}

export interface WorkerDeps {
  runPipeline?: (planPath: string, runId: string, ctx: PipelineContext) => Promise<RunSummary>;
  registry?: StepRegistry;
  now?: () => Date;
}

export async function runWorker(opts: WorkerOptions, deps: WorkerDeps = {}): Promise<WorkerOutcome | null> {
  if (!opts.settings.pipelineEnabled) {
    logger.warn('Worker skipped: pipeline disabled by PIPELINE_ENABLED=false');
    return null;
  }

  const now = deps.now ?? (() => new Date());
  const dryRun = opts.dryRun ?? false;
  const store = new ArtifactStore(opts.root);
  const queueDir = opts.queueDir ?? opts.settings.queueDir;
  const queue = new FileQueue(isAbsolute(queueDir) ? queueDir : resolve(opts.root, queueDir));

  const record = (item: QueueItem | null, decision: WorkerDecision, error: JobError | null): WorkerOutcome => {
    const job = item?.job ?? null;
    // Unparseable payloads are still traced by the id in their file name.
    const jobId = job?.job_id ?? (item ? jobIdFromFilename(item.filename) : null);
    const summary: WorkerSummary = {
      schema_version: SCHEMA_VERSION,
      engine: 'worker',
      checked_at: now().toISOString(),
      job_id: jobId,
      run_id: job?.run_id ?? null,
      pipeline_path: job?.pipeline_path ?? null,
      decision,
      error,
      dry_run: dryRun,
    };
    const summaryPath = store.writeJson(`${WORKER_ARTIFACTS_DIR}/worker_summary_${jobId ?? 'none'}.json`, summary);
    logger.info('Worker finished', { decision, job_id: summary.job_id, code: error?.code });
    return { summaryPath, summary };
  };

  if (!opts.settings.workerEnabled) {
    const peeked = await queue.peekNext();
    return record(peeked, 'skipped', { code: 'worker_disabled', message: 'WORKER_ENABLED=false' });
  }

  if (dryRun) {
    const peeked = await queue.peekNext();
    if (peeked === null) return record(null, 'skipped', { code: 'queue_empty', message: 'no pending jobs' });
    return record(peeked, 'skipped', peeked.error);
  }

  const item = await queue.dequeueNext();
  if (item === null) return record(null, 'skipped', { code: 'queue_empty', message: 'no pending jobs' });

  if (item.job === null) {
    const error = item.error ?? { code: 'job_invalid', message: 'invalid job payload' };
    await queue.markFailed(item, error);
    return record(item, 'failed', error);
  }

  const job = item.job;
  try {
    const rel = isAbsolute(job.pipeline_path) ? store.relative(job.pipeline_path) : job.pipeline_path;
    const planPath = store.resolve(assertSafeRelative(rel));
    await (deps.runPipeline ?? runPipeline)(planPath, job.run_id, {
      root: opts.root,
      settings: opts.settings,
      params: job.params ?? {},
      registry: deps.registry,
    });
  } catch (err) {
    const error: JobError = { code: 'orchestrator_failed', message: errorMessage(err) };
    logger.error('Queued run failed', { job_id: job.job_id, run_id: job.run_id, error: error.message });
    await queue.markFailed(item, error);
    return record(item, 'failed', error);
  }

  await queue.markDone(item);
  return record(item, 'done', null);
}
