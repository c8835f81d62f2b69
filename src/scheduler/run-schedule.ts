import { basename, isAbsolute, relative, resolve, sep } from 'node:path';
import { ArtifactStore } from '../artifacts/store.js';
import { FileQueue } from '../queue/file-queue.js';
import { SchedulePlanError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { SCHEMA_VERSION } from '../shared/schemas.js';
import type { Settings } from '../workspace/types.js';
import { scheduleDueJobs, type ScheduleResult, type ScheduleSkip } from './schedule.js';
import { formatDateStamp } from './timezone.js';

export const SCHEDULER_ARTIFACTS_DIR = 'output/scheduler/artifacts';

export interface ScheduleSummary {
  schema_version: typeof SCHEMA_VERSION;
  engine: 'scheduler';
  checked_at: string;
  plan_path: string;
  now: string;
  window_minutes: number;
  window_end: string;
  timezone: string;
  enqueued_job_ids: string[];
  skipped_entries: ScheduleSkip[];
  dry_run: boolean;
}

export type ScheduleRunOutcome =
  | { status: 'disabled' }
  | { status: 'ok'; summaryPath: string; summary: ScheduleSummary };

export interface RunScheduleOptions {
  root: string;
  settings: Settings;
  planPath?: string;
  queueDir?: string;
  now?: Date;
  windowMinutes?: number;
  dryRun?: boolean;
}

function absolute(root: string, path: string): string {
  return isAbsolute(path) ? path : resolve(root, path);
}

/** Cron entry point: one scheduling pass plus its summary artifact. */
export async function runSchedule(opts: RunScheduleOptions): Promise<ScheduleRunOutcome> {
  if (!opts.settings.pipelineEnabled) {
    logger.warn('Scheduler skipped: pipeline disabled by PIPELINE_ENABLED=false');
    return { status: 'disabled' };
  }

  const store = new ArtifactStore(opts.root);
  const now = opts.now ?? new Date();
  const windowMinutes = Math.max(opts.windowMinutes ?? opts.settings.scheduler.windowMinutes, 0);
  const dryRun = opts.dryRun ?? false;
  const planAbs = absolute(opts.root, opts.planPath ?? opts.settings.scheduler.planPath);
  const queue = new FileQueue(absolute(opts.root, opts.queueDir ?? opts.settings.queueDir));

  // Plans outside the project are recorded by file name only.
  const rel = relative(store.root, planAbs);
  const planRel = rel !== '' && !rel.startsWith('..') && !isAbsolute(rel) ? rel.split(sep).join('/') : basename(planAbs);
  const scrub = (message: string): string =>
    message.split(planAbs).join(planRel).split(store.root + sep).join('');

  let result: ScheduleResult;
  try {
    result = await scheduleDueJobs({
      planPath: planAbs,
      queue,
      nowUtc: now,
      windowMinutes,
      dryRun,
      schedulerEnabled: opts.settings.schedulerEnabled,
      defaultTimezone: opts.settings.scheduler.timezone,
    });
  } catch (err) {
    const planError = err instanceof SchedulePlanError;
    logger.error(planError ? 'Schedule plan could not be loaded' : 'Scheduling pass failed', { error: errorMessage(err) });
    result = {
      timezone: opts.settings.scheduler.timezone,
      enqueuedJobIds: [],
      skippedEntries: [
        {
          publish_at: '',
          pipeline_path: '',
          run_id: '',
          code: planError ? 'plan_parse_error' : 'schedule_failed',
          message: errorMessage(err),
        },
      ],
    };
  }

  const summary: ScheduleSummary = {
    schema_version: SCHEMA_VERSION,
    engine: 'scheduler',
    checked_at: new Date().toISOString(),
    plan_path: planRel,
    now: now.toISOString(),
    window_minutes: windowMinutes,
    window_end: new Date(now.getTime() + windowMinutes * 60_000).toISOString(),
    timezone: result.timezone,
    enqueued_job_ids: result.enqueuedJobIds,
    skipped_entries: result.skippedEntries.map((entry) => ({ ...entry, message: scrub(entry.message) })),
    dry_run: dryRun,
  };
  const summaryPath = store.writeJson(
    `${SCHEDULER_ARTIFACTS_DIR}/schedule_summary_${formatDateStamp(now, result.timezone)}.json`,
    summary,
  );
  return { status: 'ok', summaryPath, summary };
}
