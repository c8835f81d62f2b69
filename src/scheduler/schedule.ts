/**
 * Turns a declarative schedule plan into queued jobs for the entries that
 * fall inside `[now, now + window]`.
 */
import { isValidRunId } from '../artifacts/store.js';
import { errorMessage } from '../shared/errors.js';
import { deterministicId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import { ScheduleEntrySchema, type ScheduleEntry } from '../shared/schemas.js';
import type { FileQueue, NewJob } from '../queue/file-queue.js';
import { loadSchedulePlan } from './plan.js';
import { formatMinuteStamp, formatUtc, parseIsoInZone } from './timezone.js';

export type ScheduleSkipCode =
  | 'job_invalid'
  | 'entry_missed'
  | 'scheduler_disabled'
  | 'already_enqueued'
  | 'enqueue_failed'
  | 'plan_parse_error'
  | 'schedule_failed';

export interface ScheduleSkip {
  publish_at: string;
  pipeline_path: string;
  run_id: string;
  code: ScheduleSkipCode;
  message: string;
}

export interface ScheduleOptions {
  /** Absolute path of the plan file. */
  planPath: string;
  queue: FileQueue;
  nowUtc: Date;
  windowMinutes: number;
  dryRun: boolean;
  schedulerEnabled: boolean;
  defaultTimezone: string;
}

export interface ScheduleResult {
  timezone: string;
  enqueuedJobIds: string[];
  skippedEntries: ScheduleSkip[];
}

export interface PlannedJob extends NewJob {
  publish_at: string;
}

export function buildRunIdBase(scheduled: Date, timezone: string, prefix?: string): string {
  const stamp = formatMinuteStamp(scheduled, timezone);
  return prefix ? `${prefix}_${stamp}` : stamp;
}

/** Same instant, pipeline and base always give the same id. */
export function buildJobId(scheduled: Date, pipelinePath: string, runIdBase: string): string {
  return deterministicId(`${formatUtc(scheduled)}|${pipelinePath}|${runIdBase}`);
}

/** Derive the job for one entry, or explain why the row is unusable. */
export function planJob(
  raw: unknown,
  timezone: string,
): { ok: true; job: PlannedJob; scheduled: Date } | { ok: false; skip: ScheduleSkip } {
  const invalid = (message: string, entry?: Partial<ScheduleEntry>) => ({
    ok: false as const,
    skip: {
      publish_at: entry?.publish_at ?? '',
      pipeline_path: entry?.pipeline_path ?? '',
      run_id: '',
      code: 'job_invalid' as const,
      message,
    },
  });

  const parsed = ScheduleEntrySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return invalid(`${issue?.path.join('.') || 'entry'}: ${issue?.message ?? 'invalid'}`);
  }
  const entry = parsed.data;
  const scheduled = parseIsoInZone(entry.publish_at, timezone);
  if (scheduled === null) return invalid(`publish_at is not an ISO-8601 date-time: ${entry.publish_at}`, entry);
  if (entry.run_id !== undefined && !isValidRunId(entry.run_id)) {
    return invalid(`run_id is not a valid run id: ${entry.run_id}`, entry);
  }

  const base = entry.run_id ?? buildRunIdBase(scheduled, timezone, entry.run_id_prefix);
  const jobId = buildJobId(scheduled, entry.pipeline_path, base);
  return {
    ok: true,
    scheduled,
    job: {
      publish_at: entry.publish_at,
      job_id: jobId,
      scheduled_for: formatUtc(scheduled),
      pipeline_path: entry.pipeline_path,
      run_id: entry.run_id ?? `${base}_${jobId}`,
      params: entry.params ?? null,
    },
  };
}

export async function scheduleDueJobs(opts: ScheduleOptions): Promise<ScheduleResult> {
  const plan = loadSchedulePlan(opts.planPath, opts.defaultTimezone);
  const now = opts.nowUtc.getTime();
  const windowEnd = now + Math.max(opts.windowMinutes, 0) * 60_000;
  const enqueuedJobIds: string[] = [];
  const skippedEntries: ScheduleSkip[] = [];

  for (const raw of plan.entries) {
    const planned = planJob(raw, plan.timezone);
    if (!planned.ok) {
      skippedEntries.push(planned.skip);
      continue;
    }
    const { job, scheduled } = planned;
    const skip = (code: ScheduleSkipCode, message: string): void => {
      skippedEntries.push({ publish_at: job.publish_at, pipeline_path: job.pipeline_path, run_id: job.run_id, code, message });
    };

    if (scheduled.getTime() < now) {
      skip('entry_missed', 'publish_at is before now');
      continue;
    }
    if (scheduled.getTime() > windowEnd) continue;

    try {
      if (opts.dryRun) {
        if (await opts.queue.exists(job.job_id)) skip('already_enqueued', 'job already exists');
        else enqueuedJobIds.push(job.job_id);
        continue;
      }
      if (!opts.schedulerEnabled) {
        skip('scheduler_disabled', 'SCHEDULER_ENABLED=false');
        continue;
      }
      if (await opts.queue.exists(job.job_id)) {
        skip('already_enqueued', 'job already exists');
        continue;
      }
      const enqueued = await opts.queue.enqueue(job);
      if (enqueued === null) skip('already_enqueued', 'job already exists');
      else enqueuedJobIds.push(enqueued);
    } catch (err) {
      logger.error('Enqueue failed', { job_id: job.job_id, error: errorMessage(err) });
      skip('enqueue_failed', errorMessage(err));
    }
  }

  logger.info('Schedule evaluated', {
    timezone: plan.timezone,
    enqueued: enqueuedJobIds.length,
    skipped: skippedEntries.length,
    dry_run: opts.dryRun,
  });
  return { timezone: plan.timezone, enqueuedJobIds, skippedEntries };
}
