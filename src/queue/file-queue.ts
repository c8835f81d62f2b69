/**
 * Durable FIFO queue on the local filesystem.
 *
 * Layout: `<dir>/{pending,running,done,failed}/<YYYYMMDDTHHMMSSZ>_<jobId>.json`.
 * Claiming is a rename from pending/ to running/, which at most one caller
 * can win. Read operations never create directories.
 */
import { randomBytes } from 'node:crypto';
import { link, mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { QueueStateError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { JobSpecSchema, SCHEMA_VERSION, type JobError, type JobSpec, type QueueState } from '../shared/schemas.js';

export const QUEUE_STATES: readonly QueueState[] = ['pending', 'running', 'done', 'failed'];

const JOB_FILE_PATTERN = /^\d{8}T\d{6}Z_.+\.json$/;

export interface NewJob {
  job_id: string;
  scheduled_for: string;
  pipeline_path: string;
  run_id: string;
  params?: Record<string, unknown> | null;
}

export interface QueueItem {
  filename: string;
  /** Absolute path of the file in its current state directory. */
  path: string;
  job: JobSpec | null;
  error: JobError | null;
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

export function queueTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) throw new Error(`Invalid scheduled_for: ${iso}`);
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

export function jobFilename(job: Pick<NewJob, 'job_id' | 'scheduled_for'>): string {
  return `${queueTimestamp(job.scheduled_for)}_${job.job_id}.json`;
}

/** `<timestamp>_<jobId>.json` → `jobId`, or null for names outside the queue layout. */
export function jobIdFromFilename(filename: string): string | null {
  if (!JOB_FILE_PATTERN.test(filename)) return null;
  const jobId = filename.slice(filename.indexOf('_') + 1, -'.json'.length);
  return /^[A-Za-z0-9_-]+$/.test(jobId) ? jobId : null;
}

export function parseJob(text: string): { job: JobSpec; error: null } | { job: null; error: JobError } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { job: null, error: { code: 'job_invalid', message: `Invalid JSON: ${errorMessage(err)}` } };
  }
  const parsed = JobSpecSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      job: null,
      error: {
        code: 'job_invalid',
        message: `Invalid job at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
      },
    };
  }
  return { job: parsed.data, error: null };
}

export class FileQueue {
  readonly dir: string;
  private readonly now: () => Date;

  constructor(dir: string, opts: { now?: () => Date } = {}) {
    this.dir = resolve(dir);
    this.now = opts.now ?? (() => new Date());
  }

  stateDir(state: QueueState): string {
    return join(this.dir, state);
  }

  /** Returns the job id, or null when a job with that id exists in any state. */
  async enqueue(input: NewJob): Promise<string | null> {
    const filename = jobFilename(input);
    if (await this.exists(input.job_id)) return null;

    await Promise.all(QUEUE_STATES.map((state) => mkdir(this.stateDir(state), { recursive: true })));
    const job: JobSpec = {
      schema_version: SCHEMA_VERSION,
      job_id: input.job_id,
      created_at: this.now().toISOString(),
      scheduled_for: input.scheduled_for,
      pipeline_path: input.pipeline_path,
      run_id: input.run_id,
      params: input.params ?? null,
      status: 'pending',
      attempts: 0,
      last_error: null,
    };

    const temp = join(this.dir, `.${filename}.${randomBytes(6).toString('hex')}.tmp`);
    await writeFile(temp, JSON.stringify(job, null, 2) + '\n', { encoding: 'utf8', flag: 'wx' });
    try {
      await link(temp, join(this.stateDir('pending'), filename));
    } catch (err) {
      if (hasCode(err, 'EEXIST')) {
        logger.debug('Job already enqueued', { job_id: input.job_id });
        return null;
      }
      throw err;
    } finally {
      await unlink(temp);
    }
    logger.info('Job enqueued', { job_id: input.job_id, run_id: input.run_id, filename });
    return input.job_id;
  }

  async listPending(): Promise<string[]> {
    return this.list('pending');
  }

  async list(state: QueueState): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.stateDir(state));
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return [];
      throw err;
    }
    return names.filter((name) => JOB_FILE_PATTERN.test(name)).sort();
  }

  async exists(jobId: string): Promise<boolean> {
    const suffix = `_${jobId}.json`;
    for (const state of QUEUE_STATES) {
      const names = await this.list(state);
      if (names.some((name) => name.endsWith(suffix))) return true;
    }
    return false;
  }

  /** The next pending item, parsed but not claimed. */
  async peekNext(): Promise<QueueItem | null> {
    for (const filename of await this.listPending()) {
      const path = join(this.stateDir('pending'), filename);
      let text: string;
      try {
        text = await readFile(path, 'utf8');
      } catch (err) {
        if (hasCode(err, 'ENOENT')) continue;
        throw err;
      }
      return { filename, path, ...parseJob(text) };
    }
    return null;
  }

  /** Claims the oldest pending item. Losing a claim race moves on to the next file. */
  async dequeueNext(): Promise<QueueItem | null> {
    const pending = await this.listPending();
    if (pending.length === 0) return null;
    await mkdir(this.stateDir('running'), { recursive: true });

    for (const filename of pending) {
      const target = join(this.stateDir('running'), filename);
      try {
        await rename(join(this.stateDir('pending'), filename), target);
      } catch (err) {
        if (hasCode(err, 'ENOENT')) continue;
        throw err;
      }

      const parsed = parseJob(await readFile(target, 'utf8'));
      if (parsed.job === null) {
        logger.warn('Claimed an invalid job payload', { filename, error: parsed.error.message });
        return { filename, path: target, job: null, error: parsed.error };
      }
      const job: JobSpec = { ...parsed.job, status: 'running', attempts: parsed.job.attempts + 1 };
      await this.rewrite(target, job);
      logger.info('Job claimed', { job_id: job.job_id, attempts: job.attempts });
      return { filename, path: target, job, error: null };
    }
    return null;
  }

  async markDone(item: QueueItem): Promise<QueueItem> {
    return this.finish(item, 'done', null);
  }

  async markFailed(item: QueueItem, error?: JobError): Promise<QueueItem> {
    return this.finish(item, 'failed', error ?? item.error ?? { code: 'unknown', message: 'failed' });
  }

  private async finish(item: QueueItem, state: 'done' | 'failed', error: JobError | null): Promise<QueueItem> {
    const source = join(this.stateDir('running'), item.filename);
    const target = join(this.stateDir(state), item.filename);
    await mkdir(this.stateDir(state), { recursive: true });
    try {
      await rename(source, target);
    } catch (err) {
      if (hasCode(err, 'ENOENT')) {
        throw new QueueStateError(`Job ${item.filename} is not claimed or was already finalized`, item.filename);
      }
      throw err;
    }
    let job = item.job;
    if (job !== null) {
      job = { ...job, status: state, last_error: error };
      await this.rewrite(target, job);
    }
    logger.info(`Job ${state}`, { filename: item.filename, error: error?.code });
    return { filename: item.filename, path: target, job, error };
  }

  private async rewrite(path: string, job: JobSpec): Promise<void> {
    const temp = `${path}.${randomBytes(6).toString('hex')}.tmp`;
    await writeFile(temp, JSON.stringify(job, null, 2) + '\n', 'utf8');
    await rename(temp, path);
  }
}
