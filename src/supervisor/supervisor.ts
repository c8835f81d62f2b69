import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { load } from 'js-yaml';
import { ConfigurationError, errorMessage, toError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { CommandMapSchema, type CommandMap } from '../shared/schemas.js';
import type { Settings } from '../workspace/types.js';
import type { ProcessControl } from './process-control.js';
import { ProcessJob, type ControlResult, type JobSnapshot, type JobStatus, type SpawnFn } from './process-job.js';

export type SupervisorAction = 'start' | 'pause' | 'resume' | 'stop' | 'reset';

export const SUPERVISOR_ACTIONS: readonly SupervisorAction[] = ['start', 'pause', 'resume', 'stop', 'reset'];

const KEY_PATTERN = /^[A-Za-z0-9._-]+$/;

export function isSupervisorAction(value: string): value is SupervisorAction {
  return (SUPERVISOR_ACTIONS as readonly string[]).includes(value);
}

export function loadCommandMap(path: string): CommandMap {
  if (!existsSync(path)) {
    logger.warn('Agent command map not found; every key uses the placeholder command', { path });
    return {};
  }
  let raw: unknown;
  try {
    raw = load(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot parse command map ${path}: ${errorMessage(err)}`, toError(err));
  }
  const parsed = CommandMapSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid command map ${path} at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}

export function placeholderCommand(key: string): string[] {
  return [process.execPath, '-e', `console.log(${JSON.stringify(`No command configured for agent ${key}`)})`];
}

export interface SupervisorOptions {
  root: string;
  settings: Settings;
  /** Defaults to the YAML map at `settings.supervisor.commandsPath`. */
  commands?: CommandMap;
  spawn?: SpawnFn;
  control?: ProcessControl;
  env?: NodeJS.ProcessEnv;
}

export class ProcessSupervisor {
  private readonly jobs = new Map<string, ProcessJob>();
  private readonly commands: CommandMap;
  private readonly logDir: string;

  constructor(private readonly opts: SupervisorOptions) {
    const { supervisor } = opts.settings;
    this.commands =
      opts.commands ??
      loadCommandMap(isAbsolute(supervisor.commandsPath) ? supervisor.commandsPath : resolve(opts.root, supervisor.commandsPath));
    this.logDir = isAbsolute(supervisor.logDir) ? supervisor.logDir : resolve(opts.root, supervisor.logDir);
  }

  /** Configured keys plus any referenced since startup. */
  keys(): string[] {
    const keys = new Set(Object.keys(this.commands).filter((k) => k !== 'default'));
    for (const key of this.jobs.keys()) keys.add(key);
    return [...keys].sort();
  }

  commandFor(key: string): string[] {
    const mapped = this.commands[key]?.cmd;
    if (mapped) return mapped;
    const fallback = this.commands['default']?.cmd;
    if (fallback) return fallback.map((part) => part.split('{key}').join(key));
    return placeholderCommand(key);
  }

  job(key: string): ProcessJob {
    if (!KEY_PATTERN.test(key)) {
      throw new ConfigurationError(`Invalid agent key: "${key}"`);
    }
    let job = this.jobs.get(key);
    if (!job) {
      job = new ProcessJob(key, {
        command: this.commandFor(key),
        logDir: this.logDir,
        pipelineEnabled: this.opts.settings.pipelineEnabled,
        cwd: this.opts.root,
        env: this.opts.env,
        spawn: this.opts.spawn,
        control: this.opts.control,
      });
      this.jobs.set(key, job);
    }
    return job;
  }

  control(key: string, action: SupervisorAction): ControlResult {
    const job = this.job(key);
    const result = job[action]();
    logger.info('Supervisor action', { key, action, ok: result.ok, status: result.status, reason: result.reason });
    return result;
  }

  start(key: string): ControlResult {
    return this.control(key, 'start');
  }

  pause(key: string): ControlResult {
    return this.control(key, 'pause');
  }

  resume(key: string): ControlResult {
    return this.control(key, 'resume');
  }

  stop(key: string): ControlResult {
    return this.control(key, 'stop');
  }

  reset(key: string): ControlResult {
    return this.control(key, 'reset');
  }

  status(key: string): JobStatus {
    return this.job(key).status;
  }

  progress(key: string): number {
    return this.job(key).progress;
  }

  log(key: string): string[] {
    return this.job(key).log;
  }

  snapshot(key: string): JobSnapshot {
    return this.job(key).snapshot();
  }

  list(): Array<Pick<JobSnapshot, 'key' | 'status' | 'progress'>> {
    return this.keys().map((key) => {
      const job = this.jobs.get(key);
      return { key, status: job?.status ?? 'idle', progress: job?.progress ?? 0 };
    });
  }

  /** Stops every active job and waits for their exits to be processed. */
  async shutdown(): Promise<void> {
    const waits: Promise<void>[] = [];
    for (const job of this.jobs.values()) {
      if (job.status === 'starting' || job.status === 'running' || job.status === 'paused') {
        job.stop();
        waits.push(job.waitForExit());
      }
    }
    await Promise.all(waits);
  }
}
