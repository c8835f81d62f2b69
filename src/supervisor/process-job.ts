/**
 * One supervised external process and its lifecycle.
 *
 *   idle -> starting -> running -> completed | error
 *   running <-> paused
 *   starting | running | paused -> stopping -> stopped
 *   any -> idle (reset)
 *
 * `disabled` is reported instead of starting when the pipeline kill-switch is off.
 */
import { spawn, type ChildProcess } from 'node:child_process';
import { appendFileSync, mkdirSync, readFileSync, statSync } from 'node:fs';
import { extname, isAbsolute, join, resolve } from 'node:path';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { redact } from '../shared/redact.js';
import { defaultProcessControl, type ProcessControl } from './process-control.js';

export type SpawnFn = typeof spawn;

export type JobStatus =
  | 'idle'
  | 'starting'
  | 'running'
  | 'paused'
  | 'stopping'
  | 'stopped'
  | 'completed'
  | 'error'
  | 'disabled';

export type ControlFailure = 'invalid_transition' | 'unsupported_platform' | 'signal_failed';

export interface ControlResult {
  ok: boolean;
  status: JobStatus;
  reason?: ControlFailure;
}

export interface JobSnapshot {
  key: string;
  status: JobStatus;
  progress: number;
  log: string[];
  pid: number | null;
}

export const PROGRESS_FD = 3;

const PROGRESS_PATTERN = /progress=(\d+)%/;
const STAGE_PROGRESS: ReadonlyArray<readonly [RegExp, number]> = [
  [/loading/i, 20],
  [/analyzing/i, 60],
  [/saving/i, 90],
];
const SAVED_RESULT_PATTERN = /saved result:\s*(.+)$/i;
const MAX_RESULT_BYTES = 512 * 1024;
const ACTIVE: ReadonlySet<JobStatus> = new Set(['starting', 'running', 'paused']);

export interface ProcessJobOptions {
  command: string[];
  /** Absolute directory for `<key>.log`; created on first write. */
  logDir: string;
  pipelineEnabled: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
  control?: ProcessControl;
  maxLogLines?: number;
}

function clampProgress(value: number): number {
  return Math.max(0, Math.min(100, Math.round(value)));
}

export function parseProgressLine(line: string): number | null {
  const match = PROGRESS_PATTERN.exec(line);
  return match?.[1] === undefined ? null : clampProgress(Number.parseInt(match[1], 10));
}

/** Coarse progress from stage words agents print; the highest matching stage wins. */
export function parseStageProgress(line: string): number | null {
  let best: number | null = null;
  for (const [pattern, value] of STAGE_PROGRESS) {
    if (pattern.test(line) && (best === null || value > best)) best = value;
  }
  return best;
}

/** Path from a `saved result: <path>` line, unquoted. */
export function parseSavedResultPath(line: string): string | null {
  const match = SAVED_RESULT_PATTERN.exec(line);
  const raw = match?.[1]?.trim().replace(/^['"]|['"]$/g, '');
  return raw === undefined || raw === '' ? null : raw;
}

export function parseStructuredProgress(line: string): number | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('progress' in parsed)) return null;
  const value = parsed.progress;
  return typeof value === 'number' && Number.isFinite(value) ? clampProgress(value) : null;
}

export class ProcessJob {
  readonly key: string;
  private readonly command: string[];
  private readonly logFile: string;
  private readonly logDir: string;
  private readonly opts: ProcessJobOptions;
  private readonly spawnImpl: SpawnFn;
  private readonly control: ProcessControl;
  private readonly maxLogLines: number;

  private _status: JobStatus = 'idle';
  private _progress = 0;
  private readonly lines: string[] = [];
  private child: ChildProcess | null = null;
  private generation = 0;
  private lifecycle: Promise<void> = Promise.resolve();
  private logDirReady = false;

  constructor(key: string, opts: ProcessJobOptions) {
    this.key = key;
    this.command = opts.command;
    this.opts = opts;
    this.logDir = opts.logDir;
    this.logFile = join(opts.logDir, `${key}.log`);
    this.spawnImpl = opts.spawn ?? spawn;
    this.control = opts.control ?? defaultProcessControl();
    this.maxLogLines = opts.maxLogLines ?? 1000;
  }

  get status(): JobStatus {
    return this._status;
  }

  get progress(): number {
    return this._progress;
  }

  get log(): string[] {
    return [...this.lines];
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  snapshot(): JobSnapshot {
    return { key: this.key, status: this._status, progress: this._progress, log: this.log, pid: this.pid };
  }

  /** Resolves once the current child's exit has been fully processed. */
  waitForExit(): Promise<void> {
    return this.lifecycle;
  }

  start(): ControlResult {
    if (ACTIVE.has(this._status)) return this.rejected();

    if (!this.opts.pipelineEnabled) {
      this._status = 'disabled';
      this._progress = 100;
      this.remember('SUPERVISOR: pipeline disabled by PIPELINE_ENABLED=false; not started');
      return { ok: true, status: this._status };
    }

    const [bin, ...args] = this.command;
    if (bin === undefined) {
      this._status = 'error';
      this.append('SUPERVISOR: empty command');
      return { ok: false, status: this._status };
    }

    this.generation += 1;
    const generation = this.generation;
    this._status = 'starting';
    this._progress = 0;
    this.append(`SUPERVISOR: starting ${this.command.join(' ')}`);

    let child: ChildProcess;
    try {
      child = this.spawnImpl(bin, args, {
        cwd: this.opts.cwd,
        env: { ...(this.opts.env ?? process.env), PROGRESS_FD: String(PROGRESS_FD) },
        stdio: ['ignore', 'pipe', 'pipe', 'pipe'],
        detached: this.control.detached,
      });
    } catch (err) {
      this._status = 'error';
      this.append(`SUPERVISOR: spawn failed: ${errorMessage(err)}`);
      return { ok: false, status: this._status };
    }
    this.child = child;
    this.lifecycle = this.watch(child, generation);

    if (child.pid !== undefined) {
      this._status = 'running';
    } else {
      child.once('spawn', () => {
        if (this.generation === generation && this._status === 'starting') this._status = 'running';
      });
    }
    logger.info('Supervised process started', { key: this.key, pid: child.pid });
    return { ok: true, status: this._status };
  }

  pause(): ControlResult {
    if (this._status !== 'running' || this.child === null) return this.rejected();
    if (!this.control.supportsSuspend) return { ok: false, status: this._status, reason: 'unsupported_platform' };
    try {
      this.control.suspend(this.child);
    } catch (err) {
      this.append(`SUPERVISOR: pause failed: ${errorMessage(err)}`);
      return { ok: false, status: this._status, reason: 'signal_failed' };
    }
    this._status = 'paused';
    this.append('SUPERVISOR: paused');
    return { ok: true, status: this._status };
  }

  resume(): ControlResult {
    if (this._status !== 'paused' || this.child === null) return this.rejected();
    if (!this.control.supportsSuspend) return { ok: false, status: this._status, reason: 'unsupported_platform' };
    try {
      this.control.resume(this.child);
    } catch (err) {
      this.append(`SUPERVISOR: resume failed: ${errorMessage(err)}`);
      return { ok: false, status: this._status, reason: 'signal_failed' };
    }
    this._status = 'running';
    this.append('SUPERVISOR: resumed');
    return { ok: true, status: this._status };
  }

  stop(): ControlResult {
    if (!ACTIVE.has(this._status)) return this.rejected();
    this._status = 'stopping';
    let signalled = true;
    try {
      if (this.child !== null) this.control.terminate(this.child);
    } catch (err) {
      signalled = false;
      this.append(`SUPERVISOR: stop signal failed: ${errorMessage(err)}`);
    } finally {
      this._status = 'stopped';
    }
    this.append('SUPERVISOR: stopped');
    return signalled
      ? { ok: true, status: this._status }
      : { ok: false, status: this._status, reason: 'signal_failed' };
  }

  reset(): ControlResult {
    this._status = 'idle';
    this._progress = 0;
    this.append('SUPERVISOR: reset');
    return { ok: true, status: this._status };
  }

  private rejected(): ControlResult {
    return { ok: false, status: this._status, reason: 'invalid_transition' };
  }

  private watch(child: ChildProcess, generation: number): Promise<void> {
    const readers: Promise<void>[] = [];
    if (child.stdout) readers.push(this.readLines(child.stdout, (line) => this.onOutput('STDOUT', line)));
    if (child.stderr) readers.push(this.readLines(child.stderr, (line) => this.onOutput('STDERR', line)));
    const progressPipe = child.stdio[PROGRESS_FD];
    if (isReadable(progressPipe)) {
      readers.push(this.readLines(progressPipe, (line) => this.onStructuredProgress(line)));
    }

    return new Promise<void>((resolve) => {
      let done = false;
      const finalize = (apply: () => void): void => {
        if (done) return;
        done = true;
        if (this.generation === generation) apply();
        resolve();
      };

      child.once('error', (err) => {
        finalize(() => {
          if (this._status === 'stopped' || this._status === 'stopping') return;
          this._status = 'error';
          this.append(`SUPERVISOR: spawn failed: ${err.message}`);
          logger.error('Supervised process failed to start', { key: this.key, error: err.message });
        });
      });

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        void Promise.all(readers).then(() =>
          finalize(() => {
            if (this._status === 'stopped' || this._status === 'stopping') return;
            if (code === 0) {
              this._status = 'completed';
              this._progress = 100;
            } else {
              this._status = 'error';
            }
            this.append(`SUPERVISOR: exited with code ${code ?? 'null'}${signal ? ` (${signal})` : ''}`);
            logger.info('Supervised process exited', { key: this.key, code, signal, status: this._status });
          }),
        );
      });
    });
  }

  private readLines(stream: Readable, onLine: (line: string) => void): Promise<void> {
    return new Promise<void>((resolve) => {
      const rl = createInterface({ input: stream, crlfDelay: Infinity });
      rl.on('line', onLine);
      rl.once('close', () => resolve());
    });
  }

  private onOutput(prefix: 'STDOUT' | 'STDERR', line: string): void {
    this.append(`${prefix}: ${line}`);
    const progress = parseProgressLine(line);
    if (progress !== null) {
      this._progress = progress;
      return;
    }
    const stage = parseStageProgress(line);
    if (stage !== null) this._progress = Math.max(this._progress, stage);
    if (prefix === 'STDOUT') {
      const saved = parseSavedResultPath(line);
      if (saved !== null) this.appendResultFile(saved);
    }
  }

  /** Copies a small JSON result the agent reports into the job log. */
  private appendResultFile(printed: string): void {
    if (extname(printed).toLowerCase() !== '.json') return;
    const abs = isAbsolute(printed) ? printed : resolve(this.opts.cwd ?? process.cwd(), printed);
    let content: string;
    try {
      const stats = statSync(abs);
      if (!stats.isFile() || stats.size > MAX_RESULT_BYTES) return;
      content = readFileSync(abs, 'utf8');
    } catch (err) {
      logger.debug('Reported result file is not readable', { key: this.key, error: errorMessage(err) });
      return;
    }
    this.append(`RESULT_JSON (${printed}):`);
    for (const line of content.split(/\r?\n/)) {
      if (line !== '') this.append(line);
    }
  }

  private onStructuredProgress(line: string): void {
    const progress = parseStructuredProgress(line);
    if (progress === null) {
      logger.debug('Ignoring malformed progress report', { key: this.key });
      return;
    }
    this._progress = progress;
  }

  /** In-memory only. */
  private remember(line: string): void {
    this.lines.push(redact(line));
    if (this.lines.length > this.maxLogLines) this.lines.splice(0, this.lines.length - this.maxLogLines);
  }

  private append(line: string): void {
    const clean = redact(line);
    this.remember(clean);
    try {
      if (!this.logDirReady) {
        mkdirSync(this.logDir, { recursive: true });
        this.logDirReady = true;
      }
      appendFileSync(this.logFile, clean + '\n', 'utf8');
    } catch (err) {
      logger.warn('Could not write job log file', { key: this.key, error: errorMessage(err) });
    }
  }
}

function isReadable(stream: unknown): stream is Readable {
  return (
    typeof stream === 'object' &&
    stream !== null &&
    'on' in stream &&
    'read' in stream &&
    typeof stream.read === 'function'
  );
}
