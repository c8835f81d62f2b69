import { accessSync, constants, existsSync } from 'node:fs';
import { spawnSync } from 'node:child_process';
import { dirname, isAbsolute, resolve } from 'node:path';
import { loadSchedulePlan } from '../scheduler/plan.js';
import { errorMessage } from '../shared/errors.js';
import { loadCommandMap } from '../supervisor/supervisor.js';
import { loadSettings } from '../workspace/config.js';
import { getProjectPaths } from '../workspace/paths.js';
import type { Settings } from '../workspace/types.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

export interface DoctorDeps {
  commandExists?: (cmd: string) => boolean;
  nodeVersion?: string;
}

type CheckOutcome = { status: CheckStatus; message: string; fix?: string };

async function check(name: string, fn: () => Promise<CheckOutcome> | CheckOutcome): Promise<DoctorCheck> {
  try {
    const result = await Promise.resolve(fn());
    return { name, ...result };
  } catch (err) {
    return { name, status: 'fail', message: `Check threw: ${errorMessage(err)}` };
  }
}

function commandExists(cmd: string): boolean {
  if (cmd.includes('/') || cmd.includes('\\')) return existsSync(cmd);
  const probe = spawnSync(process.platform === 'win32' ? 'where' : 'which', [cmd], { stdio: 'ignore' });
  return probe.status === 0;
}

/** Writable if it exists and is writable, or if its nearest existing ancestor is. */
function isWritableDir(path: string): boolean {
  let current = path;
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) return false;
    current = parent;
  }
  try {
    accessSync(current, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

export async function runDoctorChecks(
  root: string,
  env: NodeJS.ProcessEnv = process.env,
  deps: DoctorDeps = {},
): Promise<DoctorReport> {
  const paths = getProjectPaths(root);
  const exists = deps.commandExists ?? commandExists;
  const checks: DoctorCheck[] = [];

  checks.push(
    await check('Node.js >= 20', () => {
      const v = (deps.nodeVersion ?? process.version).replace(/^v/, '');
      const major = parseInt(v.split('.')[0] ?? '0', 10);
      if (major >= 20) return { status: 'pass', message: `Node.js ${v}` };
      return { status: 'fail', message: `Node.js ${v} is below required v20`, fix: 'Upgrade Node.js to v20 or later' };
    }),
  );

  let s: Settings;
  try {
    s = loadSettings(root, env);
  } catch (err) {
    checks.push({
      name: 'Config file',
      status: 'fail',
      message: errorMessage(err),
      fix: 'Fix reelforge.config.yaml or remove it to use defaults',
    });
    return finish(checks);
  }
  checks.push(
    existsSync(paths.configFile)
      ? { name: 'Config file', status: 'pass', message: 'reelforge.config.yaml is valid' }
      : { name: 'Config file', status: 'warn', message: 'reelforge.config.yaml not found; using defaults and environment' },
  );
  const abs = (p: string): string => (isAbsolute(p) ? p : resolve(paths.root, p));

  checks.push(
    await check('Kill-switches', () => {
      const switches: Record<string, boolean> = {
        PIPELINE_ENABLED: s.pipelineEnabled,
        SCHEDULER_ENABLED: s.schedulerEnabled,
        WORKER_ENABLED: s.workerEnabled,
        UPLOAD_ENABLED: s.upload.enabled,
      };
      const off = Object.keys(switches).filter((name) => switches[name] === false);
      if (off.length === 0) return { status: 'pass', message: 'All subsystems enabled' };
      return { status: 'warn', message: `Disabled: ${off.join(', ')}` };
    }),
  );

  checks.push(
    await check('Probe binary', () => {
      if (exists(s.probe.bin)) return { status: 'pass', message: `${s.probe.bin} found` };
      return {
        status: 'fail',
        message: `${s.probe.bin} not found`,
        fix: 'Install ffmpeg (which provides ffprobe) or set PROBE_BIN',
      };
    }),
  );

  checks.push(
    await check('Queue directory writable', () => {
      const dir = abs(s.queueDir);
      if (isWritableDir(dir)) return { status: 'pass', message: `${s.queueDir} is writable` };
      return { status: 'fail', message: `${s.queueDir} is not writable`, fix: `Check permissions on ${dir}` };
    }),
  );

  checks.push(
    await check('Schedule plan', () => {
      const planPath = abs(s.scheduler.planPath);
      if (!existsSync(planPath)) {
        return { status: 'warn', message: `${s.scheduler.planPath} not found; the scheduler will record plan_parse_error` };
      }
      const plan = loadSchedulePlan(planPath, s.scheduler.timezone);
      return { status: 'pass', message: `${plan.entries.length} entries (${plan.timezone})` };
    }),
  );

  checks.push(
    await check('Agent command map', () => {
      const commandsPath = abs(s.supervisor.commandsPath);
      if (!existsSync(commandsPath)) {
        return { status: 'warn', message: `${s.supervisor.commandsPath} not found; agents use a placeholder command` };
      }
      const map = loadCommandMap(commandsPath);
      return { status: 'pass', message: `${Object.keys(map).length} commands configured` };
    }),
  );

  checks.push(
    await check('Upload credentials', () => {
      if (!s.upload.enabled) return { status: 'pass', message: 'Upload disabled; credentials not required' };
      const { credentials } = s.upload;
      const provided: Record<string, string | undefined> = {
        YOUTUBE_CLIENT_ID: credentials.clientId,
        YOUTUBE_CLIENT_SECRET: credentials.clientSecret,
        YOUTUBE_REFRESH_TOKEN: credentials.refreshToken,
      };
      const missing = Object.keys(provided).filter((name) => provided[name] === undefined);
      if (missing.length === 0) return { status: 'pass', message: 'YouTube credentials present' };
      return {
        status: 'fail',
        message: `Missing: ${missing.join(', ')}`,
        fix: 'Export the YouTube OAuth variables or set UPLOAD_ENABLED=false',
      };
    }),
  );

  checks.push(
    await check('API bind is loopback', () => {
      const host = s.api.host;
      if (host === '127.0.0.1' || host === 'localhost' || host === '::1') {
        return { status: 'pass', message: `API binds to ${host} (loopback)` };
      }
      return {
        status: 'warn',
        message: `API configured to bind to ${host} (non-loopback); the supervisor API has no auth`,
        fix: 'Set API_HOST=127.0.0.1',
      };
    }),
  );

  return finish(checks);
}

function finish(checks: DoctorCheck[]): DoctorReport {
  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';
  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');
  return { overall, checks, summary };
}
