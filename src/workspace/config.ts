import { existsSync, readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { ProjectConfigSchema, type ProjectConfig } from '../shared/schemas.js';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getProjectPaths } from './paths.js';
import { nonEmpty, parseEnabledFlag, parseNonNegativeInt, parseNonNegativeNumber } from './env.js';
import type { PrivacyStatus, Settings } from './types.js';

export const DEFAULT_SETTINGS: Settings = Object.freeze<Settings>({
  pipelineEnabled: true,
  schedulerEnabled: true,
  workerEnabled: true,
  upload: {
    enabled: true,
    maxRetries: 3,
    backoffSeconds: 10,
    privacyStatus: 'unlisted',
    timeoutMs: 600_000,
    credentials: {},
  },
  probe: { bin: 'ffprobe', timeoutMs: 30_000 },
  scheduler: {
    timezone: 'Asia/Bangkok',
    windowMinutes: 10,
    planPath: 'config/schedule_plan.yaml',
  },
  queueDir: 'data/queue',
  supervisor: {
    commandsPath: 'config/agent_commands.yml',
    logDir: 'output/logs',
  },
  api: { host: '127.0.0.1', port: 7800 },
});

export function readProjectConfig(configPath: string): ProjectConfig {
  if (!existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${configPath}: ${errorMessage(err)}`, err instanceof Error ? err : undefined);
  }
  if (parsed === undefined || parsed === null) return {};
  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') || '(root)';
    throw new ConfigurationError(`Invalid config ${configPath} at ${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

function parsePrivacyStatus(value: string | undefined, fallback: PrivacyStatus): PrivacyStatus {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'private' || normalized === 'unlisted' || normalized === 'public') {
    return normalized;
  }
  logger.warn('Invalid privacy status, using fallback', { value, fallback });
  return fallback;
}

function flag(envValue: string | undefined, fileValue: boolean | undefined): boolean {
  if (envValue !== undefined && envValue.trim() !== '') return parseEnabledFlag(envValue);
  return fileValue ?? true;
}

/**
 * Resolve settings for the project at `root`. Environment variables win over
 * reelforge.config.yaml, which wins over the defaults.
 */
export function loadSettings(root: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const file = readProjectConfig(getProjectPaths(root).configFile);
  const d = DEFAULT_SETTINGS;

  const settings: Settings = {
    pipelineEnabled: flag(env['PIPELINE_ENABLED'], file.pipeline?.enabled),
    schedulerEnabled: flag(env['SCHEDULER_ENABLED'], file.scheduler?.enabled),
    workerEnabled: flag(env['WORKER_ENABLED'], file.worker?.enabled),
    upload: {
      enabled: flag(env['UPLOAD_ENABLED'], file.upload?.enabled),
      maxRetries: parseNonNegativeInt(env['UPLOAD_MAX_RETRIES'], file.upload?.max_retries ?? d.upload.maxRetries),
      backoffSeconds: parseNonNegativeNumber(
        env['UPLOAD_BACKOFF_SECONDS'],
        file.upload?.backoff_seconds ?? d.upload.backoffSeconds,
      ),
      privacyStatus: parsePrivacyStatus(
        nonEmpty(env['UPLOAD_PRIVACY_STATUS']) ?? file.upload?.privacy_status,
        d.upload.privacyStatus,
      ),
      timeoutMs: parseNonNegativeInt(env['UPLOAD_TIMEOUT_MS'], file.upload?.timeout_ms ?? d.upload.timeoutMs) || d.upload.timeoutMs,
      credentials: {
        clientId: nonEmpty(env['YOUTUBE_CLIENT_ID']),
        clientSecret: nonEmpty(env['YOUTUBE_CLIENT_SECRET']),
        refreshToken: nonEmpty(env['YOUTUBE_REFRESH_TOKEN']),
      },
    },
    probe: {
      bin: nonEmpty(env['PROBE_BIN']) ?? file.probe?.bin ?? d.probe.bin,
      timeoutMs: parseNonNegativeInt(env['PROBE_TIMEOUT_MS'], file.probe?.timeout_ms ?? d.probe.timeoutMs) || d.probe.timeoutMs,
    },
    scheduler: {
      timezone: nonEmpty(env['SCHEDULER_TIMEZONE']) ?? file.scheduler?.timezone ?? d.scheduler.timezone,
      windowMinutes: file.scheduler?.window_minutes ?? d.scheduler.windowMinutes,
      planPath: file.scheduler?.plan_path ?? d.scheduler.planPath,
    },
    queueDir: file.queue?.dir ?? d.queueDir,
    supervisor: {
      commandsPath: file.supervisor?.commands_path ?? d.supervisor.commandsPath,
      logDir: file.supervisor?.log_dir ?? d.supervisor.logDir,
    },
    api: {
      host: nonEmpty(env['API_HOST']) ?? file.api?.host ?? d.api.host,
      port: parseNonNegativeInt(env['API_PORT'], file.api?.port ?? d.api.port) || d.api.port,
    },
  };
  return Object.freeze(settings);
}

