import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { loadSettings, readProjectConfig, DEFAULT_SETTINGS } from '../workspace/config.js';
import { parseEnabledFlag, parseNonNegativeInt, parseNonNegativeNumber } from '../workspace/env.js';
import { ConfigurationError } from '../shared/errors.js';
import { createTempProject, type TempProject } from './test-helpers.js';

describe('parseEnabledFlag', () => {
  it('treats unset and blank as the default', () => {
    expect(parseEnabledFlag(undefined)).toBe(true);
    expect(parseEnabledFlag('   ')).toBe(true);
    expect(parseEnabledFlag(undefined, false)).toBe(false);
  });

  it.each(['false', '0', 'no', 'off', 'disabled', ' FALSE ', 'Off'])('reads %p as disabled', (value) => {
    expect(parseEnabledFlag(value)).toBe(false);
  });

  it.each(['true', '1', 'yes', 'on', 'anything'])('reads %p as enabled', (value) => {
    expect(parseEnabledFlag(value)).toBe(true);
  });
});

describe('DEFAULT_SETTINGS', () => {
  it('is frozen and typed with the narrow privacy status', () => {
    const privacy: 'private' | 'unlisted' | 'public' = DEFAULT_SETTINGS.upload.privacyStatus;
    expect(privacy).toBe('unlisted');
    expect(Object.isFrozen(DEFAULT_SETTINGS)).toBe(true);
    expect(DEFAULT_SETTINGS.upload).toMatchObject({ maxRetries: 3, backoffSeconds: 10 });
  });
});

describe('numeric env parsing', () => {
  it('falls back on negative or garbage input', () => {
    expect(parseNonNegativeInt('5', 3)).toBe(5);
    expect(parseNonNegativeInt('-1', 3)).toBe(3);
    expect(parseNonNegativeInt('2.5', 3)).toBe(3);
    expect(parseNonNegativeInt('abc', 3)).toBe(3);
    expect(parseNonNegativeNumber('0.5', 10)).toBe(0.5);
    expect(parseNonNegativeNumber('-2', 10)).toBe(10);
    expect(parseNonNegativeNumber('NaN', 10)).toBe(10);
  });
});

describe('loadSettings', () => {
  let project: TempProject;

  beforeEach(() => {
    project = createTempProject();
  });

  afterEach(() => {
    project.cleanup();
  });

  it('returns defaults when there is no config file and no env', () => {
    const settings = loadSettings(project.root, {});
    expect(settings.pipelineEnabled).toBe(true);
    expect(settings.upload.maxRetries).toBe(DEFAULT_SETTINGS.upload.maxRetries);
    expect(settings.scheduler.timezone).toBe('Asia/Bangkok');
    expect(settings.queueDir).toBe('data/queue');
    expect(settings.upload.credentials).toEqual({
      clientId: undefined,
      clientSecret: undefined,
      refreshToken: undefined,
    });
  });

  it('reads the config file and lets env win over it', () => {
    project.write(
      'reelforge.config.yaml',
      [
        'scheduler:',
        '  enabled: false',
        '  timezone: UTC',
        '  window_minutes: 30',
        'upload:',
        '  enabled: false',
        '  max_retries: 1',
        '  privacy_status: private',
        'queue:',
        '  dir: var/jobs',
      ].join('\n'),
    );

    const fromFile = loadSettings(project.root, {});
    expect(fromFile.schedulerEnabled).toBe(false);
    expect(fromFile.scheduler).toMatchObject({ timezone: 'UTC', windowMinutes: 30 });
    expect(fromFile.upload).toMatchObject({ enabled: false, maxRetries: 1, privacyStatus: 'private' });
    expect(fromFile.queueDir).toBe('var/jobs');

    const overridden = loadSettings(project.root, {
      SCHEDULER_ENABLED: 'true',
      UPLOAD_ENABLED: 'yes',
      UPLOAD_MAX_RETRIES: '4',
      UPLOAD_PRIVACY_STATUS: 'PUBLIC',
      SCHEDULER_TIMEZONE: 'Europe/Berlin',
      YOUTUBE_CLIENT_ID: 'test-client',
    });
    expect(overridden.schedulerEnabled).toBe(true);
    expect(overridden.upload).toMatchObject({ enabled: true, maxRetries: 4, privacyStatus: 'public' });
    expect(overridden.upload.credentials.clientId).toBe('test-client');
    expect(overridden.scheduler.timezone).toBe('Europe/Berlin');
  });

  it('turns each kill-switch off from the environment', () => {
    const settings = loadSettings(project.root, {
      PIPELINE_ENABLED: 'false',
      SCHEDULER_ENABLED: '0',
      WORKER_ENABLED: 'off',
      UPLOAD_ENABLED: 'disabled',
    });
    expect(settings.pipelineEnabled).toBe(false);
    expect(settings.schedulerEnabled).toBe(false);
    expect(settings.workerEnabled).toBe(false);
    expect(settings.upload.enabled).toBe(false);
  });

  it('falls back to unlisted for an unknown privacy status', () => {
    const settings = loadSettings(project.root, { UPLOAD_PRIVACY_STATUS: 'friends-only' });
    expect(settings.upload.privacyStatus).toBe('unlisted');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadSettings(project.root, {}))).toBe(true);
  });

  it('rejects unknown keys and malformed YAML', () => {
    project.write('reelforge.config.yaml', 'pipline:\n  enabled: false\n');
    expect(() => loadSettings(project.root, {})).toThrow(ConfigurationError);

    project.write('reelforge.config.yaml', 'upload: [unclosed\n');
    expect(() => readProjectConfig(`${project.root}/reelforge.config.yaml`)).toThrow(ConfigurationError);
  });

  it('treats an empty config file as no config', () => {
    project.write('reelforge.config.yaml', '');
    expect(readProjectConfig(`${project.root}/reelforge.config.yaml`)).toEqual({});
  });
});
