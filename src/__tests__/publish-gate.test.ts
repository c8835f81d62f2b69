import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { ArtifactStore } from '../artifacts/store.js';
import { PublishGate, isRetryableStatus, type PublishSummary, type VideoUploader } from '../gates/publish-gate.js';
import { YouTubeUploader } from '../connector/youtube/uploader.js';
import {
  PublishFailedError,
  UploadApiError,
  UploadAuthMissingError,
  UploadDepsMissingError,
} from '../shared/errors.js';
import type { UploadSettings } from '../workspace/types.js';
import { createTempProject, testSettings, type TempProject } from './test-helpers.js';

const RUN = 'run_p';
const GATE_REL = `output/${RUN}/artifacts/quality_gate_summary.json`;
const PUBLISH_REL = `output/${RUN}/artifacts/publish_summary.json`;
const MP4_REL = `output/${RUN}/final.mp4`;

type UploadFn = VideoUploader['upload'];

describe('isRetryableStatus', () => {
  it('retries rate limits and server errors only', () => {
    expect([429, 500, 503, 599].map(isRetryableStatus)).toEqual([true, true, true, true]);
    expect([undefined, 400, 401, 404, 600].map(isRetryableStatus)).toEqual([false, false, false, false, false]);
  });
});

describe('PublishGate', () => {
  let project: TempProject;
  let store: ArtifactStore;
  let upload: jest.Mock<UploadFn>;
  let sleep: jest.Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    project = createTempProject();
    store = new ArtifactStore(project.root);
    upload = jest.fn<UploadFn>();
    sleep = jest.fn<(ms: number) => Promise<void>>(async () => undefined);
    project.writeJson(GATE_REL, { schema_version: 'v1', run_id: RUN, decision: 'pass', artifact_path: MP4_REL });
    project.write(MP4_REL, 'video-bytes');
  });

  afterEach(() => {
    project.cleanup();
  });

  function gate(overrides: Partial<UploadSettings> = {}, uploader: VideoUploader = { upload }): PublishGate {
    return new PublishGate({
      store,
      settings: testSettings({ upload: { backoffSeconds: 2, ...overrides } }).upload,
      uploader,
      sleep,
      now: () => new Date('2026-03-01T05:00:00Z'),
    });
  }

  function persisted(): PublishSummary {
    return JSON.parse(readFileSync(join(project.root, PUBLISH_REL), 'utf8'));
  }

  async function expectFailure(run: Promise<unknown>, code: string): Promise<PublishFailedError> {
    let caught: unknown;
    try {
      await run;
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PublishFailedError);
    if (!(caught instanceof PublishFailedError)) throw new Error('expected PublishFailedError');
    expect(caught.code).toBe(code);
    expect(caught.runId).toBe(RUN);
    return caught;
  }

  it('uploads after two transient failures', async () => {
    upload
      .mockRejectedValueOnce(new UploadApiError('YouTube video upload failed: 503', 503))
      .mockRejectedValueOnce(new UploadApiError('YouTube video upload failed: 503', 503))
      .mockResolvedValueOnce({ videoId: 'vid123' });

    const outcome = await gate({ maxRetries: 3 }).publish(RUN);

    expect(outcome.decision).toBe('uploaded');
    expect(outcome.summary).toMatchObject({
      attempt_count: 3,
      max_retries: 3,
      external_id: 'vid123',
      external_url: 'https://www.youtube.com/watch?v=vid123',
      input_artifact_path: MP4_REL,
      error: null,
    });
    expect(sleep.mock.calls).toEqual([[2000], [2000]]);
    expect(outcome.summaryPath).toBe(PUBLISH_REL);
    expect(persisted().decision).toBe('uploaded');
  });

  it('sends the artifact with default metadata', async () => {
    upload.mockResolvedValueOnce({ videoId: 'v1', url: 'https://videos.example.test/v1' });

    const outcome = await gate().publish(RUN);

    expect(upload).toHaveBeenCalledWith({
      filePath: join(project.root, MP4_REL),
      title: 'Video - run_p',
      description: 'Generated by reelforge.',
      tags: [],
      privacyStatus: 'unlisted',
    });
    expect(outcome.summary.external_url).toBe('https://videos.example.test/v1');
  });

  it('takes metadata from the run directory', async () => {
    project.writeJson(`output/${RUN}/metadata.json`, {
      title: '  Night markets  ',
      description: '',
      tags: ['food', 42, ' ', 'bangkok'],
    });
    upload.mockResolvedValueOnce({ videoId: 'v1' });

    const outcome = await gate({ privacyStatus: 'private' }).publish(RUN);

    expect(outcome.summary.metadata).toEqual({
      title: 'Night markets',
      description: 'Generated by reelforge.',
      tags: ['food', 'bangkok'],
    });
    expect(upload.mock.calls[0]?.[0].privacyStatus).toBe('private');
  });

  it('skips without uploading when uploads are disabled', async () => {
    const outcome = await gate({ enabled: false }).publish(RUN);

    expect(upload).not.toHaveBeenCalled();
    expect(outcome.decision).toBe('skipped');
    expect(outcome.summary.error).toEqual({
      code: 'upload_disabled',
      message: 'upload disabled by UPLOAD_ENABLED=false',
    });
    expect(persisted().decision).toBe('skipped');
  });

  it('skips on a dry run', async () => {
    const outcome = await gate().publish(RUN, { dryRun: true });
    expect(upload).not.toHaveBeenCalled();
    expect(outcome.summary.error).toEqual({ code: 'upload_disabled', message: 'dry run requested' });
  });

  it('skips when the quality gate did not pass', async () => {
    project.writeJson(GATE_REL, { schema_version: 'v1', decision: 'fail', artifact_path: MP4_REL });

    const outcome = await gate().publish(RUN);

    expect(upload).not.toHaveBeenCalled();
    expect(outcome.decision).toBe('skipped');
    expect(outcome.summary.error?.code).toBe('quality_gate_not_pass');
  });

  it.each([
    ['missing', null],
    ['malformed', '{"decision": '],
    ['without a decision', '{"schema_version": "v1"}'],
  ])('fails when the gate summary is %s', async (_label, content) => {
    if (content === null) rmSync(join(project.root, GATE_REL));
    else project.write(GATE_REL, content);

    const failure = await expectFailure(gate().publish(RUN), 'quality_gate_missing');

    expect(failure.attemptCount).toBe(0);
    expect(persisted()).toMatchObject({ decision: 'failed', error: { code: 'quality_gate_missing' } });
    expect(upload).not.toHaveBeenCalled();
  });

  it('fails when the gated artifact is missing or empty', async () => {
    project.write(MP4_REL, '');
    await expectFailure(gate().publish(RUN), 'input_artifact_missing');

    project.writeJson(GATE_REL, { schema_version: 'v1', decision: 'pass', artifact_path: '../../outside.mp4' });
    await expectFailure(gate().publish(RUN), 'input_artifact_missing');
    expect(persisted().input_artifact_path).toBeNull();
    expect(upload).not.toHaveBeenCalled();
  });

  it('does not retry missing credentials or dependencies', async () => {
    upload.mockRejectedValueOnce(new UploadAuthMissingError('YOUTUBE_CLIENT_ID'));
    const auth = await expectFailure(gate().publish(RUN), 'auth_missing_env');
    expect(auth.attemptCount).toBe(1);
    expect(persisted().error?.message).toBe('Missing required upload auth environment variable: YOUTUBE_CLIENT_ID');

    upload.mockRejectedValueOnce(new UploadDepsMissingError('upload client unavailable'));
    await expectFailure(gate().publish(RUN), 'upload_deps_missing');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not retry client errors or network failures', async () => {
    upload.mockRejectedValueOnce(new UploadApiError('YouTube upload initiation failed: 400', 400));
    const client = await expectFailure(gate().publish(RUN), 'api_error');
    expect(client.attemptCount).toBe(1);

    upload.mockRejectedValueOnce(new Error('socket hang up'));
    await expectFailure(gate().publish(RUN), 'api_error');
    expect(persisted().error).toEqual({ code: 'api_error', message: 'socket hang up' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the configured number of retries', async () => {
    upload.mockRejectedValue(new UploadApiError('YouTube video upload failed: 429', 429));

    const failure = await expectFailure(gate({ maxRetries: 2 }).publish(RUN), 'upload_failed_after_retries');

    expect(failure.attemptCount).toBe(3);
    expect(upload).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(persisted().error).toEqual({
      code: 'upload_failed_after_retries',
      message: 'Upload failed after 3 attempts: YouTube video upload failed: 429',
    });
  });

  it('makes a single attempt when retries are off', async () => {
    upload.mockRejectedValue(new UploadApiError('YouTube video upload failed: 500', 500));
    const failure = await expectFailure(gate({ maxRetries: 0 }).publish(RUN), 'upload_failed_after_retries');
    expect(failure.attemptCount).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('reports missing credentials from the YouTube uploader', async () => {
    const settings = testSettings({ upload: { credentials: { clientId: 'test-client' } } }).upload;
    const fetchMock = jest.fn<typeof fetch>();
    const uploader = new YouTubeUploader({ settings, fetch: fetchMock });

    await expectFailure(gate({}, uploader).publish(RUN), 'auth_missing_env');

    expect(fetchMock).not.toHaveBeenCalled();
    expect(persisted().error?.message).toBe('Missing required upload auth environment variable: YOUTUBE_CLIENT_SECRET');
  });
});
