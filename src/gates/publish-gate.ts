/**
 * Publish gate: uploads a run's gated artifact with bounded retries.
 *
 * The outcome file `output/<runId>/artifacts/publish_summary.json` is
 * overwritten on every call and always written before a failure is raised.
 */
import type { ArtifactStore } from '../artifacts/store.js';
import { assertRunId, assertSafeRelative } from '../artifacts/store.js';
import {
  PublishFailedError,
  UploadApiError,
  UploadAuthMissingError,
  UploadDepsMissingError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { GateSummaryRefSchema, PublishMetadataSchema, SCHEMA_VERSION } from '../shared/schemas.js';
import type { PrivacyStatus, UploadSettings } from '../workspace/types.js';
import { runArtifactRel, runDirRel } from '../workspace/paths.js';
import { QUALITY_GATE_SUMMARY_FILENAME } from './quality-gate.js';

export const PUBLISH_ENGINE = 'publish_gate';
export const PUBLISH_SUMMARY_FILENAME = 'publish_summary.json';

export type PublishCode =
  | 'upload_disabled'
  | 'quality_gate_missing'
  | 'quality_gate_not_pass'
  | 'input_artifact_missing'
  | 'auth_missing_env'
  | 'upload_deps_missing'
  | 'api_error'
  | 'upload_failed_after_retries';

export type PublishDecision = 'uploaded' | 'skipped' | 'failed';

export interface UploadRequest {
  /** Absolute path of the file to send. */
  filePath: string;
  title: string;
  description: string;
  tags: string[];
  privacyStatus: PrivacyStatus;
}

export interface UploadResult {
  videoId: string;
  url?: string;
}

export interface VideoUploader {
  upload(req: UploadRequest): Promise<UploadResult>;
}

export interface PublishMetadata {
  title: string;
  description: string;
  tags: string[];
}

export interface PublishSummary {
  schema_version: typeof SCHEMA_VERSION;
  engine: typeof PUBLISH_ENGINE;
  run_id: string;
  checked_at: string;
  quality_gate_summary: string;
  input_artifact_path: string | null;
  decision: PublishDecision;
  privacy_status: PrivacyStatus;
  attempt_count: number;
  max_retries: number;
  backoff_seconds: number;
  external_id: string | null;
  external_url: string | null;
  error: { code: PublishCode; message: string } | null;
  metadata: PublishMetadata;
}

export interface PublishOutcome {
  decision: PublishDecision;
  summaryPath: string;
  summary: PublishSummary;
}

export interface PublishGateOptions {
  store: ArtifactStore;
  settings: UploadSettings;
  uploader: VideoUploader;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

export function isRetryableStatus(status: number | undefined): boolean {
  return status === 429 || (status !== undefined && status >= 500 && status <= 599);
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export class PublishGate {
  private readonly store: ArtifactStore;
  private readonly settings: UploadSettings;
  private readonly uploader: VideoUploader;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(opts: PublishGateOptions) {
    this.store = opts.store;
    this.settings = opts.settings;
    this.uploader = opts.uploader;
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? (() => new Date());
  }

  async publish(runId: string, opts: { dryRun?: boolean } = {}): Promise<PublishOutcome> {
    assertRunId(runId);
    const gateRel = runArtifactRel(runId, QUALITY_GATE_SUMMARY_FILENAME);
    const summary: PublishSummary = {
      schema_version: SCHEMA_VERSION,
      engine: PUBLISH_ENGINE,
      run_id: runId,
      checked_at: this.now().toISOString(),
      quality_gate_summary: gateRel,
      input_artifact_path: null,
      decision: 'skipped',
      privacy_status: this.settings.privacyStatus,
      attempt_count: 0,
      max_retries: this.settings.maxRetries,
      backoff_seconds: this.settings.backoffSeconds,
      external_id: null,
      external_url: null,
      error: null,
      metadata: this.readMetadata(runId),
    };

    if (!this.settings.enabled || opts.dryRun === true) {
      const reason = opts.dryRun === true ? 'dry run requested' : 'upload disabled by UPLOAD_ENABLED=false';
      return this.finish(summary, 'skipped', { code: 'upload_disabled', message: reason });
    }

    const gate = this.readGateSummary(gateRel);
    if (gate === null) {
      return this.finish(summary, 'failed', {
        code: 'quality_gate_missing',
        message: `Quality gate summary missing or invalid: ${gateRel}`,
      });
    }
    if (gate.decision !== 'pass') {
      return this.finish(summary, 'skipped', {
        code: 'quality_gate_not_pass',
        message: `Quality gate decision is ${gate.decision}`,
      });
    }

    const artifactRel = this.gatedArtifact(gate.artifact_path);
    summary.input_artifact_path = artifactRel;
    if (artifactRel === null || !this.store.isFile(artifactRel) || this.store.sizeOf(artifactRel) <= 0) {
      return this.finish(summary, 'failed', {
        code: 'input_artifact_missing',
        message: `Gated artifact missing or empty: ${gate.artifact_path ?? '(none)'}`,
      });
    }

    const request: UploadRequest = {
      filePath: this.store.resolve(artifactRel),
      title: summary.metadata.title,
      description: summary.metadata.description,
      tags: summary.metadata.tags,
      privacyStatus: this.settings.privacyStatus,
    };
    return this.uploadWithRetries(summary, request);
  }

  private async uploadWithRetries(summary: PublishSummary, request: UploadRequest): Promise<PublishOutcome> {
    const maxAttempts = 1 + this.settings.maxRetries;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      summary.attempt_count = attempt;
      try {
        const result = await this.uploader.upload(request);
        summary.external_id = result.videoId;
        summary.external_url = result.url ?? watchUrl(result.videoId);
        return this.finish(summary, 'uploaded', null);
      } catch (err) {
        if (err instanceof UploadAuthMissingError) {
          return this.finish(summary, 'failed', { code: 'auth_missing_env', message: err.message });
        }
        if (err instanceof UploadDepsMissingError) {
          return this.finish(summary, 'failed', { code: 'upload_deps_missing', message: err.message });
        }
        const status = err instanceof UploadApiError ? err.status : undefined;
        if (!isRetryableStatus(status)) {
          return this.finish(summary, 'failed', { code: 'api_error', message: errorMessage(err) });
        }
        if (attempt === maxAttempts) {
          return this.finish(summary, 'failed', {
            code: 'upload_failed_after_retries',
            message: `Upload failed after ${attempt} attempts: ${errorMessage(err)}`,
          });
        }
        logger.warn('Upload attempt failed, retrying', {
          run_id: summary.run_id,
          attempt,
          status,
          backoff_seconds: this.settings.backoffSeconds,
        });
        await this.sleep(this.settings.backoffSeconds * 1000);
      }
    }
    // maxAttempts >= 1, so the loop always returns
    throw new PublishFailedError(summary.run_id, 'upload_failed_after_retries', summary.attempt_count);
  }

  private finish(
    summary: PublishSummary,
    decision: PublishDecision,
    error: PublishSummary['error'],
  ): PublishOutcome {
    summary.decision = decision;
    summary.error = error;
    const summaryPath = this.store.writeJson(runArtifactRel(summary.run_id, PUBLISH_SUMMARY_FILENAME), summary);
    logger.info('Publish gate decided', {
      run_id: summary.run_id,
      decision,
      code: error?.code,
      attempt_count: summary.attempt_count,
    });
    if (decision === 'failed' && error !== null) {
      throw new PublishFailedError(summary.run_id, error.code, summary.attempt_count);
    }
    return { decision, summaryPath, summary };
  }

  private readGateSummary(gateRel: string): { decision: string; artifact_path?: string } | null {
    let raw: unknown;
    try {
      raw = this.store.readJsonIfExists(gateRel);
    } catch (err) {
      logger.warn('Unreadable quality gate summary', { path: gateRel, error: errorMessage(err) });
      return null;
    }
    const parsed = GateSummaryRefSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private gatedArtifact(artifactPath: string | undefined): string | null {
    if (artifactPath === undefined || artifactPath.trim() === '') return null;
    try {
      const rel = assertSafeRelative(artifactPath);
      this.store.resolve(rel);
      return rel;
    } catch (err) {
      logger.warn('Rejected gated artifact path', { path: artifactPath, error: errorMessage(err) });
      return null;
    }
  }

  private readMetadata(runId: string): PublishMetadata {
    const defaults: PublishMetadata = {
      title: `Video - ${runId}`,
      description: 'Generated by reelforge.',
      tags: [],
    };
    let raw: unknown;
    try {
      raw = this.store.readJsonIfExists(`${runDirRel(runId)}/metadata.json`);
    } catch (err) {
      logger.warn('Ignoring unreadable metadata.json', { run_id: runId, error: errorMessage(err) });
      return defaults;
    }
    const parsed = PublishMetadataSchema.safeParse(raw);
    if (!parsed.success) return defaults;
    const title = parsed.data.title?.trim();
    const description = parsed.data.description?.trim();
    return {
      title: title ? title : defaults.title,
      description: description ? description : defaults.description,
      tags: (parsed.data.tags ?? []).filter((t): t is string => typeof t === 'string' && t.trim() !== ''),
    };
  }
}
