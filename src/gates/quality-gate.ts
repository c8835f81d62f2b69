/**
 * Validation gate for a run's rendered media artifact.
 *
 * Reads the render summary, runs the checks in dependency order and stops at
 * the first failure. The decision is always persisted before a failure is
 * raised, so downstream consumers (the publish gate, operators) can read it.
 */
import type { ArtifactStore } from '../artifacts/store.js';
import { assertRunId, assertSafeRelative } from '../artifacts/store.js';
import { ConfigurationError, QualityGateFailedError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { RenderSummarySchema, SCHEMA_VERSION } from '../shared/schemas.js';
import { runArtifactRel } from '../workspace/paths.js';
import type { ArtifactProber } from './probe.js';

export const QUALITY_GATE_ENGINE = 'quality_gate';
export const RENDER_SUMMARY_FILENAME = 'video_render_summary.json';
export const QUALITY_GATE_SUMMARY_FILENAME = 'quality_gate_summary.json';

export type GateDecision = 'pass' | 'fail';
export type ReasonSeverity = 'error' | 'warning';

export interface GateReason {
  code: string;
  message: string;
  severity: ReasonSeverity;
  engine: string;
  checked_at: string;
}

export interface GateChecks {
  artifact_exists: boolean;
  artifact_size_bytes: number | null;
  probe_ok: boolean | null;
  duration_seconds: number | null;
  has_required_stream: boolean | null;
}

export interface QualityGateSummary {
  schema_version: typeof SCHEMA_VERSION;
  engine: typeof QUALITY_GATE_ENGINE;
  run_id: string;
  checked_at: string;
  input_summary: string;
  artifact_path: string;
  decision: GateDecision;
  reasons: GateReason[];
  checks: GateChecks;
}

export interface QualityGateOutcome {
  decision: GateDecision;
  summaryPath: string;
  summary: QualityGateSummary;
}

export interface QualityGateOptions {
  store: ArtifactStore;
  prober: ArtifactProber;
  /** Prefix for the existence and size codes. */
  label?: string;
  /** Stream kind that must be present, e.g. `audio`. */
  requiredStream?: string;
  now?: () => Date;
}

export interface EvaluateOptions {
  /** Throw `QualityGateFailedError` after persisting a `fail` decision. */
  raiseOnFail?: boolean;
}

export class QualityGate {
  private readonly store: ArtifactStore;
  private readonly prober: ArtifactProber;
  private readonly label: string;
  private readonly requiredStream: string;
  private readonly now: () => Date;

  constructor(opts: QualityGateOptions) {
    this.store = opts.store;
    this.prober = opts.prober;
    this.label = opts.label ?? 'mp4';
    this.requiredStream = opts.requiredStream ?? 'audio';
    this.now = opts.now ?? (() => new Date());
  }

  async evaluate(
    runId: string,
    inputSummaryRel?: string,
    options: EvaluateOptions = {},
  ): Promise<QualityGateOutcome> {
    assertRunId(runId);
    const inputRel = inputSummaryRel ?? runArtifactRel(runId, RENDER_SUMMARY_FILENAME);
    const artifactRel = this.readArtifactPath(runId, inputRel);
    const checkedAt = this.now().toISOString();

    const reasons: GateReason[] = [];
    const checks: GateChecks = {
      artifact_exists: false,
      artifact_size_bytes: null,
      probe_ok: null,
      duration_seconds: null,
      has_required_stream: null,
    };
    const fail = (code: string, message: string): void => {
      reasons.push({ code, message, severity: 'error', engine: QUALITY_GATE_ENGINE, checked_at: checkedAt });
    };

    await this.runChecks(artifactRel, checks, fail);

    const decision: GateDecision = reasons.some((r) => r.severity === 'error') ? 'fail' : 'pass';
    const summary: QualityGateSummary = {
      schema_version: SCHEMA_VERSION,
      engine: QUALITY_GATE_ENGINE,
      run_id: runId,
      checked_at: checkedAt,
      input_summary: inputRel,
      artifact_path: artifactRel,
      decision,
      reasons,
      checks,
    };
    const summaryPath = this.store.writeJson(runArtifactRel(runId, QUALITY_GATE_SUMMARY_FILENAME), summary);
    logger.info('Quality gate evaluated', {
      run_id: runId,
      decision,
      codes: reasons.map((r) => r.code),
    });

    if (decision === 'fail' && (options.raiseOnFail ?? true)) {
      throw new QualityGateFailedError(runId, reasons.map((r) => r.code));
    }
    return { decision, summaryPath, summary };
  }

  private async runChecks(
    artifactRel: string,
    checks: GateChecks,
    fail: (code: string, message: string) => void,
  ): Promise<void> {
    if (!this.store.isFile(artifactRel)) {
      fail(`${this.label}_missing`, `Artifact not found: ${artifactRel}`);
      return;
    }
    checks.artifact_exists = true;

    const size = this.store.sizeOf(artifactRel);
    checks.artifact_size_bytes = size;
    if (size <= 0) {
      fail(`${this.label}_empty`, `Artifact is empty: ${artifactRel}`);
      return;
    }

    const probe = await this.prober.probe(this.store.resolve(artifactRel));
    checks.probe_ok = probe.ok;
    if (!probe.ok) {
      fail('probe_failed', probe.message);
      return;
    }

    checks.duration_seconds = probe.durationSeconds;
    if (probe.durationSeconds === null || probe.durationSeconds <= 0) {
      fail('duration_zero_or_missing', 'Media duration is zero or missing');
      return;
    }

    const hasStream = probe.streamKinds.includes(this.requiredStream);
    checks.has_required_stream = hasStream;
    if (!hasStream) {
      fail(`${this.requiredStream}_stream_missing`, `No ${this.requiredStream} stream found`);
    }
  }

  /** Malformed upstream input is a configuration problem, not a gate decision. */
  private readArtifactPath(runId: string, inputRel: string): string {
    if (!this.store.isFile(inputRel)) {
      throw new ConfigurationError(`Render summary not found: ${inputRel}`);
    }
    const raw = this.store.readJson(inputRel);
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ConfigurationError(`Render summary must be a JSON object: ${inputRel}`);
    }
    const parsed = RenderSummarySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid render summary ${inputRel} at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
      );
    }
    if (parsed.data.run_id !== undefined && parsed.data.run_id !== runId) {
      throw new ConfigurationError(
        `Render summary run_id mismatch: expected ${runId}, found ${parsed.data.run_id}`,
      );
    }
    try {
      return assertSafeRelative(parsed.data.output_mp4_path);
    } catch (err) {
      throw new ConfigurationError(
        `Invalid artifact path in ${inputRel}: ${parsed.data.output_mp4_path}`,
        err instanceof Error ? err : undefined,
      );
    }
  }
}
