import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { ArtifactStore } from '../artifacts/store.js';
import { QualityGate, type QualityGateOptions } from '../gates/quality-gate.js';
import { FfprobeProber, parseProbeOutput, type ArtifactProber, type ProbeResult } from '../gates/probe.js';
import { ConfigurationError, QualityGateFailedError } from '../shared/errors.js';
import { createMockChild, createTempProject, flush, mockSpawn, type TempProject } from './test-helpers.js';

const RUN = 'run_q';
const SUMMARY_REL = `output/${RUN}/artifacts/video_render_summary.json`;
const GATE_REL = `output/${RUN}/artifacts/quality_gate_summary.json`;
const MP4_REL = `output/${RUN}/final.mp4`;

class FakeProber implements ArtifactProber {
  readonly probed: string[] = [];

  constructor(private readonly result: ProbeResult) {}

  async probe(absPath: string): Promise<ProbeResult> {
    this.probed.push(absPath);
    return this.result;
  }
}

const HEALTHY: ProbeResult = { ok: true, durationSeconds: 12.5, streamKinds: ['video', 'audio'] };

describe('QualityGate', () => {
  let project: TempProject;
  let store: ArtifactStore;

  beforeEach(() => {
    project = createTempProject();
    store = new ArtifactStore(project.root);
    project.writeJson(SUMMARY_REL, { schema_version: 'v1', run_id: RUN, output_mp4_path: MP4_REL });
  });

  afterEach(() => {
    project.cleanup();
  });

  function gate(prober: ArtifactProber, extra: Partial<QualityGateOptions> = {}): QualityGate {
    return new QualityGate({ store, prober, now: () => new Date('2026-03-01T04:00:00Z'), ...extra });
  }

  function persisted(): { decision: string; reasons: Array<{ code: string }> } {
    return JSON.parse(readFileSync(join(project.root, GATE_REL), 'utf8'));
  }

  it('fails on a missing artifact and still writes its decision', async () => {
    const prober = new FakeProber(HEALTHY);

    const run = gate(prober).evaluate(RUN);

    await expect(run).rejects.toBeInstanceOf(QualityGateFailedError);
    await expect(run).rejects.toThrow('Quality gate failed for run_id=run_q; reasons=mp4_missing');
    expect(prober.probed).toEqual([]);
    const summary = persisted();
    expect(summary.decision).toBe('fail');
    expect(summary.reasons).toEqual([
      {
        code: 'mp4_missing',
        message: `Artifact not found: ${MP4_REL}`,
        severity: 'error',
        engine: 'quality_gate',
        checked_at: '2026-03-01T04:00:00.000Z',
      },
    ]);
  });

  it('returns the failed outcome when asked not to raise', async () => {
    const outcome = await gate(new FakeProber(HEALTHY)).evaluate(RUN, undefined, { raiseOnFail: false });
    expect(outcome.decision).toBe('fail');
    expect(outcome.summaryPath).toBe(GATE_REL);
    expect(outcome.summary.checks).toEqual({
      artifact_exists: false,
      artifact_size_bytes: null,
      probe_ok: null,
      duration_seconds: null,
      has_required_stream: null,
    });
  });

  it('stops at an empty artifact before probing', async () => {
    project.write(MP4_REL, '');
    const prober = new FakeProber(HEALTHY);

    const outcome = await gate(prober).evaluate(RUN, undefined, { raiseOnFail: false });

    expect(outcome.summary.reasons.map((r) => r.code)).toEqual(['mp4_empty']);
    expect(outcome.summary.checks).toMatchObject({ artifact_exists: true, artifact_size_bytes: 0 });
    expect(prober.probed).toEqual([]);
  });

  it('reports a probe failure', async () => {
    project.write(MP4_REL, 'not really a video');
    const outcome = await gate(new FakeProber({ ok: false, message: 'probe exited with code 1' })).evaluate(
      RUN,
      undefined,
      { raiseOnFail: false },
    );

    expect(outcome.summary.reasons.map((r) => [r.code, r.message])).toEqual([['probe_failed', 'probe exited with code 1']]);
    expect(outcome.summary.checks.probe_ok).toBe(false);
  });

  it.each([null, 0])('fails a duration of %p', async (duration) => {
    project.write(MP4_REL, 'bytes');
    const prober = new FakeProber({ ok: true, durationSeconds: duration, streamKinds: ['video', 'audio'] });

    const outcome = await gate(prober).evaluate(RUN, undefined, { raiseOnFail: false });

    expect(outcome.summary.reasons.map((r) => r.code)).toEqual(['duration_zero_or_missing']);
  });

  it('requires an audio stream by default', async () => {
    project.write(MP4_REL, 'bytes');
    const prober = new FakeProber({ ok: true, durationSeconds: 3, streamKinds: ['video'] });

    await expect(gate(prober).evaluate(RUN)).rejects.toThrow('reasons=audio_stream_missing');
    expect(persisted().reasons.map((r) => r.code)).toEqual(['audio_stream_missing']);
  });

  it('passes a healthy artifact', async () => {
    project.write(MP4_REL, 'bytes');
    const prober = new FakeProber(HEALTHY);

    const outcome = await gate(prober).evaluate(RUN);

    expect(outcome.decision).toBe('pass');
    expect(prober.probed).toEqual([join(project.root, MP4_REL)]);
    expect(outcome.summary).toMatchObject({
      engine: 'quality_gate',
      run_id: RUN,
      input_summary: SUMMARY_REL,
      artifact_path: MP4_REL,
      reasons: [],
      checks: {
        artifact_exists: true,
        artifact_size_bytes: 5,
        probe_ok: true,
        duration_seconds: 12.5,
        has_required_stream: true,
      },
    });
    expect(persisted().decision).toBe('pass');
  });

  it('uses the configured label and stream kind in its codes', async () => {
    const outcome = await gate(new FakeProber(HEALTHY), { label: 'clip', requiredStream: 'subtitle' }).evaluate(
      RUN,
      undefined,
      { raiseOnFail: false },
    );
    expect(outcome.summary.reasons.map((r) => r.code)).toEqual(['clip_missing']);

    project.write(MP4_REL, 'bytes');
    const second = await gate(new FakeProber(HEALTHY), { requiredStream: 'subtitle' }).evaluate(RUN, undefined, {
      raiseOnFail: false,
    });
    expect(second.summary.reasons.map((r) => r.code)).toEqual(['subtitle_stream_missing']);
  });

  it('reads a render summary from an explicit path', async () => {
    project.writeJson('elsewhere/render.json', { schema_version: 'v1', output_mp4_path: MP4_REL });
    project.write(MP4_REL, 'bytes');

    const outcome = await gate(new FakeProber(HEALTHY)).evaluate(RUN, 'elsewhere/render.json');

    expect(outcome.summary.input_summary).toBe('elsewhere/render.json');
  });

  it.each([
    ['a missing summary', null],
    ['an array', []],
    ['a wrong schema version', { schema_version: 'v0', output_mp4_path: MP4_REL }],
    ['a blank path', { schema_version: 'v1', output_mp4_path: '  ' }],
    ['a path outside the root', { schema_version: 'v1', output_mp4_path: '../../etc/passwd' }],
    ['another run', { schema_version: 'v1', run_id: 'run_other', output_mp4_path: MP4_REL }],
  ])('treats %s as a configuration error', async (_label, content) => {
    if (content === null) rmSync(join(project.root, SUMMARY_REL));
    else project.writeJson(SUMMARY_REL, content);

    await expect(gate(new FakeProber(HEALTHY)).evaluate(RUN)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects an invalid run id', async () => {
    await expect(gate(new FakeProber(HEALTHY)).evaluate('../run')).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('parseProbeOutput', () => {
  it('reads duration and stream kinds', () => {
    expect(
      parseProbeOutput('{"format":{"duration":"12.500000"},"streams":[{"codec_type":"video"},{"codec_type":"audio"}]}'),
    ).toEqual({ ok: true, durationSeconds: 12.5, streamKinds: ['video', 'audio'] });
  });

  it('reports a missing duration as null', () => {
    expect(parseProbeOutput('{"streams":[]}')).toEqual({ ok: true, durationSeconds: null, streamKinds: [] });
    expect(parseProbeOutput('{"format":{"duration":"N/A"}}')).toEqual({
      ok: true,
      durationSeconds: null,
      streamKinds: [],
    });
  });

  it('rejects unusable output', () => {
    expect(parseProbeOutput('not json')).toEqual({ ok: false, message: 'probe returned invalid JSON' });
    expect(parseProbeOutput('{"streams":"many"}')).toEqual({ ok: false, message: 'probe returned an unexpected payload' });
  });
});

describe('FfprobeProber', () => {
  it('runs the probe binary and parses its JSON', async () => {
    const mock = createMockChild();
    const spawn = mockSpawn(mock);
    const prober = new FfprobeProber({ bin: '/opt/bin/ffprobe', spawn: spawn.spawn });

    const pending = prober.probe('/data/final.mp4');
    mock.stdout.write('{"format":{"duration":"4.0"},');
    mock.stdout.write('"streams":[{"codec_type":"audio"}]}');
    await flush();
    mock.exit(0);

    expect(await pending).toEqual({ ok: true, durationSeconds: 4, streamKinds: ['audio'] });
    expect(spawn.calls.mock.calls[0]?.[0]).toBe('/opt/bin/ffprobe');
    expect(spawn.calls.mock.calls[0]?.[1]).toEqual([
      '-v',
      'error',
      '-show_entries',
      'format=duration:stream=codec_type',
      '-of',
      'json',
      '/data/final.mp4',
    ]);
  });

  it('reports a non-zero exit with its stderr', async () => {
    const mock = createMockChild();
    const prober = new FfprobeProber({ spawn: mockSpawn(mock).spawn });

    const pending = prober.probe('/data/final.mp4');
    mock.stderr.write('/data/final.mp4: Invalid data found\n');
    await flush();
    mock.exit(1);

    expect(await pending).toEqual({
      ok: false,
      message: 'probe exited with code 1: /data/final.mp4: Invalid data found',
    });
  });

  it('reports a binary that cannot start', async () => {
    const mock = createMockChild(undefined);
    const prober = new FfprobeProber({ spawn: mockSpawn(mock).spawn });

    const pending = prober.probe('/data/final.mp4');
    mock.child.emit('error', new Error('spawn ffprobe ENOENT'));

    expect(await pending).toEqual({ ok: false, message: 'probe could not start: spawn ffprobe ENOENT' });
  });

  it('kills a probe that runs too long', async () => {
    const mock = createMockChild();
    const prober = new FfprobeProber({ timeoutMs: 20, spawn: mockSpawn(mock).spawn });

    const result = await prober.probe('/data/final.mp4');

    expect(result).toEqual({ ok: false, message: 'probe timed out after 20 ms' });
    expect(mock.kill).toHaveBeenCalledWith('SIGKILL');
  });
});
