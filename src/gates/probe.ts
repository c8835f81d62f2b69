import { spawn } from 'node:child_process';
import { z } from 'zod';
import { logger } from '../shared/logger.js';

export type SpawnFn = typeof spawn;

export type ProbeResult =
  | { ok: true; durationSeconds: number | null; streamKinds: string[] }
  | { ok: false; message: string };

/** Inspects a media file. The gate only ever sees this interface. */
export interface ArtifactProber {
  probe(absPath: string): Promise<ProbeResult>;
}

export interface FfprobeProberOptions {
  bin?: string;
  timeoutMs?: number;
  spawn?: SpawnFn;
}

const FfprobeOutputSchema = z.object({
  format: z.object({ duration: z.union([z.string(), z.number()]).optional() }).passthrough().optional(),
  streams: z.array(z.object({ codec_type: z.string().optional() }).passthrough()).optional(),
});

export function parseProbeOutput(stdout: string): ProbeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    return { ok: false, message: 'probe returned invalid JSON' };
  }
  const parsed = FfprobeOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, message: 'probe returned an unexpected payload' };
  }
  const rawDuration = parsed.data.format?.duration;
  const duration = rawDuration === undefined ? NaN : Number(rawDuration);
  const streamKinds = (parsed.data.streams ?? [])
    .map((s) => s.codec_type)
    .filter((kind): kind is string => typeof kind === 'string' && kind.length > 0);
  return {
    ok: true,
    durationSeconds: Number.isFinite(duration) ? duration : null,
    streamKinds,
  };
}

/**
 * Runs `ffprobe -v error -show_entries format=duration:stream=codec_type -of json <file>`
 * and reports duration and stream kinds. A missing binary, non-zero exit or
 * timeout is reported as `{ ok: false }`, never thrown.
 */
export class FfprobeProber implements ArtifactProber {
  private readonly bin: string;
  private readonly timeoutMs: number;
  private readonly spawnImpl: SpawnFn;

  constructor(opts: FfprobeProberOptions = {}) {
    this.bin = opts.bin ?? 'ffprobe';
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.spawnImpl = opts.spawn ?? spawn;
  }

  probe(absPath: string): Promise<ProbeResult> {
    const args = ['-v', 'error', '-show_entries', 'format=duration:stream=codec_type', '-of', 'json', absPath];
    return new Promise((resolve) => {
      let settled = false;
      const finish = (result: ProbeResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const child = this.spawnImpl(this.bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      const timer = setTimeout(() => {
        logger.warn('Probe timed out', { bin: this.bin, timeout_ms: this.timeoutMs });
        child.kill('SIGKILL');
        finish({ ok: false, message: `probe timed out after ${this.timeoutMs} ms` });
      }, this.timeoutMs);

      child.stdout.on('data', (chunk) => stdoutChunks.push(Buffer.from(chunk)));
      child.stderr.on('data', (chunk) => stderrChunks.push(Buffer.from(chunk)));

      child.on('error', (err) => {
        finish({ ok: false, message: `probe could not start: ${err.message}` });
      });

      child.on('close', (code) => {
        const stdout = Buffer.concat(stdoutChunks).toString('utf8');
        const stderr = Buffer.concat(stderrChunks).toString('utf8').trim();
        if (code !== 0) {
          finish({ ok: false, message: `probe exited with code ${code}${stderr ? `: ${stderr}` : ''}` });
          return;
        }
        finish(parseProbeOutput(stdout));
      });
    });
  }
}
