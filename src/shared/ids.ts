import { createHash } from 'node:crypto';

/**
 * Default run id for ad-hoc runs: `run_<unix seconds>`.
 */
export function defaultRunId(now: Date = new Date()): string {
  return `run_${Math.floor(now.getTime() / 1000)}`;
}

/**
 * Deterministic short id: first `length` hex chars of sha256(seed).
 * The same schedule entry always maps to the same job id.
 */
export function deterministicId(seed: string, length = 12): string {
  return createHash('sha256').update(seed, 'utf8').digest('hex').slice(0, length);
}
