import { join, resolve } from 'node:path';
import type { ProjectPaths } from './types.js';

export const CONFIG_FILENAME = 'reelforge.config.yaml';

export function getProjectPaths(cwd: string = process.cwd()): ProjectPaths {
  const root = resolve(cwd);
  const outputDir = join(root, 'output');
  return {
    root,
    configFile: join(root, CONFIG_FILENAME),
    outputDir,
    schedulerArtifacts: join(outputDir, 'scheduler', 'artifacts'),
    workerArtifacts: join(outputDir, 'worker', 'artifacts'),
  };
}

/** Root-relative run directory. Artifacts of a run live under it. */
export function runDirRel(runId: string): string {
  return `output/${runId}`;
}

/** Root-relative path of a file in the run's artifacts/ folder. */
export function runArtifactRel(runId: string, filename: string): string {
  return `output/${runId}/artifacts/${filename}`;
}
