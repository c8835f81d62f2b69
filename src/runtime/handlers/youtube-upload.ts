import { PublishGate, PUBLISH_SUMMARY_FILENAME, type VideoUploader } from '../../gates/publish-gate.js';
import { warnIfOutputDiffers } from './fixed-output.js';
import { runArtifactRel } from '../../workspace/paths.js';
import type { Settings } from '../../workspace/types.js';
import type { StepHandler } from '../types.js';

export function createYouTubeUploadHandler(
  uploaderFor: (settings: Settings) => VideoUploader,
  sleep?: (ms: number) => Promise<void>,
): StepHandler {
  return async (step, run) => {
    const summaryRel = runArtifactRel(run.runId, PUBLISH_SUMMARY_FILENAME);
    warnIfOutputDiffers(step, run, summaryRel);
    if (run.dryRun) {
      return { output_path: summaryRel, planned_paths: [summaryRel], dry_run: true };
    }
    const gate = new PublishGate({
      store: run.store,
      settings: run.settings.upload,
      uploader: uploaderFor(run.settings),
      sleep,
    });
    // A step-level dry_run in an otherwise live plan acts as a per-call disable.
    const outcome = await gate.publish(run.runId, { dryRun: step.config?.['dry_run'] === true });
    return outcome.summaryPath;
  };
}
