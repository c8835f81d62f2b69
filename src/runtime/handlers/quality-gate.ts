import { QualityGate, QUALITY_GATE_SUMMARY_FILENAME } from '../../gates/quality-gate.js';
import type { ArtifactProber } from '../../gates/probe.js';
import { warnIfOutputDiffers } from './fixed-output.js';
import { runArtifactRel } from '../../workspace/paths.js';
import type { Settings } from '../../workspace/types.js';
import { configString, type StepHandler } from '../types.js';

export function createQualityGateHandler(proberFor: (settings: Settings) => ArtifactProber): StepHandler {
  return async (step, run) => {
    const summaryRel = runArtifactRel(run.runId, QUALITY_GATE_SUMMARY_FILENAME);
    warnIfOutputDiffers(step, run, summaryRel);
    if (run.dryRun) {
      return { output_path: summaryRel, planned_paths: [summaryRel], dry_run: true };
    }
    const gate = new QualityGate({
      store: run.store,
      prober: proberFor(run.settings),
      label: configString(step, 'label'),
      requiredStream: configString(step, 'required_stream'),
    });
    const outcome = await gate.evaluate(run.runId, configString(step, 'input_summary'));
    return outcome.summaryPath;
  };
}
