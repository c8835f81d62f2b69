/**
 * artifact.write: writes `config.content`, or the `input_from` artifact(s),
 * to `<runDir>/<output>`.
 */
import { ConfigurationError } from '../../shared/errors.js';
import type { RunContext, StepHandler, StepOutput, StepSpec } from '../types.js';

function renderContent(step: StepSpec, run: RunContext): string {
  const content = step.config?.['content'];
  if (typeof content === 'string') return content;
  if (content !== undefined) return JSON.stringify(content, null, 2) + '\n';

  if (typeof step.input_from === 'string') {
    return run.store.readText(`${run.runDir}/${step.input_from}`);
  }
  if (step.input_from !== undefined) {
    const merged: Record<string, string> = {};
    for (const [name, rel] of Object.entries(step.input_from)) {
      merged[name] = run.store.readText(`${run.runDir}/${rel}`);
    }
    return JSON.stringify(merged, null, 2) + '\n';
  }
  throw new ConfigurationError(`Step ${step.id}: artifact.write needs config.content or input_from`);
}

export const artifactWrite: StepHandler = async (step, run): Promise<StepOutput> => {
  const outputRel = `${run.runDir}/${step.output}`;
  if (run.dryRun) {
    return { output_path: outputRel, planned_paths: [outputRel], dry_run: true };
  }
  return run.store.writeText(outputRel, renderContent(step, run));
};
