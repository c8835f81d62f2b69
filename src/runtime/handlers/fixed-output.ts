import { assertSafeRelative } from '../../artifacts/store.js';
import { logger } from '../../shared/logger.js';
import type { RunContext, StepSpec } from '../types.js';

/**
 * Gate summaries live at fixed names under `output/<runId>/artifacts/` because
 * later gates and operators look them up there. A plan `output` naming any
 * other path is reported and not honoured.
 */
export function warnIfOutputDiffers(step: StepSpec, run: RunContext, fixedRel: string): void {
  const declared = `${run.runDir}/${assertSafeRelative(step.output)}`;
  if (declared === fixedRel) return;
  logger.warn('Step output is fixed for this handler; plan value ignored', {
    step: step.id,
    handler: step.handler_key,
    declared: step.output,
    written: fixedRel,
  });
}
