import { readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { assertSafeRelative } from '../artifacts/store.js';
import { ConfigurationError, errorMessage, toError } from '../shared/errors.js';
import { StepPlanSchema, StepSpecSchema } from '../shared/schemas.js';
import type { StepPlan, StepSpec } from './types.js';

function describeStep(index: number, raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return `step ${index} (${raw.id})`;
  }
  return `step ${index}`;
}

/**
 * Parse a YAML step plan. Every problem is a `ConfigurationError` naming the
 * offending step, raised before anything runs.
 */
export function parseStepPlan(source: string, text: string): StepPlan {
  let raw: unknown;
  try {
    raw = load(text);
  } catch (err) {
    throw new ConfigurationError(`Cannot parse pipeline ${source}: ${errorMessage(err)}`, toError(err));
  }
  const plan = StepPlanSchema.safeParse(raw ?? {});
  if (!plan.success) {
    const issue = plan.error.issues[0];
    throw new ConfigurationError(
      `Invalid pipeline ${source} at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
    );
  }

  const seen = new Set<string>();
  const steps: StepSpec[] = plan.data.steps.map((rawStep, index) => {
    const where = describeStep(index, rawStep);
    const parsed = StepSpecSchema.safeParse(rawStep);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid ${where} in ${source}: ${issue?.path.join('.') || 'step'} ${issue?.message ?? 'invalid'}`,
      );
    }
    const step = parsed.data;
    if (seen.has(step.id)) {
      throw new ConfigurationError(`Duplicate step id "${step.id}" in ${source}`);
    }
    seen.add(step.id);

    try {
      assertSafeRelative(step.output);
      const inputs = typeof step.input_from === 'string' ? [step.input_from] : Object.values(step.input_from ?? {});
      inputs.forEach((input) => assertSafeRelative(input));
    } catch (err) {
      throw new ConfigurationError(`Invalid ${where} in ${source}: ${errorMessage(err)}`, toError(err));
    }
    return step;
  });

  return { pipeline: plan.data.pipeline, steps };
}

export function loadStepPlan(absPath: string): StepPlan {
  let text: string;
  try {
    text = readFileSync(absPath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read pipeline ${absPath}: ${errorMessage(err)}`, toError(err));
  }
  return parseStepPlan(absPath, text);
}

/** Dry-run applies only when every step opts in. */
export function isDryRunPlan(plan: StepPlan): boolean {
  return plan.steps.length > 0 && plan.steps.every((step) => step.config?.['dry_run'] === true);
}
