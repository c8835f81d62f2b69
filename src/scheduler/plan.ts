import { readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { SchedulePlanError, errorMessage, toError } from '../shared/errors.js';
import { RawSchedulePlanSchema } from '../shared/schemas.js';
import { isValidTimeZone } from './timezone.js';

export interface SchedulePlan {
  timezone: string;
  /** Entries stay unvalidated here; each is checked on its own. */
  entries: unknown[];
}

export function loadSchedulePlan(absPath: string, defaultTimezone: string): SchedulePlan {
  let text: string;
  try {
    text = readFileSync(absPath, 'utf8');
  } catch (err) {
    throw new SchedulePlanError(`Cannot read schedule plan ${absPath}: ${errorMessage(err)}`, toError(err));
  }

  let raw: unknown;
  try {
    raw = load(text);
  } catch (err) {
    throw new SchedulePlanError(`Cannot parse schedule plan ${absPath}: ${errorMessage(err)}`, toError(err));
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new SchedulePlanError(`Schedule plan ${absPath} must be a mapping`);
  }

  const parsed = RawSchedulePlanSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SchedulePlanError(
      `Invalid schedule plan ${absPath} at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
    );
  }

  const timezone = parsed.data.timezone ?? defaultTimezone;
  if (!isValidTimeZone(timezone)) {
    throw new SchedulePlanError(`Invalid timezone in schedule plan: ${timezone}`);
  }
  return { timezone, entries: parsed.data.entries };
}
