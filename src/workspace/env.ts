const DISABLED_VALUES = new Set(['false', '0', 'no', 'off', 'disabled']);

/**
 * Kill-switch parsing. Unset means `defaultValue`; any of
 * `false|0|no|off|disabled` (trimmed, case-insensitive) means off.
 */
export function parseEnabledFlag(value: string | undefined, defaultValue = true): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === '') return defaultValue;
  return !DISABLED_VALUES.has(normalized);
}

/** Negative or unparsable input falls back to `defaultValue`. */
export function parseNonNegativeInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  if (!/^\d+$/.test(value.trim())) return defaultValue;
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isSafeInteger(parsed) ? parsed : defaultValue;
}

export function parseNonNegativeNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : defaultValue;
}

export function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
