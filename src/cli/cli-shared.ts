import { resolve } from 'node:path';
import type { Command, OptionValues } from 'commander';
import { loadSettings } from '../workspace/config.js';
import type { Settings } from '../workspace/types.js';

export interface ProjectContext {
  root: string;
  settings: Settings;
}

export function stringOption(opts: OptionValues, name: string): string | undefined {
  const value: unknown = opts[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function booleanOption(opts: OptionValues, name: string): boolean {
  const value: unknown = opts[name];
  return value === true;
}

export function integerOption(opts: OptionValues, name: string): number | undefined {
  const raw = stringOption(opts, name);
  if (raw === undefined) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== raw.trim()) {
    throw new Error(`--${name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)} must be a non-negative integer`);
  }
  return parsed;
}

/**
 * Resolve the project root (global `--root`, default cwd) and its settings.
 * Call at the top of every command that touches the project.
 */
export function requireProject(cmd: Command): ProjectContext {
  const root = resolve(stringOption(cmd.optsWithGlobals(), 'root') ?? process.cwd());
  return { root, settings: loadSettings(root) };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
