/**
 * Path-safe access to files under a declared root.
 *
 * Every path handed to the store is root-relative. Absolute paths, `..`
 * segments and anything resolving outside the root are rejected before the
 * filesystem is touched. A read-only store refuses every write, which is how
 * dry runs are kept side-effect free.
 */
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, relative as relativePath, resolve as resolvePath, sep } from 'node:path';
import { ConfigurationError, PathEscapeError, errorMessage } from '../shared/errors.js';

const RUN_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

/** A RunID names exactly one directory under output/. */
export function assertRunId(runId: string): string {
  if (runId === '' || runId === '.' || runId === '..') {
    throw new ConfigurationError(`Invalid run_id: "${runId}"`);
  }
  if (runId.includes('/') || runId.includes('\\')) {
    throw new ConfigurationError(`Invalid run_id: "${runId}" must be a single path segment`);
  }
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new ConfigurationError(`Invalid run_id: "${runId}" may only contain [A-Za-z0-9._-]`);
  }
  return runId;
}

export function isValidRunId(runId: string): boolean {
  try {
    assertRunId(runId);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check a relative path without a root: no absolute form, no `..`, not empty.
 * Backslashes count as separators.
 */
export function assertSafeRelative(rel: string): string {
  if (rel.trim() === '') throw new PathEscapeError(rel, 'empty path');
  if (isAbsolute(rel) || rel.startsWith('/') || rel.startsWith('\\') || /^[A-Za-z]:/.test(rel)) {
    throw new PathEscapeError(rel, 'absolute paths are not allowed');
  }
  const segments = rel.split(/[\\/]+/);
  if (segments.includes('..')) throw new PathEscapeError(rel, 'parent traversal is not allowed');
  return segments.filter((s) => s !== '' && s !== '.').join('/');
}

export interface ArtifactStoreOptions {
  readOnly?: boolean;
}

export class ArtifactStore {
  readonly root: string;
  readonly readOnly: boolean;

  constructor(root: string, options: ArtifactStoreOptions = {}) {
    this.root = resolvePath(root);
    this.readOnly = options.readOnly ?? false;
  }

  /** A store over the same root that refuses every write. */
  asReadOnly(): ArtifactStore {
    return this.readOnly ? this : new ArtifactStore(this.root, { readOnly: true });
  }

  resolve(rel: string): string {
    const normalized = assertSafeRelative(rel);
    const abs = resolvePath(this.root, normalized);
    if (abs !== this.root && !abs.startsWith(this.root + sep)) {
      throw new PathEscapeError(rel, 'resolves outside the root');
    }
    return abs;
  }

  /** POSIX-style path of `abs` relative to the root. */
  relative(abs: string): string {
    const rel = relativePath(this.root, resolvePath(abs));
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new PathEscapeError(abs, 'not inside the root');
    }
    return rel.split(sep).join('/');
  }

  exists(rel: string): boolean {
    return existsSync(this.resolve(rel));
  }

  isFile(rel: string): boolean {
    const abs = this.resolve(rel);
    return existsSync(abs) && statSync(abs).isFile();
  }

  sizeOf(rel: string): number {
    return statSync(this.resolve(rel)).size;
  }

  readText(rel: string): string {
    return readFileSync(this.resolve(rel), 'utf8');
  }

  readJson(rel: string): unknown {
    const raw = this.readText(rel);
    try {
      return JSON.parse(raw) as unknown;
    } catch (err) {
      throw new ConfigurationError(`Invalid JSON in ${rel}: ${errorMessage(err)}`);
    }
  }

  readJsonIfExists(rel: string): unknown {
    return this.isFile(rel) ? this.readJson(rel) : undefined;
  }

  writeText(rel: string, content: string): string {
    const abs = this.prepareWrite(rel);
    writeFileSync(abs, content, 'utf8');
    return this.relative(abs);
  }

  writeJson(rel: string, value: unknown): string {
    return this.writeText(rel, JSON.stringify(value, null, 2) + '\n');
  }

  private prepareWrite(rel: string): string {
    if (this.readOnly) {
      throw new ConfigurationError(`Refusing to write ${rel}: artifact store is read-only`);
    }
    const abs = this.resolve(rel);
    mkdirSync(dirname(abs), { recursive: true });
    return abs;
  }
}
