/**
 * Load-time guard
 *
 * The only module allowed to touch the filesystem. Paths are checked
 * structurally before any filesystem call, and sizes are checked before
 * the parser sees a single byte.
 */

import fs from 'fs';
import path from 'path';
import { LoadError, SandboxError } from '../common/errors';
import { MAX_SOURCE_BYTES, SOURCE_EXTENSION } from './limits';

export type ParseFn<T> = (source: string, file: string) => T;

export interface LoadOptions<T> {
  /** Application root; nothing outside it can be loaded. */
  root: string;
  parse: ParseFn<T>;
  maxSourceBytes?: number;
}

function reject(requested: string, reason: string): SandboxError {
  return new SandboxError(
    'PATH_REJECTED',
    `Refusing to load "${requested}": ${reason}`
  );
}

function isInside(root: string, target: string): boolean {
  const rel = path.relative(root, target);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

/**
 * Returns the absolute path of an acceptable request, or throws
 * PATH_REJECTED. Traversal segments are refused whether or not the file
 * exists.
 */
export function validatePath(requested: string, root: string): string {
  if (requested.includes('\0')) throw reject(requested, 'invalid characters');
  if (path.extname(requested) !== SOURCE_EXTENSION) {
    throw reject(requested, `only ${SOURCE_EXTENSION} files can be loaded`);
  }
  if (requested.split(/[\\/]+/).includes('..')) {
    throw reject(requested, 'path traversal is not allowed');
  }

  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, requested);
  if (!isInside(resolvedRoot, target)) {
    throw reject(requested, 'path resolves outside the application root');
  }

  // A symlink inside the root may still point elsewhere
  if (fs.existsSync(target)) {
    const realRoot = fs.realpathSync(resolvedRoot);
    const realTarget = fs.realpathSync(target);
    if (!isInside(realRoot, realTarget)) {
      throw reject(requested, 'path resolves outside the application root');
    }
  }

  return target;
}

export function checkSourceSize(
  source: string,
  maxBytes: number = MAX_SOURCE_BYTES
): void {
  const bytes = Buffer.byteLength(source, 'utf8');
  if (bytes > maxBytes) {
    throw new SandboxError(
      'FILE_TOO_LARGE',
      `Source is ${bytes} bytes; the limit is ${maxBytes}`
    );
  }
}

/** Size-check an in-memory document, then hand it to the parser. */
export function parseSource<T>(
  source: string,
  file: string,
  parse: ParseFn<T>,
  maxBytes: number = MAX_SOURCE_BYTES
): T {
  checkSourceSize(source, maxBytes);
  try {
    return parse(source, file);
  } catch (error) {
    if (error instanceof LoadError || error instanceof SandboxError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new LoadError('GRAMMAR', `${file}: ${message}`, { cause: error });
  }
}

export function loadSource<T>(requested: string, options: LoadOptions<T>): T {
  const maxBytes = options.maxSourceBytes ?? MAX_SOURCE_BYTES;
  const file = validatePath(requested, options.root);

  let size: number;
  try {
    size = fs.statSync(file).size;
  } catch (error) {
    throw new LoadError('UNREADABLE', `Cannot read "${requested}"`, {
      cause: error,
    });
  }
  if (size > maxBytes) {
    throw new SandboxError(
      'FILE_TOO_LARGE',
      `"${requested}" is ${size} bytes; the limit is ${maxBytes}`
    );
  }

  const source = fs.readFileSync(file, 'utf8');
  return parseSource(source, file, options.parse, maxBytes);
}
