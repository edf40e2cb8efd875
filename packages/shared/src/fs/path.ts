import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes, the separator used in packed output
 * and in ignore-pattern matching.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 *
 * @param from The path to calculate the relative path from.
 * @param to The path to calculate the relative path to.
 * @returns The relative path.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Lower-cased extension of a file name, including the leading dot.
 * Dotfiles such as `.env` have no extension.
 */
export function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}
