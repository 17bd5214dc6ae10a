/**
 * Path Utilities
 */

import { join, extname, basename, dirname } from 'node:path';

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Replace the extension of a path, appending one when the path has none.
 *
 * `withExtension('dir/movie.vpy', 'ac3')` is `dir/movie.ac3`, and the new
 * extension may itself contain dots (`movie.eng.srt`).
 */
export function withExtension(filePath: string, extension: string): string {
  return join(dirname(filePath), `${getBasename(filePath)}.${extension}`);
}
