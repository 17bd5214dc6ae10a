/**
 * File Operations
 */

import { existsSync } from 'node:fs';

/**
 * Read-only view of the filesystem, injectable so callers can stub it
 */
export interface FileSystem {
  exists(filePath: string): boolean;
}

/**
 * Filesystem backed by node:fs
 */
export const nodeFileSystem: FileSystem = {
  exists: (filePath: string): boolean => existsSync(filePath),
};
