/**
 * Project path resolution
 *
 * A file's project is the first directory below the scan root. Files lying
 * directly in the root belong to a project named after the root itself.
 */

import path from 'node:path';
import type { ProjectLocation } from '../types/document.js';

/**
 * Resolve project name, relative path and subfolder for a file
 *
 * @param root - Scan root
 * @param filePath - File somewhere below the root
 * @returns Location; every field is undefined when the file is outside the root
 */
export function resolveProjectPath(root: string, filePath: string): ProjectLocation {
  const resolvedRoot = path.resolve(root);
  const relative = path.relative(resolvedRoot, path.resolve(filePath));

  const outside = relative === '..' || relative.startsWith(`..${path.sep}`);
  if (relative === '' || outside || path.isAbsolute(relative)) {
    return {};
  }

  const parts = relative.split(path.sep).filter((part) => part.length > 0);
  const relativePath = parts.join('/');

  if (parts.length === 1) {
    return {
      projectName: path.basename(resolvedRoot),
      relativePath,
      subfolderPath: '',
    };
  }

  return {
    projectName: parts[0],
    relativePath,
    subfolderPath: parts.slice(1, -1).join('/'),
  };
}
