/**
 * Directory scanner
 * Walks a document tree and builds file records plus the project index
 */

import { promises as fs, constants as fsConstants, type Dirent } from 'node:fs';
import path from 'node:path';
import type { FileRecord, ProjectIndex, ScanResult } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { classifyFile, fileExtension } from './classifier.js';
import { resolveProjectPath } from './project-path.js';

/**
 * Scan options
 */
export interface ScanOptions {
  logger?: Logger;
  /** Called once per supported file, in discovery order */
  onFile?: (record: FileRecord) => void;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Whether a symlink entry points at a directory. Dangling links count as files.
 */
async function linksToDirectory(linkPath: string): Promise<boolean> {
  try {
    const target = await fs.stat(linkPath);
    return target.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Build a record for one supported file. Stat and read-probe failures are
 * recorded on the record instead of being thrown.
 */
async function buildRecord(root: string, filePath: string): Promise<FileRecord> {
  const location = resolveProjectPath(root, filePath);
  const base = {
    path: filePath,
    name: path.basename(filePath),
    extension: fileExtension(filePath),
    ...location,
  };

  try {
    const stat = await fs.stat(filePath);
    let isReadable = true;
    let readError = '';
    try {
      await fs.access(filePath, fsConstants.R_OK);
    } catch (error) {
      isReadable = false;
      readError = errorMessage(error);
    }

    return {
      ...base,
      size: stat.size,
      created: stat.ctime,
      modified: stat.mtime,
      isReadable,
      errorMessage: readError,
    };
  } catch (error) {
    const now = new Date();
    return {
      ...base,
      size: 0,
      created: now,
      modified: now,
      isReadable: false,
      errorMessage: errorMessage(error),
    };
  }
}

// ---------------------------------------------------------------------------
// Scan
// ---------------------------------------------------------------------------

/**
 * Recursively scan a directory for supported documents.
 *
 * Each call returns a fresh result; nothing is kept between scans. Within a
 * directory, files are visited before subdirectories, both in name order.
 * Symlinked directories are not descended.
 *
 * @param root - Directory to scan
 * @param options - Logger and per-file callback
 * @returns Records in discovery order and the project index built from them
 */
export async function scanDirectory(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  const logger = options.logger ?? silentLogger;
  const resolvedRoot = path.resolve(root);
  const records: FileRecord[] = [];
  const projects: ProjectIndex = new Map();

  let rootStat;
  try {
    rootStat = await fs.stat(resolvedRoot);
  } catch {
    const message = `Directory does not exist: ${resolvedRoot}`;
    logger.error('scan', message);
    return { root: resolvedRoot, records, projects, error: message };
  }

  if (!rootStat.isDirectory()) {
    const message = `Path is not a directory: ${resolvedRoot}`;
    logger.error('scan', message);
    return { root: resolvedRoot, records, projects, error: message };
  }

  logger.info('scan', `Scanning directory: ${resolvedRoot}`);

  const visit = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.warn('scan', `Skipping unreadable directory ${dir}: ${errorMessage(error)}`);
      return;
    }
    entries.sort(byName);

    const subdirs: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        subdirs.push(entryPath);
        continue;
      }
      if (entry.isSymbolicLink() && (await linksToDirectory(entryPath))) {
        continue;
      }
      if (!entry.isFile() && !entry.isSymbolicLink()) {
        continue;
      }
      if (classifyFile(entry.name) === null) {
        continue;
      }

      const record = await buildRecord(resolvedRoot, entryPath);
      if (!record.isReadable) {
        logger.warn('scan', `Unreadable file ${entryPath}: ${record.errorMessage}`);
      }
      records.push(record);
      options.onFile?.(record);

      if (record.projectName !== undefined) {
        const members = projects.get(record.projectName);
        if (members) {
          members.push(record);
        } else {
          projects.set(record.projectName, [record]);
        }
      }
    }

    for (const subdir of subdirs) {
      await visit(subdir);
    }
  };

  await visit(resolvedRoot);

  logger.success('scan', `Found ${records.length} supported files in ${projects.size} projects`);
  return { root: resolvedRoot, records, projects };
}
