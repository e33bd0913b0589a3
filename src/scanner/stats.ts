/**
 * Aggregate statistics over scan results
 */

import type { DirectoryStats, FileRecord, ProjectIndex, ProjectStats } from '../types/document.js';

function countExtensions(records: readonly FileRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    counts[record.extension] = (counts[record.extension] ?? 0) + 1;
  }
  return counts;
}

function sumSizes(records: readonly FileRecord[]): number {
  return records.reduce((total, record) => total + record.size, 0);
}

/**
 * Totals across every record of a scan
 *
 * @param records - All records of one scan, readable or not
 */
export function computeDirectoryStats(records: readonly FileRecord[]): DirectoryStats {
  const projectNames = new Set<string>();
  for (const record of records) {
    if (record.projectName !== undefined) {
      projectNames.add(record.projectName);
    }
  }

  return {
    extensions: countExtensions(records),
    totalFiles: records.length,
    totalSize: sumSizes(records),
    totalProjects: projectNames.size,
  };
}

/**
 * Per-project totals, keyed in project discovery order
 */
export function computeProjectStats(projects: ProjectIndex): Map<string, ProjectStats> {
  const stats = new Map<string, ProjectStats>();

  for (const [projectName, records] of projects) {
    const subfolders: string[] = [];
    for (const record of records) {
      const subfolder = record.subfolderPath;
      if (subfolder && !subfolders.includes(subfolder)) {
        subfolders.push(subfolder);
      }
    }

    stats.set(projectName, {
      fileCount: records.length,
      totalSize: sumSizes(records),
      extensions: countExtensions(records),
      subfolders,
    });
  }

  return stats;
}
