import { readdir, rm } from 'node:fs/promises';
import path from 'node:path';

import { formatTaskId, toIOError } from '../errors.js';

export const artifactNames = {
  filter: (taskIndex: number) => `filter_flag_${formatTaskId(taskIndex)}`,
  script: (taskIndex: number) => `run_${formatTaskId(taskIndex)}`,
  consoleLog: (taskIndex: number) => `scrn.out_${formatTaskId(taskIndex)}`,
  partialResult: (constituent: string, taskIndex: number) => `${constituent}_${formatTaskId(taskIndex)}`,
  amplitudeOutput: (constituent: string) => `amp_${constituent.toLowerCase()}.gr3`,
  phaseOutput: (constituent: string) => `pha_${constituent.toLowerCase()}.gr3`
} as const;

const escapeRegExp = (text: string) => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Per-task artifacts a previous run may have left behind, including the scheduler's own
 * `<jobNamePrefix><id>.o<jobId>` output files. A stale console log would otherwise satisfy
 * the completion check before the new job has even started.
 */
export function isStaleArtifact(
  fileName: string,
  constituents: readonly string[],
  jobNamePrefix = 'EXTRACT_'
): boolean {
  if (/^(scrn\.out|run|filter_flag)_\d{3,}$/.test(fileName)) {
    return true;
  }
  if (new RegExp(`^${escapeRegExp(jobNamePrefix)}\\d{3,}`).test(fileName)) {
    return true;
  }
  return constituents.some((constituent) => new RegExp(`^${constituent}_\\d{3,}$`).test(fileName));
}

export async function removeStaleArtifacts(
  workDir: string,
  constituents: readonly string[],
  jobNamePrefix = 'EXTRACT_'
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(workDir);
  } catch (error) {
    throw toIOError(error, workDir, 'list');
  }
  const stale = entries.filter((entry) => isStaleArtifact(entry, constituents, jobNamePrefix)).sort();
  await Promise.all(stale.map((entry) => rm(path.join(workDir, entry), { force: true })));
  return stale;
}
