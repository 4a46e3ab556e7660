import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { formatTaskId, HarmonicPipelineError, SubmissionError, toIOError } from '../errors.js';
import { renderFilter, type TaskSlice } from '../partition/partitioner.js';
import type { Logger } from '../utils/telemetry.js';
import { artifactNames } from './artifacts.js';
import type { JobHandle, JobSubmitter } from './scheduler.js';
import { renderJobScript, type JobTemplate } from './template.js';

/** Arguments handed to every worker, identical across tasks. */
export interface WorkerInvocation {
  readonly workerCommand: string;
  readonly extractExecutable: string;
  readonly analysisExecutable: string;
  readonly constantsFile: string;
  readonly startStack: number;
  readonly endStack: number;
}

export interface TaskLauncherOptions {
  readonly workDir: string;
  readonly template: JobTemplate;
  readonly invocation: WorkerInvocation;
  readonly submitter: JobSubmitter;
  readonly logger: Logger;
  readonly jobNamePrefix?: string;
}

export interface PreparedTask {
  readonly slice: TaskSlice;
  readonly filterPath: string;
  readonly scriptPath: string;
}

export function buildEntrypoint(invocation: WorkerInvocation, slice: TaskSlice): string {
  return [
    invocation.workerCommand,
    invocation.extractExecutable,
    invocation.analysisExecutable,
    invocation.constantsFile,
    slice.index,
    invocation.startStack,
    invocation.endStack,
    slice.size,
    '>&',
    artifactNames.consoleLog(slice.index)
  ].join(' ');
}

export class TaskLauncher {
  private readonly jobNamePrefix: string;

  constructor(private readonly options: TaskLauncherOptions) {
    this.jobNamePrefix = options.jobNamePrefix ?? 'EXTRACT_';
  }

  async prepare(slice: TaskSlice): Promise<PreparedTask> {
    const filterPath = path.join(this.options.workDir, artifactNames.filter(slice.index));
    const scriptPath = path.join(this.options.workDir, artifactNames.script(slice.index));
    const script = renderJobScript(this.options.template, {
      entrypoint: buildEntrypoint(this.options.invocation, slice),
      jobName: `${this.jobNamePrefix}${formatTaskId(slice.index)}`
    });

    await this.write(filterPath, renderFilter(slice));
    await this.write(scriptPath, script, 0o755);
    return { slice, filterPath, scriptPath };
  }

  /**
   * Submits a prepared task. Tasks owning no nodes are not sent to the scheduler. Any
   * submitter failure surfaces as a {@link SubmissionError} carrying the task index.
   */
  async submit(prepared: PreparedTask): Promise<JobHandle> {
    const { slice, scriptPath } = prepared;
    if (slice.size === 0) {
      this.options.logger.warn({ task: slice.index }, 'Task owns no nodes; not submitted');
      return { taskIndex: slice.index, scriptPath, jobId: '', skipped: true };
    }
    let handle: JobHandle;
    try {
      handle = await this.options.submitter.submit({ taskIndex: slice.index, path: scriptPath });
    } catch (error) {
      if (error instanceof HarmonicPipelineError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new SubmissionError(slice.index, reason, { cause: error });
    }
    this.options.logger.info(
      { task: slice.index, jobId: handle.jobId, nodes: slice.size, first: slice.firstGlobal, last: slice.lastGlobal },
      'Submitted task'
    );
    return handle;
  }

  async launch(slice: TaskSlice): Promise<JobHandle> {
    return this.submit(await this.prepare(slice));
  }

  private async write(target: string, contents: string, mode?: number): Promise<void> {
    try {
      await writeFile(target, contents, mode === undefined ? 'utf8' : { encoding: 'utf8', mode });
    } catch (error) {
      throw toIOError(error, target, 'write');
    }
  }
}
