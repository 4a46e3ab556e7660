import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ResultAssembler, type OutputFile } from './assembly/assembler.js';
import type { PipelineConfig } from './config.js';
import { toIOError } from './errors.js';
import { removeStaleArtifacts } from './jobs/artifacts.js';
import { TaskLauncher, type PreparedTask } from './jobs/launcher.js';
import { CommandJobSubmitter, type JobHandle, type JobSubmitter } from './jobs/scheduler.js';
import { parseJobTemplate } from './jobs/template.js';
import {
  CompletionWatcher,
  LogMarkerWatcher,
  systemClock,
  type Clock,
  type JobWatcher,
  type TaskStatus
} from './jobs/watcher.js';
import { loadMeshIndex } from './mesh/meshIndex.js';
import { partition } from './partition/partitioner.js';
import { createLogger, type Logger } from './utils/telemetry.js';

export interface HarmonicRunRequest {
  readonly extractExecutable: string;
  readonly analysisExecutable: string;
  readonly templatePath: string;
  readonly constantsFile: string;
  readonly taskCount: number;
  readonly startStack: number;
  readonly endStack: number;
  readonly workDir: string;
  /** Defaults to `workDir`. */
  readonly outputDir?: string;
}

export interface PipelineDependencies {
  readonly config: PipelineConfig;
  readonly submitter?: JobSubmitter;
  readonly watcher?: JobWatcher;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

export interface PipelineReport {
  readonly activeNodes: number;
  readonly totalNodes: number;
  readonly taskSizes: readonly number[];
  readonly jobs: readonly JobHandle[];
  readonly tasks: readonly TaskStatus[];
  readonly outputs: readonly OutputFile[];
  readonly unresolved: Readonly<Record<string, number>>;
  readonly elapsedMs: number;
}

async function cancelOutstanding(submitter: JobSubmitter, handles: readonly JobHandle[], logger: Logger): Promise<void> {
  const results = await Promise.allSettled(handles.map((handle) => submitter.cancel(handle)));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      logger.warn({ task: handles[i].taskIndex, jobId: handles[i].jobId, err: result.reason }, 'Failed to cancel job');
    }
  });
  const cancelled = handles.filter((handle, i) => !handle.skipped && results[i].status === 'fulfilled').length;
  if (cancelled > 0) {
    logger.warn({ jobs: cancelled }, 'Cancelled outstanding jobs');
  }
}

export async function runHarmonicAnalysis(
  request: HarmonicRunRequest,
  deps: PipelineDependencies
): Promise<PipelineReport> {
  const { config, signal } = deps;
  const logger = deps.logger ?? createLogger('harmonic-pipeline');
  const clock = deps.clock ?? systemClock;
  const startedAt = clock.now();
  const workDir = path.resolve(request.workDir);
  const outputDir = path.resolve(request.outputDir ?? workDir);

  const mesh = await loadMeshIndex({
    meshPath: path.resolve(workDir, config.files.mesh),
    maskPath: path.resolve(workDir, config.files.mask),
    threshold: config.inclusionThreshold
  });
  logger.info({ activeNodes: mesh.activeNodes.length, totalNodes: mesh.layout.nodeCount }, 'Selected output points');

  const plan = partition(mesh.activeNodes, request.taskCount, mesh.layout.nodeCount);
  if (request.taskCount > plan.activeCount) {
    logger.warn({ tasks: request.taskCount, activeNodes: plan.activeCount }, 'More tasks than active nodes; some tasks are empty');
  }

  const templatePath = path.resolve(workDir, request.templatePath);
  let templateText: string;
  try {
    templateText = await readFile(templatePath, 'utf8');
  } catch (error) {
    throw toIOError(error, templatePath);
  }
  const template = parseJobTemplate(templateText, { entrypoint: config.worker.entrypointMarkers }, templatePath);

  const submitter =
    deps.submitter ??
    new CommandJobSubmitter({
      workDir,
      submitCommand: config.scheduler.submit,
      cancelCommand: config.scheduler.cancel
    });
  const launcher = new TaskLauncher({
    workDir,
    template,
    submitter,
    logger,
    jobNamePrefix: config.worker.jobNamePrefix,
    invocation: {
      workerCommand: config.worker.command,
      extractExecutable: request.extractExecutable,
      analysisExecutable: request.analysisExecutable,
      constantsFile: request.constantsFile,
      startStack: request.startStack,
      endStack: request.endStack
    }
  });

  const stale = await removeStaleArtifacts(workDir, config.constituents, config.worker.jobNamePrefix);
  if (stale.length > 0) {
    logger.debug({ files: stale }, 'Removed artifacts from a previous run');
  }

  const completion = new CompletionWatcher({
    watcher: deps.watcher ?? new LogMarkerWatcher(workDir, config.polling.completionMarker),
    logger,
    clock,
    pollIntervalMs: config.polling.intervalMs,
    maxWaitMs: config.polling.maxWaitMs
  });

  const handles: JobHandle[] = [];
  let tasks: TaskStatus[];
  try {
    const prepared: PreparedTask[] = [];
    for (const slice of plan.tasks) {
      prepared.push(await launcher.prepare(slice));
    }
    for (const task of prepared) {
      if (signal?.aborted) {
        break;
      }
      handles.push(await launcher.submit(task));
    }

    tasks = await completion.waitForAll(handles, { signal });
  } catch (error) {
    const done = new Set(completion.snapshot().filter((status) => status.state === 'done').map((status) => status.taskIndex));
    await cancelOutstanding(
      submitter,
      handles.filter((handle) => !done.has(handle.taskIndex)),
      logger
    );
    throw error;
  }

  logger.info('Done all harmonic analysis tasks; starting final assembly');
  const assembler = new ResultAssembler(mesh.layout, config.constituents, config.sentinel);
  for (const slice of plan.tasks) {
    await assembler.mergeTask(slice, workDir);
  }
  const outputs = await assembler.writeOutputs(outputDir);
  for (const output of outputs) {
    logger.info({ path: output.path, constituent: output.constituent, field: output.field }, 'Wrote output');
  }

  const unresolved = Object.fromEntries(
    config.constituents.map((constituent) => [constituent, assembler.unresolvedCount(constituent)])
  );
  return {
    activeNodes: plan.activeCount,
    totalNodes: plan.totalNodes,
    taskSizes: plan.tasks.map((slice) => slice.size),
    jobs: handles,
    tasks,
    outputs,
    unresolved,
    elapsedMs: clock.now() - startedAt
  };
}
