import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleepFor } from 'node:timers/promises';

import { IncompleteTaskError, isMissingFile, PipelineAbortedError, toIOError } from '../errors.js';
import type { Logger } from '../utils/telemetry.js';
import { artifactNames } from './artifacts.js';
import type { JobHandle } from './scheduler.js';

export interface JobWatcher {
  isComplete(handle: JobHandle): Promise<boolean>;
}

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await sleepFor(ms, undefined, { signal });
  }
};

/** Looks for the worker's completion line in its console log. */
export class LogMarkerWatcher implements JobWatcher {
  constructor(
    private readonly workDir: string,
    private readonly marker: string
  ) {}

  async isComplete(handle: JobHandle): Promise<boolean> {
    const logPath = path.join(this.workDir, artifactNames.consoleLog(handle.taskIndex));
    let contents: string;
    try {
      contents = await readFile(logPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw toIOError(error, logPath);
    }
    return contents.includes(this.marker);
  }
}

export type TaskState = 'pending' | 'done' | 'timed-out' | 'failed';

export interface TaskStatus {
  readonly taskIndex: number;
  readonly state: TaskState;
  readonly polls: number;
  readonly startedAt: number;
  readonly settledAt?: number;
  readonly error?: unknown;
}

export interface CompletionWatcherOptions {
  readonly watcher: JobWatcher;
  readonly logger: Logger;
  readonly clock?: Clock;
  readonly pollIntervalMs?: number;
  readonly maxWaitMs?: number;
}

export interface WaitOptions {
  readonly signal?: AbortSignal;
}

const TERMINAL: ReadonlySet<TaskState> = new Set(['done', 'timed-out', 'failed']);

export class CompletionWatcher {
  private readonly clock: Clock;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly statuses = new Map<number, TaskStatus>();

  constructor(private readonly options: CompletionWatcherOptions) {
    this.clock = options.clock ?? systemClock;
    this.pollIntervalMs = options.pollIntervalMs ?? 10_000;
    this.maxWaitMs = options.maxWaitMs ?? 48 * 60 * 60 * 1000;
  }

  snapshot(): TaskStatus[] {
    return [...this.statuses.values()].sort((a, b) => a.taskIndex - b.taskIndex);
  }

  /**
   * Resolves once every handle reports completion. Tasks are polled in rounds with a sleep
   * between rounds; nothing resolves early, so callers may treat the return as a barrier.
   */
  async waitForAll(handles: readonly JobHandle[], options: WaitOptions = {}): Promise<TaskStatus[]> {
    const { signal } = options;
    const startedAt = this.clock.now();
    const deadline = startedAt + this.maxWaitMs;

    for (const handle of handles) {
      this.statuses.set(handle.taskIndex, { taskIndex: handle.taskIndex, state: 'pending', polls: 0, startedAt });
      if (handle.skipped) {
        this.transition(handle.taskIndex, 'done');
      }
    }

    for (;;) {
      this.throwIfAborted(signal);
      for (const handle of handles) {
        if (this.stateOf(handle.taskIndex) !== 'pending') {
          continue;
        }
        await this.probe(handle);
      }

      const pending = this.pendingTasks();
      if (pending.length === 0) {
        this.options.logger.info({ tasks: handles.length }, 'All tasks reported completion');
        return this.snapshot();
      }

      const now = this.clock.now();
      if (now >= deadline) {
        for (const taskIndex of pending) {
          this.transition(taskIndex, 'timed-out');
        }
        this.options.logger.error({ tasks: pending, waitedMs: now - startedAt }, 'Tasks missed the completion deadline');
        throw new IncompleteTaskError(pending, now - startedAt);
      }

      this.options.logger.debug({ pending }, 'Waiting for tasks');
      try {
        await this.clock.sleep(Math.min(this.pollIntervalMs, deadline - now), signal);
      } catch (error) {
        this.throwIfAborted(signal);
        throw error;
      }
    }
  }

  private async probe(handle: JobHandle): Promise<void> {
    const current = this.statuses.get(handle.taskIndex);
    if (!current) {
      return;
    }
    this.statuses.set(handle.taskIndex, { ...current, polls: current.polls + 1 });
    let complete: boolean;
    try {
      complete = await this.options.watcher.isComplete(handle);
    } catch (error) {
      this.transition(handle.taskIndex, 'failed', error);
      throw error;
    }
    if (complete) {
      this.transition(handle.taskIndex, 'done');
      this.options.logger.info({ task: handle.taskIndex, jobId: handle.jobId }, 'Task completed');
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (!signal?.aborted) {
      return;
    }
    for (const taskIndex of this.pendingTasks()) {
      this.transition(taskIndex, 'failed', signal.reason);
    }
    throw new PipelineAbortedError(signal.reason);
  }

  private stateOf(taskIndex: number): TaskState | undefined {
    return this.statuses.get(taskIndex)?.state;
  }

  private pendingTasks(): number[] {
    return this.snapshot()
      .filter((status) => status.state === 'pending')
      .map((status) => status.taskIndex);
  }

  private transition(taskIndex: number, next: TaskState, error?: unknown): void {
    const current = this.statuses.get(taskIndex);
    if (!current || TERMINAL.has(current.state)) {
      return;
    }
    this.statuses.set(taskIndex, {
      ...current,
      state: next,
      settledAt: this.clock.now(),
      ...(error === undefined ? {} : { error })
    });
  }
}
