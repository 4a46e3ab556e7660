import { ConfigurationError } from '../errors.js';

export interface TaskSlice {
  /** 1-based task index. */
  readonly index: number;
  /** Position range in the active-node list, end exclusive. */
  readonly start: number;
  readonly end: number;
  readonly size: number;
  /** `localToGlobal[k - 1]` is the global id of local index `k`. */
  readonly localToGlobal: readonly number[];
  /** One flag per global node (not only active ones); 1 where this task owns the node. */
  readonly filter: Uint8Array;
  readonly firstGlobal?: number;
  readonly lastGlobal?: number;
}

export interface Partition {
  readonly taskCount: number;
  readonly activeCount: number;
  readonly totalNodes: number;
  readonly perTask: number;
  readonly lastTaskSize: number;
  readonly tasks: readonly TaskSlice[];
}

export function partition(activeNodes: readonly number[], taskCount: number, totalNodes: number): Partition {
  if (!Number.isInteger(taskCount) || taskCount < 1) {
    throw new ConfigurationError(`task count must be a positive integer, got ${taskCount}`);
  }

  const activeCount = activeNodes.length;
  const perTask = Math.floor(activeCount / taskCount);
  const lastTaskSize = activeCount - (taskCount - 1) * perTask;

  const tasks: TaskSlice[] = [];
  for (let index = 1; index <= taskCount; index += 1) {
    const start = (index - 1) * perTask;
    const size = index < taskCount ? perTask : lastTaskSize;
    const end = start + size;
    const localToGlobal = activeNodes.slice(start, end);

    const filter = new Uint8Array(totalNodes);
    for (const globalId of localToGlobal) {
      if (globalId < 1 || globalId > totalNodes) {
        throw new ConfigurationError(`active node ${globalId} is outside the mesh (1..${totalNodes})`);
      }
      filter[globalId - 1] = 1;
    }

    tasks.push({
      index,
      start,
      end,
      size,
      localToGlobal,
      filter,
      firstGlobal: localToGlobal[0],
      lastGlobal: localToGlobal.length > 0 ? localToGlobal[localToGlobal.length - 1] : undefined
    });
  }

  return { taskCount, activeCount, totalNodes, perTask, lastTaskSize, tasks };
}

export function resolveGlobal(slice: TaskSlice, localIndex: number): number | undefined {
  if (!Number.isInteger(localIndex) || localIndex < 1 || localIndex > slice.size) {
    return undefined;
  }
  return slice.localToGlobal[localIndex - 1];
}

export function renderFilter(slice: TaskSlice): string {
  return slice.filter.length === 0 ? '' : `${Array.from(slice.filter).join('\n')}\n`;
}
