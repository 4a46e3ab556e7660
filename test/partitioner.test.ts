import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigurationError } from '../src/errors.js';
import { partition, renderFilter, resolveGlobal } from '../src/partition/partitioner.js';

const range = (from: number, to: number) => Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe('partition', () => {
  it('splits ten active nodes over three tasks as 3, 3, 4', () => {
    const plan = partition(range(1, 10), 3, 10);
    assert.equal(plan.perTask, 3);
    assert.equal(plan.lastTaskSize, 4);
    assert.deepEqual(
      plan.tasks.map((slice) => slice.size),
      [3, 3, 4]
    );
    assert.equal(resolveGlobal(plan.tasks[2], 1), 7);
    assert.deepEqual(plan.tasks[2].localToGlobal, [7, 8, 9, 10]);
  });

  it('maps local indexes onto sparse global ids', () => {
    const active = [2, 5, 6, 9, 11, 12, 14];
    const plan = partition(active, 2, 15);
    assert.deepEqual(plan.tasks[0].localToGlobal, [2, 5, 6]);
    assert.deepEqual(plan.tasks[1].localToGlobal, [9, 11, 12, 14]);
    assert.equal(plan.tasks[1].firstGlobal, 9);
    assert.equal(plan.tasks[1].lastGlobal, 14);
    assert.equal(resolveGlobal(plan.tasks[1], 4), 14);
    assert.equal(resolveGlobal(plan.tasks[1], 5), undefined);
    assert.equal(resolveGlobal(plan.tasks[1], 0), undefined);
  });

  it('builds full-length filters marking only owned nodes', () => {
    const plan = partition([2, 3, 5], 2, 6);
    assert.deepEqual(Array.from(plan.tasks[0].filter), [0, 1, 0, 0, 0, 0]);
    assert.deepEqual(Array.from(plan.tasks[1].filter), [0, 0, 1, 0, 1, 0]);
    assert.equal(renderFilter(plan.tasks[1]), '0\n0\n1\n0\n1\n0\n');
  });

  it('covers every active node exactly once for all task counts', () => {
    for (let total = 1; total <= 23; total += 1) {
      const active = range(1, total).map((i) => i * 2);
      for (let tasks = 1; tasks <= total; tasks += 1) {
        const plan = partition(active, tasks, total * 2);
        const perTask = Math.floor(total / tasks);
        const owned = plan.tasks.flatMap((slice) => [...slice.localToGlobal]);
        assert.deepEqual(owned, active, `T=${total} N=${tasks}`);
        plan.tasks.slice(0, -1).forEach((slice) => assert.equal(slice.size, perTask));
        assert.equal(plan.tasks[tasks - 1].size, total - (tasks - 1) * perTask);

        const coverage = new Uint8Array(total * 2);
        for (const slice of plan.tasks) {
          slice.filter.forEach((flag, i) => {
            coverage[i] += flag;
          });
        }
        active.forEach((id) => assert.equal(coverage[id - 1], 1));
        assert.equal(
          coverage.reduce((sum, flag) => sum + flag, 0),
          total
        );
      }
    }
  });

  it('gives the last task everything when tasks outnumber active nodes', () => {
    const plan = partition([4, 8], 3, 10);
    assert.deepEqual(
      plan.tasks.map((slice) => slice.size),
      [0, 0, 2]
    );
    assert.equal(plan.tasks[0].firstGlobal, undefined);
    assert.equal(renderFilter(plan.tasks[0]), '0\n0\n0\n0\n0\n0\n0\n0\n0\n0\n');
  });

  it('handles an empty active set', () => {
    const plan = partition([], 2, 3);
    assert.deepEqual(
      plan.tasks.map((slice) => slice.size),
      [0, 0]
    );
  });

  it('rejects a task count below one', () => {
    assert.throws(() => partition([1, 2], 0, 2), ConfigurationError);
    assert.throws(() => partition([1, 2], 1.5, 2), ConfigurationError);
  });
});
