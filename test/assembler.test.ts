import test from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parsePartialResult, ResultAssembler } from '../src/assembly/assembler.js';
import { FormatError, IOError } from '../src/errors.js';
import { parseMesh } from '../src/mesh/meshIndex.js';
import { partition } from '../src/partition/partitioner.js';
import { makeWorkDir, meshText, writeFiles } from './test-utils.js';

const layout = parseMesh(meshText(5, 2), 'hgrid.gr3');

test('parses partial result rows and skips blank lines', () => {
  assert.deepEqual(parsePartialResult('1 0 0.25 3.14159\n\n2 0 1.5 -0.5\n', 'M2_001'), [
    { localIndex: 1, amplitude: 0.25, phaseRadians: 3.14159 },
    { localIndex: 2, amplitude: 1.5, phaseRadians: -0.5 }
  ]);
});

test('rejects a malformed partial result row', () => {
  assert.throws(() => parsePartialResult('1 0 0.25\n', 'M2_001'), (error: unknown) => {
    assert.ok(error instanceof FormatError);
    assert.equal(error.message, 'M2_001: line 1 is not "<local_index> <ignored> <amplitude> <phase>": "1 0 0.25"');
    return true;
  });
});

test('maps local rows to global nodes and converts phase to degrees', () => {
  const plan = partition([2, 3, 5], 2, 5);
  const assembler = new ResultAssembler(layout, ['M2']);
  assembler.merge(plan.tasks[1], 'M2', [
    { localIndex: 1, amplitude: 0.4, phaseRadians: Math.PI / 2 },
    { localIndex: 2, amplitude: 0.7, phaseRadians: 1 }
  ]);

  const field = assembler.field('M2');
  assert.deepEqual(Array.from(field.amplitude), [-9999, -9999, 0.4, -9999, 0.7]);
  assert.ok(Math.abs(field.phase[2] - 90) < 1e-12);
  assert.ok(Math.abs(field.phase[4] - 180 / Math.PI) < 1e-12);
  assert.equal(assembler.unresolvedCount('M2'), 3);
});

test('rejects a local index outside the task', () => {
  const plan = partition([1, 2, 3, 4], 2, 5);
  const assembler = new ResultAssembler(layout, ['K1']);
  assert.throws(
    () => assembler.merge(plan.tasks[0], 'K1', [{ localIndex: 3, amplitude: 1, phaseRadians: 0 }]),
    (error: unknown) => {
      assert.ok(error instanceof FormatError);
      assert.equal(error.message, 'K1_001: local index 3 is outside task 001 (1..2)');
      return true;
    }
  );
});

test('renders header, node rows and connectivity in mesh layout', () => {
  const plan = partition([1, 2, 3, 4, 5], 1, 5);
  const assembler = new ResultAssembler(layout, ['M2', 'K1']);
  assembler.merge(plan.tasks[0], 'M2', [
    { localIndex: 1, amplitude: 0.5, phaseRadians: 0 },
    { localIndex: 4, amplitude: 1.25, phaseRadians: 0 }
  ]);

  const lines = assembler.render('M2', 'amplitude').split('\n');
  assert.equal(lines.length, 2 + 5 + 2 + 1);
  assert.equal(lines[9], '');
  assert.deepEqual(lines.slice(0, 9), [
    'test mesh',
    '2 5',
    '1 1.5 -1 0.5',
    '2 2.5 -2 -9999',
    '3 3.5 -3 -9999',
    '4 4.5 -4 1.25',
    '5 5.5 -5 -9999',
    '1 3 1 2 3',
    '2 3 2 3 4'
  ]);
  assert.equal(assembler.render('M2', 'phase').split('\n')[5], '4 4.5 -4 0');
  assert.equal(assembler.render('K1', 'phase').split('\n')[2], '1 1.5 -1 -9999');
});

test('merges task files from the work directory and writes outputs', async () => {
  const { dir, cleanup } = await makeWorkDir();
  try {
    const plan = partition([1, 3, 5], 2, 5);
    await writeFiles(dir, {
      M2_001: '1 0 0.5 0\n',
      K1_001: '1 0 0.1 0\n',
      M2_002: '2 0 0.75 0\n',
      K1_002: '1 0 0.2 0\n2 0 0.3 0\n'
    });
    const assembler = new ResultAssembler(layout, ['M2', 'K1']);
    for (const slice of plan.tasks) {
      await assembler.mergeTask(slice, dir);
    }
    const outputs = await assembler.writeOutputs(dir);

    assert.deepEqual(
      outputs.map((output) => path.basename(output.path)),
      ['amp_m2.gr3', 'pha_m2.gr3', 'amp_k1.gr3', 'pha_k1.gr3']
    );
    const ampM2 = (await readFile(path.join(dir, 'amp_m2.gr3'), 'utf8')).split('\n');
    assert.deepEqual(ampM2.slice(2, 7), ['1 1.5 -1 0.5', '2 2.5 -2 -9999', '3 3.5 -3 -9999', '4 4.5 -4 -9999', '5 5.5 -5 0.75']);
    const ampK1 = (await readFile(path.join(dir, 'amp_k1.gr3'), 'utf8')).split('\n');
    assert.deepEqual(ampK1.slice(2, 7), ['1 1.5 -1 0.1', '2 2.5 -2 -9999', '3 3.5 -3 0.2', '4 4.5 -4 -9999', '5 5.5 -5 0.3']);
    assert.equal(assembler.unresolvedCount('M2'), 3);
    assert.equal(assembler.unresolvedCount('K1'), 2);
  } finally {
    await cleanup();
  }
});

test('reports a missing partial result file', async () => {
  const { dir, cleanup } = await makeWorkDir();
  try {
    const plan = partition([1, 2], 1, 5);
    await writeFiles(dir, { M2_001: '1 0 0.5 0\n' });
    const assembler = new ResultAssembler(layout, ['M2', 'K1']);
    await assert.rejects(assembler.mergeTask(plan.tasks[0], dir), (error: unknown) => {
      assert.ok(error instanceof IOError);
      assert.equal(error.path, path.join(dir, 'K1_001'));
      return true;
    });
  } finally {
    await cleanup();
  }
});
