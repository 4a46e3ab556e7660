import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { FormatError, IOError } from '../src/errors.js';
import { loadMeshIndex, parseInclusionMask, parseMesh } from '../src/mesh/meshIndex.js';
import { makeWorkDir, maskText, meshText, writeFiles } from './test-utils.js';

test('parses header, coordinates and connectivity from a mesh', () => {
  const layout = parseMesh(meshText(5, 2), 'hgrid.gr3');
  assert.deepEqual(layout.headerLines, ['test mesh', '2 5']);
  assert.equal(layout.nodeCount, 5);
  assert.equal(layout.elementCount, 2);
  assert.deepEqual(layout.coordinates[0], { x: '1.5', y: '-1' });
  assert.deepEqual(layout.coordinates[4], { x: '5.5', y: '-5' });
  assert.deepEqual(layout.connectivityLines, ['1 3 1 2 3', '2 3 2 3 4']);
});

test('ignores boundary blocks after the connectivity lines', () => {
  const text = `${meshText(3, 1)}1 = Number of open boundaries\n`;
  const layout = parseMesh(text, 'hgrid.gr3');
  assert.deepEqual(layout.connectivityLines, ['1 3 1 2 3']);
});

test('rejects a mesh shorter than its header declares', () => {
  const truncated = meshText(5, 2).split('\n').slice(0, 6).join('\n');
  assert.throws(() => parseMesh(truncated, 'hgrid.gr3'), (error: unknown) => {
    assert.ok(error instanceof FormatError);
    assert.match(error.message, /declares 5 nodes and 2 elements \(9 lines\) but the file has 6 lines/);
    return true;
  });
});

test('rejects a node row without its depth field', () => {
  const lines = meshText(3, 1).split('\n');
  lines[3] = '2 2.5 -2';
  assert.throws(() => parseMesh(lines.join('\n'), 'hgrid.gr3'), (error: unknown) => {
    assert.ok(error instanceof FormatError);
    assert.equal(error.message, 'hgrid.gr3: node row 2 (line 4) has 3 fields, expected 4');
    return true;
  });
});

test('rejects a malformed count line', () => {
  assert.throws(() => parseMesh('title\nfive nodes\n', 'hgrid.gr3'), FormatError);
});

test('marks nodes active only above the inclusion threshold', () => {
  const flags = parseInclusionMask(maskText([0, 0.1, 0.11, 1, -2]), 'include.gr3', 5);
  assert.deepEqual(flags, [false, false, true, true, false]);
});

test('honours a custom inclusion threshold', () => {
  const flags = parseInclusionMask(maskText([0, 0.5, 2]), 'include.gr3', 3, 1);
  assert.deepEqual(flags, [false, false, true]);
});

test('rejects a mask whose node count disagrees with the mesh', () => {
  assert.throws(() => parseInclusionMask(maskText([1, 1, 1, 1]), 'include.gr3', 5), (error: unknown) => {
    assert.ok(error instanceof FormatError);
    assert.equal(error.message, 'include.gr3: mask declares 4 nodes but the mesh has 5');
    return true;
  });
});

test('loads the active node list in mesh order', async () => {
  const { dir, cleanup } = await makeWorkDir();
  try {
    await writeFiles(dir, {
      'hgrid.gr3': meshText(6, 2),
      'include.gr3': maskText([1, 0, 1, 1, 0, 1])
    });
    const index = await loadMeshIndex({
      meshPath: path.join(dir, 'hgrid.gr3'),
      maskPath: path.join(dir, 'include.gr3')
    });
    assert.deepEqual(index.activeNodes, [1, 3, 4, 6]);
    assert.equal(index.nodes.length, 6);
    assert.deepEqual(index.nodes[1], { id: 2, x: '2.5', y: '-2', active: false });
  } finally {
    await cleanup();
  }
});

test('names the missing file in an IOError', async () => {
  const { dir, cleanup } = await makeWorkDir();
  try {
    await writeFiles(dir, { 'hgrid.gr3': meshText(3, 1) });
    const maskPath = path.join(dir, 'include.gr3');
    await assert.rejects(loadMeshIndex({ meshPath: path.join(dir, 'hgrid.gr3'), maskPath }), (error: unknown) => {
      assert.ok(error instanceof IOError);
      assert.equal(error.path, maskPath);
      assert.equal(error.message, `cannot read ${maskPath}: file not found`);
      return true;
    });
  } finally {
    await cleanup();
  }
});
