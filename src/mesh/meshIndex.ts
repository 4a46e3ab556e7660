import { readFile } from 'node:fs/promises';

import { FormatError, toIOError } from '../errors.js';

export const DEFAULT_INCLUSION_THRESHOLD = 0.1;

export interface MeshNode {
  /** 1-based global id, the node's position in the mesh file. */
  readonly id: number;
  readonly x: string;
  readonly y: string;
  readonly active: boolean;
}

/**
 * Everything needed to write a field back out in the mesh's own layout. Coordinates and
 * the header/connectivity blocks are kept as written so outputs reproduce them exactly.
 */
export interface MeshLayout {
  readonly headerLines: readonly [string, string];
  readonly elementCount: number;
  readonly nodeCount: number;
  readonly coordinates: ReadonlyArray<{ readonly x: string; readonly y: string }>;
  readonly connectivityLines: readonly string[];
}

export interface MeshIndex {
  readonly layout: MeshLayout;
  readonly nodes: readonly MeshNode[];
  /** Global ids of the active nodes, in mesh order. */
  readonly activeNodes: readonly number[];
}

export interface LoadMeshIndexOptions {
  readonly meshPath: string;
  readonly maskPath: string;
  readonly threshold?: number;
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function fields(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

function parseCounts(line: string | undefined, source: string): { elementCount: number; nodeCount: number } {
  const [elements, nodes] = fields(line ?? '');
  const elementCount = Number(elements);
  const nodeCount = Number(nodes);
  if (!Number.isInteger(elementCount) || !Number.isInteger(nodeCount) || elementCount < 0 || nodeCount < 0) {
    throw new FormatError(source, `line 2 must hold "<element_count> <node_count>", got "${line ?? ''}"`);
  }
  return { elementCount, nodeCount };
}

export function parseMesh(text: string, source: string): MeshLayout {
  const lines = splitLines(text);
  const { elementCount, nodeCount } = parseCounts(lines[1], source);

  const required = 2 + nodeCount + elementCount;
  if (lines.length < required) {
    throw new FormatError(
      source,
      `header declares ${nodeCount} nodes and ${elementCount} elements (${required} lines) but the file has ${lines.length} lines`
    );
  }

  const coordinates: Array<{ x: string; y: string }> = [];
  for (let i = 0; i < nodeCount; i += 1) {
    const row = fields(lines[i + 2]);
    if (row.length < 4) {
      throw new FormatError(source, `node row ${i + 1} (line ${i + 3}) has ${row.length} fields, expected 4`);
    }
    coordinates.push({ x: row[1], y: row[2] });
  }

  return {
    headerLines: [lines[0], lines[1]],
    elementCount,
    nodeCount,
    coordinates,
    connectivityLines: lines.slice(2 + nodeCount, required)
  };
}

/**
 * Reads the trailing value of each node row of a mask file. The mask shares the mesh
 * layout, so its declared node count must match `expectedNodes`.
 */
export function parseInclusionMask(
  text: string,
  source: string,
  expectedNodes: number,
  threshold: number = DEFAULT_INCLUSION_THRESHOLD
): boolean[] {
  const lines = splitLines(text);
  const { nodeCount } = parseCounts(lines[1], source);
  if (nodeCount !== expectedNodes) {
    throw new FormatError(source, `mask declares ${nodeCount} nodes but the mesh has ${expectedNodes}`);
  }
  if (lines.length < 2 + nodeCount) {
    throw new FormatError(source, `mask declares ${nodeCount} nodes but only ${Math.max(0, lines.length - 2)} rows follow`);
  }

  const flags: boolean[] = [];
  for (let i = 0; i < nodeCount; i += 1) {
    const row = fields(lines[i + 2]);
    const value = Number(row[3]);
    if (row.length < 4 || Number.isNaN(value)) {
      throw new FormatError(source, `mask row ${i + 1} (line ${i + 3}) has no numeric fourth column`);
    }
    flags.push(value > threshold);
  }
  return flags;
}

export function buildMeshIndex(layout: MeshLayout, flags: readonly boolean[]): MeshIndex {
  const nodes: MeshNode[] = layout.coordinates.map((coordinate, i) => ({
    id: i + 1,
    x: coordinate.x,
    y: coordinate.y,
    active: flags[i] ?? false
  }));
  return {
    layout,
    nodes,
    activeNodes: nodes.filter((node) => node.active).map((node) => node.id)
  };
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw toIOError(error, path);
  }
}

export async function loadMeshIndex(options: LoadMeshIndexOptions): Promise<MeshIndex> {
  const [meshText, maskText] = await Promise.all([readText(options.meshPath), readText(options.maskPath)]);
  const layout = parseMesh(meshText, options.meshPath);
  const flags = parseInclusionMask(maskText, options.maskPath, layout.nodeCount, options.threshold);
  return buildMeshIndex(layout, flags);
}
