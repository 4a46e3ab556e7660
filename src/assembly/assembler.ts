import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { FormatError, formatTaskId, isMissingFile, toIOError } from '../errors.js';
import { artifactNames } from '../jobs/artifacts.js';
import type { MeshLayout } from '../mesh/meshIndex.js';
import { resolveGlobal, type TaskSlice } from '../partition/partitioner.js';

export const UNRESOLVED = -9999;
const DEGREES_PER_RADIAN = 180 / Math.PI;

export type FieldKind = 'amplitude' | 'phase';

export interface PartialResultRow {
  readonly localIndex: number;
  readonly amplitude: number;
  readonly phaseRadians: number;
}

/** Amplitude and phase (degrees) for one constituent; slot `id - 1` holds node `id`. */
export interface AssembledField {
  readonly constituent: string;
  readonly amplitude: Float64Array;
  readonly phase: Float64Array;
}

export interface OutputFile {
  readonly constituent: string;
  readonly field: FieldKind;
  readonly path: string;
}

export function parsePartialResult(text: string, source: string): PartialResultRow[] {
  const rows: PartialResultRow[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    const parts = line.trim().split(/\s+/).filter(Boolean);
    if (parts.length === 0) {
      return;
    }
    const localIndex = Number(parts[0]);
    const amplitude = Number(parts[2]);
    const phaseRadians = Number(parts[3]);
    if (parts.length < 4 || !Number.isInteger(localIndex) || Number.isNaN(amplitude) || Number.isNaN(phaseRadians)) {
      throw new FormatError(source, `line ${i + 1} is not "<local_index> <ignored> <amplitude> <phase>": "${line.trim()}"`);
    }
    rows.push({ localIndex, amplitude, phaseRadians });
  });
  return rows;
}

export class ResultAssembler {
  private readonly fields = new Map<string, AssembledField>();

  constructor(
    private readonly layout: MeshLayout,
    readonly constituents: readonly string[],
    private readonly sentinel: number = UNRESOLVED
  ) {
    for (const constituent of constituents) {
      this.fields.set(constituent, {
        constituent,
        amplitude: new Float64Array(layout.nodeCount).fill(sentinel),
        phase: new Float64Array(layout.nodeCount).fill(sentinel)
      });
    }
  }

  field(constituent: string): AssembledField {
    const field = this.fields.get(constituent);
    if (!field) {
      throw new RangeError(`Unknown constituent ${constituent}; expected one of ${this.constituents.join(', ')}`);
    }
    return field;
  }

  merge(slice: TaskSlice, constituent: string, rows: readonly PartialResultRow[]): void {
    const field = this.field(constituent);
    for (const row of rows) {
      const globalId = resolveGlobal(slice, row.localIndex);
      if (globalId === undefined) {
        throw new FormatError(
          artifactNames.partialResult(constituent, slice.index),
          `local index ${row.localIndex} is outside task ${formatTaskId(slice.index)} (1..${slice.size})`
        );
      }
      field.amplitude[globalId - 1] = row.amplitude;
      field.phase[globalId - 1] = row.phaseRadians * DEGREES_PER_RADIAN;
    }
  }

  async mergeTask(slice: TaskSlice, workDir: string): Promise<void> {
    for (const constituent of this.constituents) {
      const resultPath = path.join(workDir, artifactNames.partialResult(constituent, slice.index));
      let text: string;
      try {
        text = await readFile(resultPath, 'utf8');
      } catch (error) {
        if (slice.size === 0 && isMissingFile(error)) {
          continue;
        }
        throw toIOError(error, resultPath);
      }
      this.merge(slice, constituent, parsePartialResult(text, resultPath));
    }
  }

  unresolvedCount(constituent: string): number {
    const { amplitude } = this.field(constituent);
    return amplitude.reduce((count, value) => (value === this.sentinel ? count + 1 : count), 0);
  }

  render(constituent: string, kind: FieldKind): string {
    const values = this.field(constituent)[kind];
    const lines: string[] = [...this.layout.headerLines];
    this.layout.coordinates.forEach((coordinate, i) => {
      lines.push(`${i + 1} ${coordinate.x} ${coordinate.y} ${values[i]}`);
    });
    lines.push(...this.layout.connectivityLines);
    return `${lines.join('\n')}\n`;
  }

  async writeOutputs(outputDir: string): Promise<OutputFile[]> {
    const outputs: OutputFile[] = [];
    for (const constituent of this.constituents) {
      outputs.push(
        { constituent, field: 'amplitude', path: path.join(outputDir, artifactNames.amplitudeOutput(constituent)) },
        { constituent, field: 'phase', path: path.join(outputDir, artifactNames.phaseOutput(constituent)) }
      );
    }
    for (const output of outputs) {
      try {
        await writeFile(output.path, this.render(output.constituent, output.field), 'utf8');
      } catch (error) {
        throw toIOError(error, output.path, 'write');
      }
    }
    return outputs;
  }
}
