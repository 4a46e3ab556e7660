import { FormatError } from '../errors.js';

export const ENTRYPOINT_PLACEHOLDER = '{{entrypoint}}';
export const JOB_NAME_PLACEHOLDER = '{{jobName}}';

/**
 * A scheduler script split into literal lines and the two slots rewritten per task.
 * Each segment keeps its original line terminator.
 */
export type TemplateSegment =
  | { readonly kind: 'literal'; readonly text: string; readonly eol: string }
  | { readonly kind: 'entrypoint'; readonly eol: string }
  | { readonly kind: 'jobName'; readonly directive: string; readonly eol: string };

export interface JobTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
}

export interface TemplateMarkers {
  /** Substrings that mark the line launching the analysis. */
  readonly entrypoint: readonly string[];
}

export interface JobScriptValues {
  readonly entrypoint: string;
  readonly jobName: string;
}

const JOB_NAME_DIRECTIVES: ReadonlyArray<{ pattern: RegExp; render: (name: string) => string }> = [
  { pattern: /^\s*#PBS\b.*\s-N\b/, render: (name) => `#PBS -N ${name}` },
  { pattern: /^\s*#SBATCH\b.*(--job-name\b|\s-J\b)/, render: (name) => `#SBATCH --job-name=${name}` },
  { pattern: /^\s*#\$.*\s-N\b/, render: (name) => `#$ -N ${name}` }
];

function splitWithTerminators(text: string): Array<{ line: string; eol: string }> {
  const parts: Array<{ line: string; eol: string }> = [];
  const pattern = /([^\r\n]*)(\r\n|\n|$)/g;
  let match = pattern.exec(text);
  while (match && match.index < text.length) {
    parts.push({ line: match[1], eol: match[2] });
    if (match[2] === '') {
      break;
    }
    match = pattern.exec(text);
  }
  return parts;
}

function detectJobNameDirective(line: string): string | undefined {
  if (line.includes(JOB_NAME_PLACEHOLDER)) {
    return line;
  }
  return JOB_NAME_DIRECTIVES.find(({ pattern }) => pattern.test(line))?.render(JOB_NAME_PLACEHOLDER);
}

export function parseJobTemplate(text: string, markers: TemplateMarkers, source = 'job template'): JobTemplate {
  const segments: TemplateSegment[] = [];

  for (const { line, eol } of splitWithTerminators(text)) {
    if (line.includes(ENTRYPOINT_PLACEHOLDER) || markers.entrypoint.some((marker) => line.includes(marker))) {
      segments.push({ kind: 'entrypoint', eol });
      continue;
    }
    const directive = detectJobNameDirective(line);
    if (directive) {
      segments.push({ kind: 'jobName', directive, eol });
      continue;
    }
    segments.push({ kind: 'literal', text: line, eol });
  }

  if (!segments.some((segment) => segment.kind === 'entrypoint')) {
    const hints = [ENTRYPOINT_PLACEHOLDER, ...markers.entrypoint].map((hint) => `"${hint}"`).join(', ');
    throw new FormatError(source, `no line launches the analysis; mark it with one of ${hints}`);
  }

  return { source, segments };
}

export function renderJobScript(template: JobTemplate, values: JobScriptValues): string {
  return template.segments
    .map((segment) => {
      switch (segment.kind) {
        case 'entrypoint':
          return `${values.entrypoint}${segment.eol || '\n'}`;
        case 'jobName':
          return `${segment.directive.split(JOB_NAME_PLACEHOLDER).join(values.jobName)}${segment.eol || '\n'}`;
        default:
          return `${segment.text}${segment.eol}`;
      }
    })
    .join('');
}
