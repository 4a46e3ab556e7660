export type PipelineErrorCode =
  | 'IO_ERROR'
  | 'FORMAT_ERROR'
  | 'SUBMISSION_ERROR'
  | 'INCOMPLETE_TASK'
  | 'CONFIGURATION_ERROR'
  | 'ABORTED';

interface ErrorLike {
  cause?: unknown;
}

export class HarmonicPipelineError extends Error {
  public readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options: ErrorLike = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'HarmonicPipelineError';
    this.code = code;
  }
}

/** A required input or output file could not be read or written. */
export class IOError extends HarmonicPipelineError {
  public readonly path: string;

  constructor(path: string, message: string, options: ErrorLike = {}) {
    super('IO_ERROR', message, options);
    this.name = 'IOError';
    this.path = path;
  }
}

/** Record counts disagree, or a row does not have the expected shape. */
export class FormatError extends HarmonicPipelineError {
  public readonly source: string;

  constructor(source: string, message: string, options: ErrorLike = {}) {
    super('FORMAT_ERROR', `${source}: ${message}`, options);
    this.name = 'FormatError';
    this.source = source;
  }
}

export class SubmissionError extends HarmonicPipelineError {
  public readonly taskIndex: number;

  constructor(taskIndex: number, message: string, options: ErrorLike = {}) {
    super('SUBMISSION_ERROR', `task ${formatTaskId(taskIndex)}: ${message}`, options);
    this.name = 'SubmissionError';
    this.taskIndex = taskIndex;
  }
}

export class IncompleteTaskError extends HarmonicPipelineError {
  public readonly taskIndexes: readonly number[];

  constructor(taskIndexes: readonly number[], waitedMs: number) {
    const ids = taskIndexes.map(formatTaskId).join(', ');
    super(
      'INCOMPLETE_TASK',
      `no completion marker after ${Math.round(waitedMs / 1000)}s for task(s) ${ids}`
    );
    this.name = 'IncompleteTaskError';
    this.taskIndexes = [...taskIndexes];
  }
}

export class ConfigurationError extends HarmonicPipelineError {
  constructor(message: string, options: ErrorLike = {}) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

export class PipelineAbortedError extends HarmonicPipelineError {
  constructor(reason?: unknown) {
    super('ABORTED', 'harmonic analysis run aborted', { cause: reason });
    this.name = 'PipelineAbortedError';
  }
}

export function formatTaskId(taskIndex: number): string {
  return String(taskIndex).padStart(3, '0');
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Wraps a filesystem failure so the diagnostic names the file. Errors that are already
 * pipeline errors pass through untouched.
 */
export function toIOError(error: unknown, path: string, action = 'read'): HarmonicPipelineError {
  if (error instanceof HarmonicPipelineError) {
    return error;
  }
  const reason = isMissingFile(error) ? 'file not found' : error instanceof Error ? error.message : String(error);
  return new IOError(path, `cannot ${action} ${path}: ${reason}`, { cause: error });
}

/** Wrong command-line arguments; the message carries the usage text. */
export class UsageError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
