import { execFile } from 'node:child_process';
import path from 'node:path';

import { SubmissionError } from '../errors.js';

export interface JobScript {
  readonly taskIndex: number;
  /** Absolute path of the rendered script. */
  readonly path: string;
}

export interface JobHandle {
  readonly taskIndex: number;
  readonly scriptPath: string;
  /** Identifier returned by the scheduler; empty for tasks that were never submitted. */
  readonly jobId: string;
  readonly skipped: boolean;
}

export interface JobSubmitter {
  submit(script: JobScript): Promise<JobHandle>;
  cancel(handle: JobHandle): Promise<void>;
}

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[], cwd: string) => Promise<CommandResult>;

export const execCommand: CommandRunner = (command, args, cwd) =>
  new Promise((resolve, reject) => {
    execFile(command, [...args], { cwd, maxBuffer: 1024 * 1024 }, (error, stdout, stderr) => {
      if (error) {
        const stderrPreview = stderr.trim() ? ` stderr=${stderr.trim().slice(0, 500)}` : '';
        reject(new Error(`${command} ${args.join(' ')} failed: ${error.message}${stderrPreview}`, { cause: error }));
        return;
      }
      resolve({ stdout, stderr });
    });
  });

export interface CommandJobSubmitterOptions {
  readonly workDir: string;
  /** Submit command with any leading arguments, e.g. `qsub` or `sbatch --parsable`. */
  readonly submitCommand?: string;
  readonly cancelCommand?: string;
  readonly run?: CommandRunner;
}

function splitCommand(command: string): [string, string[]] {
  const [program, ...args] = command.trim().split(/\s+/);
  return [program, args];
}

/** The job id is the last whitespace-separated token the scheduler prints. */
export function parseJobId(stdout: string): string | undefined {
  const tokens = stdout.trim().split(/\s+/).filter(Boolean);
  return tokens.length > 0 ? tokens[tokens.length - 1] : undefined;
}

/**
 * Submits rendered scripts through the cluster's command-line tools, run from the work
 * directory so relative paths in the script resolve there.
 */
export class CommandJobSubmitter implements JobSubmitter {
  private readonly workDir: string;
  private readonly submitCommand: [string, string[]];
  private readonly cancelCommand: [string, string[]];
  private readonly run: CommandRunner;

  constructor(options: CommandJobSubmitterOptions) {
    this.workDir = options.workDir;
    this.submitCommand = splitCommand(options.submitCommand ?? 'qsub');
    this.cancelCommand = splitCommand(options.cancelCommand ?? 'qdel');
    this.run = options.run ?? execCommand;
  }

  async submit(script: JobScript): Promise<JobHandle> {
    const [program, args] = this.submitCommand;
    const scriptArg = path.relative(this.workDir, script.path) || script.path;
    let result: CommandResult;
    try {
      result = await this.run(program, [...args, scriptArg], this.workDir);
    } catch (error) {
      throw new SubmissionError(script.taskIndex, `scheduler rejected ${scriptArg}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }
    const jobId = parseJobId(result.stdout);
    if (!jobId) {
      throw new SubmissionError(script.taskIndex, `${program} printed no job id for ${scriptArg}`);
    }
    return { taskIndex: script.taskIndex, scriptPath: script.path, jobId, skipped: false };
  }

  async cancel(handle: JobHandle): Promise<void> {
    if (handle.skipped || !handle.jobId) {
      return;
    }
    const [program, args] = this.cancelCommand;
    await this.run(program, [...args, handle.jobId], this.workDir);
  }
}
