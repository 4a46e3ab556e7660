import yargs from 'yargs';

import type { PipelineConfigInput } from '../config.js';
import { UsageError } from '../errors.js';
import type { HarmonicRunRequest } from '../pipeline.js';

export const USAGE = `Usage: harmonic-fanout <extract> <analysis> <job-template> <tidal-constants> <tasks> <start-stack> <end-stack> [options]

  extract          full path to the extraction executable (e.g. read_output8_allnodes_simple)
  analysis         full path to the harmonic analysis executable (e.g. tidal_analysis)
  job-template     batch script used as the template for every task
  tidal-constants  full path to the tidal constants file
  tasks            number of batch jobs to split the active nodes across
  start-stack      first output stack to analyse
  end-stack        last output stack to analyse

Example: harmonic-fanout /opt/bin/read_output8_allnodes_simple /opt/bin/tidal_analysis ./run_comb ./tidal_const.dat 3 2 4

Run in the directory holding hgrid.gr3 and include.gr3 (or pass --work-dir).`;

export interface CliInvocation {
  readonly request: HarmonicRunRequest;
  readonly configPath?: string;
  readonly logLevel?: string;
  readonly overrides: PipelineConfigInput;
}

function requireInteger(name: string, value: number, minimum: number): number {
  if (!Number.isInteger(value) || value < minimum) {
    throw new UsageError(`${name} must be an integer >= ${minimum}, got ${value}\n\n${USAGE}`);
  }
  return value;
}

export async function parseCliArguments(args: readonly string[], cwd: string = process.cwd()): Promise<CliInvocation> {
  let invocation: CliInvocation | undefined;

  await yargs([...args])
    .scriptName('harmonic-fanout')
    .usage(USAGE)
    .command(
      '$0 <extract> <analysis> <template> <constants> <tasks> <start> <end>',
      'Fan a harmonic analysis out over batch jobs and assemble the results',
      (cmd) =>
        cmd
          .positional('extract', { type: 'string', demandOption: true })
          .positional('analysis', { type: 'string', demandOption: true })
          .positional('template', { type: 'string', demandOption: true })
          .positional('constants', { type: 'string', demandOption: true })
          .positional('tasks', { type: 'number', demandOption: true })
          .positional('start', { type: 'number', demandOption: true })
          .positional('end', { type: 'number', demandOption: true })
          .option('work-dir', {
            type: 'string',
            default: cwd,
            describe: 'Directory holding hgrid.gr3/include.gr3; all task files are written here.'
          })
          .option('output-dir', {
            type: 'string',
            describe: 'Where the assembled .gr3 files go (default: work dir).'
          })
          .option('config', {
            type: 'string',
            describe: 'Path to a harmonic.config.{yml,json} file.'
          })
          .option('poll-interval', {
            type: 'number',
            describe: 'Seconds between completion checks.'
          })
          .option('max-wait', {
            type: 'number',
            describe: 'Minutes to wait for every task before failing the run.'
          })
          .option('log-level', {
            type: 'string',
            choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const,
            describe: 'Log verbosity (default LOG_LEVEL or info).'
          }),
      (argv) => {
        if (argv._.length > 0) {
          throw new UsageError(`Expected 7 arguments, got ${7 + argv._.length}\n\n${USAGE}`);
        }
        const pollInterval = argv['poll-interval'];
        const maxWait = argv['max-wait'];
        invocation = {
          request: {
            extractExecutable: argv.extract,
            analysisExecutable: argv.analysis,
            templatePath: argv.template,
            constantsFile: argv.constants,
            taskCount: requireInteger('tasks', argv.tasks, 1),
            startStack: requireInteger('start-stack', argv.start, 0),
            endStack: requireInteger('end-stack', argv.end, 0),
            workDir: argv['work-dir'],
            outputDir: argv['output-dir']
          },
          configPath: argv.config,
          logLevel: argv['log-level'],
          overrides: {
            polling: {
              intervalMs: pollInterval === undefined ? undefined : Math.round(pollInterval * 1000),
              maxWaitMs: maxWait === undefined ? undefined : Math.round(maxWait * 60_000)
            }
          }
        };
      }
    )
    .strict()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      if (error) {
        throw error;
      }
      throw new UsageError(`${message}\n\n${USAGE}`);
    })
    .parseAsync();

  if (!invocation) {
    throw new UsageError(USAGE);
  }
  if (invocation.request.endStack < invocation.request.startStack) {
    throw new UsageError(
      `end-stack (${invocation.request.endStack}) is before start-stack (${invocation.request.startStack})\n\n${USAGE}`
    );
  }
  return invocation;
}
