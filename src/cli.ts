#!/usr/bin/env node
import chalk from 'chalk';
import { hideBin } from 'yargs/helpers';

import { parseCliArguments } from './cli/arguments.js';
import { loadPipelineConfig } from './config.js';
import { HarmonicPipelineError, UsageError } from './errors.js';
import { runHarmonicAnalysis, type PipelineReport } from './pipeline.js';
import { createLogger } from './utils/telemetry.js';

const printSummary = (report: PipelineReport) => {
  console.log();
  console.log(chalk.bold('Harmonic Analysis Run Summary'));
  console.table({
    'Active Nodes': `${report.activeNodes} of ${report.totalNodes}`,
    Tasks: report.taskSizes.length,
    'Task Sizes': report.taskSizes.join(', '),
    'Duration (s)': Math.round(report.elapsedMs / 1000)
  });
  for (const [constituent, count] of Object.entries(report.unresolved)) {
    if (count > 0) {
      console.log(chalk.yellow(`  ${constituent}: ${count} node(s) left at the unresolved sentinel`));
    }
  }
  for (const output of report.outputs) {
    console.log(chalk.green(`  wrote ${output.path}`));
  }
};

const main = async () => {
  const invocation = await parseCliArguments(hideBin(process.argv));
  const logger = createLogger('harmonic-fanout', invocation.logLevel);
  const config = loadPipelineConfig({
    workDir: invocation.request.workDir,
    configPath: invocation.configPath,
    overrides: invocation.overrides
  });

  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, 'Abort requested; cancelling outstanding jobs');
    controller.abort(new Error(`received ${signal}`));
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  const report = await runHarmonicAnalysis(invocation.request, {
    config,
    logger,
    signal: controller.signal
  });
  process.off('SIGINT', abort);
  process.off('SIGTERM', abort);
  printSummary(report);
};

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(error.message);
  } else if (error instanceof HarmonicPipelineError) {
    console.error(chalk.red(`${error.name}: ${error.message}`));
  } else {
    console.error(chalk.red(error instanceof Error ? (error.stack ?? error.message) : String(error)));
  }
  process.exitCode = 1;
});
