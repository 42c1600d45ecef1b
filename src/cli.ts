#!/usr/bin/env node

import { Command } from 'commander';
import { CLIOrchestrator, RunOptions } from './CLIOrchestrator';

// Main entry point
const program = new Command();

program
  .name('gotest-report')
  .description('Turn go test output into a structured test report')
  .version('0.1.0')
  .argument('[file]', 'go test output to read (standard input when omitted or "-")')
  .option('-p, --package-name <name>', 'package name to assume when it is known out-of-band')
  .option('--json', 'print the report as JSON instead of a summary')
  .option('--set-exit-code', 'exit with status 1 when any test failed')
  .option('--log-file <path>', 'write a debug log to this file')
  .option('--debug', 'include debug entries in the log')
  .action(async (file: string | undefined, options: RunOptions) => {
    const orchestrator = new CLIOrchestrator();
    const exitCode = await orchestrator.run(file, options);
    process.exit(exitCode);
  });

// Parse arguments
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Oh no! A catastrophic error occurred:', error);
  process.exit(1);
});
