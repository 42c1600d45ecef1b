import { createReadStream, promises as fs } from 'fs';
import { configure } from './config';
import { OutputSource, parse } from './parse';
import { formatSummary } from './SummaryPrinter';
import { Report } from './types/report';
import { Logger } from './utils/logger';

export interface RunOptions {
  packageName?: string;
  json?: boolean;
  setExitCode?: boolean;
  logFile?: string;
  debug?: boolean;
}

export class CLIOrchestrator {
  private logger: Logger;
  private stdin: OutputSource;

  constructor(stdin: OutputSource = process.stdin) {
    this.stdin = stdin;
    this.logger = Logger.create('cli');
  }

  /**
   * Parse the given file (standard input when omitted or "-") and print the
   * report. Resolves to the process exit code.
   */
  async run(file: string | undefined, options: RunOptions = {}): Promise<number> {
    if (options.logFile !== undefined) configure({ logFile: options.logFile });
    if (options.debug) configure({ debug: true });

    this.logger.lifecycle('Starting', { file: file ?? '<stdin>', options: { ...options } });

    try {
      let report: Report;
      if (file === undefined || file === '-') {
        report = await parse(this.stdin, options.packageName);
      } else {
        if (!(await this.isReadable(file))) {
          console.error(`Oh dear! I cannot read the test output file: ${file}`);
          return 1;
        }
        report = await parse(createReadStream(file), options.packageName);
      }

      this.print(report, options.json === true);

      const failures = report.failures();
      const exitCode = options.setExitCode && failures > 0 ? 1 : 0;
      this.logger.decision('Exit code', String(exitCode), `${failures} failed tests`);
      return exitCode;
    } catch (error) {
      this.logger.error('Failed to parse test output', error);
      console.error('Oh no! Reading the test output failed:', error);
      return 1;
    }
  }

  private async isReadable(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch (error) {
      this.logger.warn('Input file not accessible', { file, error: String(error) });
      return false;
    }
  }

  private print(report: Report, asJson: boolean): void {
    if (asJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    formatSummary(report).forEach(line => console.log(line));
  }
}
