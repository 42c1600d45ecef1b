import { OutputParser } from './runners/base/OutputParser';
import { GoTestOutputParser } from './runners/gotest/GoTestOutputParser';
import {
  BenchmarkLine,
  OutputRecordLine,
  PackageResultLine,
  StatusLine
} from './types/lines';
import { Benchmark, Package, Report, Test, createTest, toMilliseconds } from './types/report';
import { parseNanoseconds, parseSeconds } from './utils/durations';
import { baseName } from './utils/path';
import { Logger } from './utils/logger';

/**
 * Accumulates tests per package until a package result line flushes them
 * into the report. One builder per parsed stream.
 */
export class ReportBuilder {
  private report = new Report();
  // package name -> test name -> test, both in first-seen order
  private suites = new Map<string, Map<string, Test>>();
  private benchmarks = new Map<string, Benchmark[]>();
  private lastSuite: string | null = null;
  // Last test resolved by a status line. Survives a flush.
  private current: Test | null = null;
  private lineCount = 0;
  private outputParser: OutputParser;
  private logger: Logger;

  constructor(outputParser: OutputParser = new GoTestOutputParser()) {
    this.outputParser = outputParser;
    this.logger = Logger.create('report-builder');
  }

  /**
   * Classify one line (without its line terminator) and apply it
   */
  addLine(line: string): void {
    this.lineCount++;
    const classified = this.outputParser.classifyLine(line);

    switch (classified.kind) {
      case 'packageResult':
        this.flush(classified);
        break;
      case 'status':
        this.resolveStatus(classified);
        break;
      case 'benchmark':
        this.addBenchmark(classified);
        break;
      case 'output':
        this.appendOutput(classified);
        break;
      case 'summary':
      case 'text':
        this.appendToCurrent(classified.raw);
        break;
    }
  }

  /**
   * Return the report. Packages never closed by a result line are left out.
   */
  finish(): Report {
    if (this.suites.size > 0) {
      this.logger.debug('Discarding packages without a result line', {
        packages: Array.from(this.suites.keys())
      });
    }
    this.logger.lifecycle('Report complete', {
      lines: this.lineCount,
      packages: this.report.packages.length,
      failures: this.report.failures()
    });
    return this.report;
  }

  private flush(line: PackageResultLine): void {
    // The result line's own name, timing and coverage are not applied;
    // packages are built from the accumulated tests only.
    this.logger.debug('Package result line', {
      line: this.lineCount,
      status: line.status,
      packageName: line.packageName,
      seconds: line.seconds,
      cached: line.cached,
      failureMarker: line.failureMarker,
      coveragePct: line.coveragePct
    });

    for (const [suite, tests] of this.suites) {
      const finalTests = Array.from(tests.values());
      const duration = finalTests.reduce((sum, test) => sum + test.duration, 0);
      const pkg: Package = {
        name: suite,
        duration,
        tests: finalTests,
        benchmarks: this.benchmarks.get(suite) ?? [],
        coveragePct: '',
        time: toMilliseconds(duration)
      };
      this.report.packages.push(pkg);
      this.logger.debug('Package flushed', { name: suite, tests: finalTests.length, duration });
    }

    this.suites = new Map();
    this.benchmarks = new Map();
    this.lastSuite = null;
  }

  private resolveStatus(line: StatusLine): void {
    const name = baseName(line.testName);
    const test = this.findTest(name);

    if (!test) {
      this.logger.debug('Status line for unknown test', { line: this.lineCount, name });
      this.current = null;
      return;
    }

    test.result = line.result;
    test.duration = parseSeconds(line.seconds);
    test.time = toMilliseconds(test.duration);
    test.subtestIndent = line.indent;
    this.current = test;
  }

  /**
   * First test with this name, scanning packages in first-seen order
   */
  private findTest(name: string): Test | null {
    for (const tests of this.suites.values()) {
      const test = tests.get(name);
      if (test) return test;
    }
    return null;
  }

  private addBenchmark(line: BenchmarkLine): void {
    if (this.lastSuite === null) {
      this.logger.debug('Benchmark outside any package', { line: this.lineCount, name: line.name });
      return;
    }

    const benchmark: Benchmark = {
      name: line.name,
      duration: parseNanoseconds(line.nsPerOp),
      bytes: line.bytesPerOp === '' ? 0 : parseInt(line.bytesPerOp, 10),
      allocs: line.allocsPerOp === '' ? 0 : parseInt(line.allocsPerOp, 10)
    };

    let list = this.benchmarks.get(this.lastSuite);
    if (!list) {
      list = [];
      this.benchmarks.set(this.lastSuite, list);
    }
    list.push(benchmark);
  }

  private appendOutput(line: OutputRecordLine): void {
    let tests = this.suites.get(line.suite);
    if (!tests) {
      tests = new Map();
      this.suites.set(line.suite, tests);
    }

    let test = tests.get(line.test);
    if (!test) {
      test = createTest(line.test);
      tests.set(line.test, test);
    }

    test.output.push(line.msg);
    this.lastSuite = line.suite;
  }

  private appendToCurrent(raw: string): void {
    if (!this.current) return;

    if (this.current.result === 'FAIL') {
      this.current.failure.push(raw);
    } else if (this.current.result === 'SKIP') {
      this.current.skipMsg.push(raw);
    }
  }
}
