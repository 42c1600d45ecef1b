/**
 * Durations are integer nanoseconds, the finest resolution go test prints.
 */
export type Duration = number;

export const NANOSECOND: Duration = 1;
export const MICROSECOND: Duration = 1000 * NANOSECOND;
export const MILLISECOND: Duration = 1000 * MICROSECOND;
export const SECOND: Duration = 1000 * MILLISECOND;

export type Result = 'PASS' | 'FAIL' | 'SKIP';

export interface Test {
  name: string;
  duration: Duration;
  result: Result;
  /** Output captured from structured records */
  output: string[];
  /** Lines following a FAIL status line */
  failure: string[];
  /** Lines following a SKIP status line */
  skipMsg: string[];
  subtestIndent: string;
  /** @deprecated use duration; whole milliseconds */
  time: number;
}

export interface Benchmark {
  name: string;
  /** Time per operation */
  duration: Duration;
  /** B/op */
  bytes: number;
  /** allocs/op */
  allocs: number;
}

export interface Package {
  name: string;
  duration: Duration;
  tests: Test[];
  benchmarks: Benchmark[];
  /** Empty when the package did not report coverage */
  coveragePct: string;
  /** @deprecated use duration; whole milliseconds */
  time: number;
}

export function toMilliseconds(duration: Duration): number {
  return Math.trunc(duration / MILLISECOND);
}

export function createTest(name: string): Test {
  return {
    name,
    duration: 0,
    result: 'PASS',
    output: [],
    failure: [],
    skipMsg: [],
    subtestIndent: '',
    time: 0
  };
}

/**
 * Collection of package results
 */
export class Report {
  packages: Package[] = [];

  /**
   * Count failed tests across all packages
   */
  failures(): number {
    let count = 0;
    for (const pkg of this.packages) {
      for (const test of pkg.tests) {
        if (test.result === 'FAIL') {
          count++;
        }
      }
    }
    return count;
  }
}
