import { describe, it, expect } from 'vitest';
import { Package, Report, Result, createTest, toMilliseconds } from '../../../src/types/report';

function pkg(name: string, results: Result[]): Package {
  return {
    name,
    duration: 0,
    tests: results.map((result, i) => ({ ...createTest(`Test${i}`), result })),
    benchmarks: [],
    coveragePct: '',
    time: 0
  };
}

describe('Report', () => {
  describe('failures', () => {
    it('should return 0 for an empty report', () => {
      expect(new Report().failures()).toBe(0);
    });

    it('should count failed tests across all packages', () => {
      const report = new Report();
      report.packages.push(pkg('pkgA', ['FAIL', 'PASS']), pkg('pkgB', ['FAIL']));

      expect(report.failures()).toBe(2);
    });

    it('should not count skipped tests', () => {
      const report = new Report();
      report.packages.push(pkg('pkgA', ['SKIP', 'PASS', 'SKIP']));

      expect(report.failures()).toBe(0);
    });
  });

  describe('createTest', () => {
    it('should start as a passing test with no output', () => {
      expect(createTest('TestFoo')).toEqual({
        name: 'TestFoo',
        duration: 0,
        result: 'PASS',
        output: [],
        failure: [],
        skipMsg: [],
        subtestIndent: '',
        time: 0
      });
    });
  });

  describe('toMilliseconds', () => {
    it('should truncate to whole milliseconds', () => {
      expect(toMilliseconds(10_000_000)).toBe(10);
      expect(toMilliseconds(1_999_999)).toBe(1);
      expect(toMilliseconds(999_999)).toBe(0);
    });
  });
});
