import { describe, it, expect } from 'vitest';
import { formatDuration, formatSummary } from '../../src/SummaryPrinter';
import { parseString } from '../../src/parse';
import { Report } from '../../src/types/report';

const record = (suite: string, test: string, msg: string): string =>
  JSON.stringify({ Suite: suite, Test: test, Msg: msg });

describe('SummaryPrinter', () => {
  describe('formatDuration', () => {
    it('should print milliseconds below one second', () => {
      expect(formatDuration(0)).toBe('0ms');
      expect(formatDuration(30_000_000)).toBe('30ms');
    });

    it('should print seconds from one second up', () => {
      expect(formatDuration(1_500_000_000)).toBe('1.50s');
    });
  });

  describe('formatSummary', () => {
    it('should say so when there are no packages', () => {
      expect(formatSummary(new Report())).toEqual(['No package results found in the test output.']);
    });

    it('should list packages, failed tests and totals', () => {
      const report = parseString([
        record('example.com/calc', 'TestDiv', 'x'),
        record('example.com/calc', 'TestAdd', 'x'),
        '--- PASS: TestAdd (0.01s)',
        '--- FAIL: TestDiv (0.02s)',
        '    calc_test.go:21: division by zero',
        'FAIL example.com/calc 0.030s',
        record('example.com/strs', 'TestTrim', 'x'),
        record('example.com/strs', 'TestPad', 'x'),
        '--- SKIP: TestPad (0.00s)',
        'BenchmarkTrim 1000 52 ns/op',
        'ok   example.com/strs 0.004s'
      ].join('\n'));

      expect(formatSummary(report)).toEqual([
        'FAIL example.com/calc (1 passed, 1 failed) 30ms',
        'ok   example.com/strs (1 passed, 1 skipped, 1 benchmark) 0ms',
        '',
        'Failed tests:',
        '- example.com/calc: TestDiv (20ms)',
        '    calc_test.go:21: division by zero',
        '',
        '4 tests in 2 packages, 1 failed'
      ]);
    });
  });
});
