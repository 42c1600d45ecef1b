import { OutputParser } from '../base/OutputParser';
import {
  BenchmarkLine,
  ClassifiedLine,
  OutputRecordLine,
  PackageResultLine,
  StatusLine
} from '../../types/lines';
import { Result } from '../../types/report';

// Compiled once; matching has no side effects.
const PATTERNS = {
  packageResult: /^(ok|FAIL)\s+([^ ]+)\s+(?:(\d+\.\d+)s|\(cached\)|(\[\w+ failed\]))(?:\s+coverage:\s+(\d+\.\d+)%\sof\sstatements(?:\sin\s.+)?)?$/,
  status: /--- (PASS|FAIL|SKIP): (.+) \((\d+\.\d+)(?: seconds|s)\)/,
  indent: /^([ \t]+)---/,
  // name, iterations, ns/op, then optional B/op and allocs/op
  benchmark: /^(Benchmark[^ -]+)(?:-\d+\s+|\s+)(\d+)\s+(\d+|\d+\.\d+)\sns\/op(?:\s+(\d+)\sB\/op)?(?:\s+(\d+)\sallocs\/op)?/,
  summary: /^(PASS|FAIL|SKIP)$/
} as const;

const RECORD_FIELDS = ['Suite', 'Test', 'Msg'] as const;
type RecordField = typeof RECORD_FIELDS[number];

function isResult(value: string): value is Result {
  return value === 'PASS' || value === 'FAIL' || value === 'SKIP';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class GoTestOutputParser implements OutputParser {
  classifyLine(line: string): ClassifiedLine {
    return this.matchPackageResult(line)
      ?? this.matchStatus(line)
      ?? this.matchBenchmark(line)
      ?? this.matchOutputRecord(line)
      ?? this.matchSummary(line)
      ?? { kind: 'text', raw: line };
  }

  matchPackageResult(line: string): PackageResultLine | null {
    const match = line.match(PATTERNS.packageResult);
    if (!match) return null;

    return {
      kind: 'packageResult',
      status: match[1] === 'ok' ? 'ok' : 'FAIL',
      packageName: match[2],
      seconds: match[3] ?? '',
      cached: match[3] === undefined && match[4] === undefined,
      failureMarker: match[4] ?? '',
      coveragePct: match[5] ?? ''
    };
  }

  matchStatus(line: string): StatusLine | null {
    const match = line.match(PATTERNS.status);
    if (!match) return null;
    const result = match[1];
    if (!isResult(result)) return null;

    const indentMatch = line.match(PATTERNS.indent);
    return {
      kind: 'status',
      result,
      testName: match[2],
      seconds: match[3],
      indent: indentMatch ? indentMatch[1] : ''
    };
  }

  matchBenchmark(line: string): BenchmarkLine | null {
    const match = line.match(PATTERNS.benchmark);
    if (!match) return null;

    return {
      kind: 'benchmark',
      name: match[1],
      iterations: parseInt(match[2], 10),
      nsPerOp: match[3],
      bytesPerOp: match[4] ?? '',
      allocsPerOp: match[5] ?? ''
    };
  }

  /**
   * A record is a whole-line JSON object whose Suite, Test and Msg keys, when
   * present, hold strings. Keys match case-insensitively and the last
   * occurrence wins; null leaves a field empty. A bare `null` line is a
   * record with every field empty.
   */
  matchOutputRecord(line: string): OutputRecordLine | null {
    let decoded: unknown;
    try {
      decoded = JSON.parse(line);
    } catch {
      return null;
    }
    let entries: [string, unknown][];
    if (decoded === null) {
      entries = [];
    } else if (isPlainObject(decoded)) {
      entries = Object.entries(decoded);
    } else {
      return null;
    }

    const fields: Record<RecordField, string> = { Suite: '', Test: '', Msg: '' };
    for (const [key, value] of entries) {
      const field = RECORD_FIELDS.find(name => name.toLowerCase() === key.toLowerCase());
      if (!field || value === null) continue;
      if (typeof value !== 'string') return null;
      fields[field] = value;
    }

    return {
      kind: 'output',
      suite: fields.Suite,
      test: fields.Test,
      msg: fields.Msg
    };
  }

  matchSummary(line: string): ClassifiedLine | null {
    const match = line.match(PATTERNS.summary);
    if (!match) return null;
    const result = match[1];
    if (!isResult(result)) return null;
    return { kind: 'summary', result, raw: line };
  }
}
