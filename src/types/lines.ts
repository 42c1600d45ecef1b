import { Result } from './report';

export interface PackageResultLine {
  kind: 'packageResult';
  status: 'ok' | 'FAIL';
  packageName: string;
  /** Seconds as printed; empty when cached or the build failed */
  seconds: string;
  cached: boolean;
  /** Bracketed marker such as "[build failed]" */
  failureMarker: string;
  coveragePct: string;
}

export interface StatusLine {
  kind: 'status';
  result: Result;
  /** Name as printed, possibly slash-separated for subtests */
  testName: string;
  seconds: string;
  indent: string;
}

export interface BenchmarkLine {
  kind: 'benchmark';
  name: string;
  iterations: number;
  nsPerOp: string;
  bytesPerOp: string;
  allocsPerOp: string;
}

export interface OutputRecordLine {
  kind: 'output';
  suite: string;
  test: string;
  msg: string;
}

export interface SummaryLine {
  kind: 'summary';
  result: Result;
  raw: string;
}

export interface TextLine {
  kind: 'text';
  raw: string;
}

export type ClassifiedLine =
  | PackageResultLine
  | StatusLine
  | BenchmarkLine
  | OutputRecordLine
  | SummaryLine
  | TextLine;
