export { parse, parseString } from './parse';
export type { OutputSource } from './parse';
export { ReportBuilder } from './ReportBuilder';
export { GoTestOutputParser } from './runners/gotest/GoTestOutputParser';
export type { OutputParser } from './runners/base/OutputParser';
export { Report, MILLISECOND, NANOSECOND, MICROSECOND, SECOND, createTest, toMilliseconds } from './types/report';
export type { Benchmark, Duration, Package, Result, Test } from './types/report';
export type { ClassifiedLine } from './types/lines';
export { parseNanoseconds, parseSeconds } from './utils/durations';
export { formatSummary } from './SummaryPrinter';
