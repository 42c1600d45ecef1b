import { StringDecoder } from 'string_decoder';
import { ReportBuilder } from './ReportBuilder';
import { Report } from './types/report';
import { Logger } from './utils/logger';

const logger = Logger.create('parse');

export type OutputSource = AsyncIterable<string | Buffer>;

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Feed every complete line of `text` to the builder and return the
 * unterminated remainder.
 */
function feedLines(builder: ReportBuilder, text: string): string {
  let start = 0;
  let newline = text.indexOf('\n', start);
  while (newline !== -1) {
    builder.addLine(stripCarriageReturn(text.slice(start, newline)));
    start = newline + 1;
    newline = text.indexOf('\n', start);
  }
  return text.slice(start);
}

/**
 * Parse go test output read from `input` (a stream or any async iterable of
 * chunks) and return a report with the results.
 *
 * `fallbackPackageName` names the package for callers that know it
 * out-of-band. Tests of a package that never printed its result line are
 * still left out of the report.
 *
 * Rejects with the stream's own error when reading fails.
 */
export async function parse(input: OutputSource, fallbackPackageName: string = ''): Promise<Report> {
  logger.lifecycle('Parsing stream', { fallbackPackageName });

  const builder = new ReportBuilder();
  const decoder = new StringDecoder('utf8');
  let pending = '';

  try {
    for await (const chunk of input) {
      pending = feedLines(builder, pending + (typeof chunk === 'string' ? chunk : decoder.write(chunk)));
    }
  } catch (error) {
    logger.error('Failed to read test output', error);
    throw error;
  }

  pending += decoder.end();
  if (pending !== '') {
    builder.addLine(pending);
  }
  return builder.finish();
}

/**
 * Parse go test output that is already in memory
 */
export function parseString(content: string, fallbackPackageName: string = ''): Report {
  logger.lifecycle('Parsing buffered output', { fallbackPackageName, size: content.length });

  const builder = new ReportBuilder();
  const rest = feedLines(builder, content);
  if (rest !== '') {
    builder.addLine(rest);
  }
  return builder.finish();
}
