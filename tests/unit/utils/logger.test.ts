import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import { Logger, resetLogSink } from '../../../src/utils/logger';
import { configure, resetConfig } from '../../../src/config';

describe('Logger', () => {
  let tempDir: string;
  let logFile: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gotest-report-log-'));
    logFile = path.join(tempDir, 'logs', 'debug.log');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetConfig();
    resetLogSink();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write formatted entries to the configured file', async () => {
    configure({ logFile, debug: false });

    Logger.create('parser').info('Parsed line', { line: 3 });

    const content = await fs.readFile(logFile, 'utf8');
    expect(content).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z INFO  \| \[parser\] Parsed line \| \{"line":3\}\n$/);
  });

  it('should skip debug entries unless debug is enabled', async () => {
    configure({ logFile, debug: false });
    const logger = Logger.create('parser');

    logger.debug('hidden');
    logger.warn('shown');
    configure({ debug: true });
    logger.debug('visible');

    const lines = (await fs.readFile(logFile, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('WARN  | [parser] shown');
    expect(lines[1]).toContain('DEBUG | [parser] visible');
  });

  it('should record error messages and stacks', async () => {
    configure({ logFile });

    Logger.create('cli').error('Read failed', new Error('disk gone'), { file: 'out.txt' });

    const content = await fs.readFile(logFile, 'utf8');
    const data = JSON.parse(content.slice(content.indexOf('| {') + 2));
    expect(data.file).toBe('out.txt');
    expect(data.error).toBe('disk gone');
    expect(data.stack).toContain('disk gone');
  });

  it('should write nothing without a log file', () => {
    configure({ logFile: null, debug: true });

    Logger.create('parser').info('nowhere');

    expect(existsSync(logFile)).toBe(false);
  });

  it('should stop writing after the log file cannot be written', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, '');
    configure({ logFile: path.join(blocker, 'debug.log') });
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = Logger.create('parser');

    logger.info('first');
    logger.info('second');

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
