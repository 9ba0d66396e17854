import * as fs from 'fs';
import * as path from 'path';
import { formatLogEntry, LogEntry, Logger, LogSink } from './logger';
import { cleanupTempDirectory, createTempDirectory } from '../../tests/helpers/test-utils';

function memorySink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { sink: (entry) => entries.push(entry), entries };
}

describe('formatLogEntry', () => {
  it('formats entries with level, context and metadata', () => {
    const line = formatLogEntry({
      timestamp: '2025-02-26T00:00:00.000Z',
      level: 'warn',
      message: 'Skipping patch',
      context: 'LinkEditor',
      metadata: { from: 1, to: 4 },
    });

    expect(line).toBe('2025-02-26T00:00:00.000Z [WARN] [LinkEditor] Skipping patch {"from":1,"to":4}');
  });

  it('omits empty metadata', () => {
    expect(formatLogEntry({ timestamp: 't', level: 'info', message: 'm', metadata: {} })).toBe('t [INFO] m');
  });

  it('reduces errors to their message and replaces circular references', () => {
    const metadata: Record<string, unknown> = { cause: new Error('disk full') };
    metadata.self = metadata;

    const line = formatLogEntry({ timestamp: 't', level: 'error', message: 'm', metadata });

    expect(line).toBe('t [ERROR] m {"cause":"disk full","self":"[Circular Reference]"}');
  });
});

describe('Logger', () => {
  let tempDir: string;
  let logFilePath: string;

  beforeEach(() => {
    tempDir = createTempDirectory();
    logFilePath = path.join(tempDir, 'logs', 'analysis.log');
  });

  afterEach(() => {
    cleanupTempDirectory(tempDir);
  });

  it('appends to the log file and filters by level', () => {
    const logger = new Logger({ level: 'info', enableConsole: false, enableFile: true, logFilePath });

    logger.debug('hidden');
    logger.info('shown');

    const lines = fs.readFileSync(logFilePath, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('[INFO] shown')).toBe(true);
  });

  it('gives child loggers a nested context on the same sinks', () => {
    const { sink, entries } = memorySink();
    const logger = new Logger({ level: 'info', enableConsole: false, enableFile: false, sinks: [sink] });

    logger.child('Pipeline').child('Step').info('running');

    expect(entries.map((entry) => [entry.context, entry.message])).toEqual([['Pipeline:Step', 'running']]);
  });

  describe('track', () => {
    it('logs completion with the step details and returns the result', async () => {
      const { sink, entries } = memorySink();
      const logger = new Logger({ level: 'info', enableConsole: false, enableFile: false, sinks: [sink] });

      const result = await logger.track('link performance comparison', () => 7, (count) => ({ significant: count }));

      expect(result).toBe(7);
      expect(entries.map((entry) => [entry.level, entry.message])).toEqual([
        ['info', 'Starting step: link performance comparison'],
        ['info', 'Completed step: link performance comparison'],
      ]);
      expect(entries[1].metadata).toMatchObject({ significant: 7 });
    });

    it('logs a failed step at error level and rethrows the same error', async () => {
      const { sink, entries } = memorySink();
      const logger = new Logger({ level: 'info', enableConsole: false, enableFile: false, sinks: [sink] });
      const failure = new Error('engine exited with code 1');

      await expect(
        logger.track('modified simulation', async () => {
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(entries[1].level).toBe('error');
      expect(entries[1].message).toBe('Failed step: modified simulation');
      expect(entries[1].metadata).toMatchObject({ error: 'engine exited with code 1' });
    });
  });
});
