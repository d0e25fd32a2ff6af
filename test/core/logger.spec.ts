import { test, expect } from '@playwright/test';
import { LogInfo, LogLevel, LogTransport, Logger, prettyFormat } from '../../src/core/utils/Logger';

class MemoryTransport implements LogTransport {
  name = 'memory';
  readonly entries: LogInfo[] = [];

  write(info: LogInfo): void {
    this.entries.push(info);
  }
}

test.describe('Logger', () => {
  let transport: MemoryTransport;
  let log: Logger;

  test.beforeEach(() => {
    transport = new MemoryTransport();
    log = Logger.getInstance(`logger-spec-${Date.now()}-${Math.random()}`, { transports: [transport] });
    log.setLevel(LogLevel.INFO);
  });

  test('parses level names leniently', () => {
    expect(Logger.parseLevel('warning')).toBe(LogLevel.WARN);
    expect(Logger.parseLevel(' debug ')).toBe(LogLevel.DEBUG);
    expect(Logger.parseLevel('off')).toBe(LogLevel.SILENT);
    expect(Logger.parseLevel('verbose', LogLevel.ERROR)).toBe(LogLevel.ERROR);
    expect(Logger.parseLevel(undefined)).toBe(LogLevel.INFO);
  });

  test('drops entries below the configured level', () => {
    log.debug('hidden');
    log.info('shown', { pageName: 'SearchPage' });

    expect(transport.entries.map(entry => entry.message)).toEqual(['shown']);
    expect(transport.entries[0]?.levelName).toBe('INFO');
    expect(transport.entries[0]?.metadata).toEqual({ pageName: 'SearchPage' });
  });

  test('errors are serialized into the metadata', () => {
    log.error('action failed', new TypeError('bad selector'));

    expect(transport.entries[0]?.metadata?.['error']).toEqual({ name: 'TypeError', message: 'bad selector' });
    expect(transport.entries[0]?.error?.message).toBe('bad selector');
  });

  test('setGlobalLevel applies to loggers that already exist', () => {
    Logger.setGlobalLevel(LogLevel.WARN);
    try {
      log.info('hidden');
      log.warn('shown');
    } finally {
      Logger.setGlobalLevel(LogLevel.ERROR);
    }

    expect(transport.entries.map(entry => entry.message)).toEqual(['shown']);
  });

  test('the console line carries level, logger name and message', () => {
    const line = prettyFormat({
      level: LogLevel.WARN,
      levelName: 'WARN',
      message: 'slow element',
      timestamp: new Date('2024-01-05T08:30:00.000Z'),
      logger: 'ActionLogger',
      metadata: {}
    });

    expect(line).toBe('[2024-01-05T08:30:00.000Z] \x1b[33m[WARN ]\x1b[0m [ActionLogger] slow element');
  });
});
