/**
 * Tests for the structured logger and its formatters
 */

import { describe, it, expect } from 'vitest';

import {
  Logger,
  LoggerFactory,
  LogLevel,
  MemoryTransport,
  formatJson,
  formatText,
  isLogLevel,
  type LogEntry,
} from '../index.js';

describe('Logger', () => {
  it('should drop entries below the configured level', () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test', 'INFO');

    logger.debug('hidden');
    logger.info('shown', { a: 1 });
    logger.warn('also shown');

    expect(transport.getMessages()).toEqual(['shown', 'also shown']);
    expect(transport.getEntries()[0]?.data).toEqual({ a: 1 });
  });

  it('should prefix child components and merge bindings into entry data', () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('root');

    logger.child('outbound', { address: 'sb://test/queue' }).child('messages').warn('retry', { attempt: 2 });

    const [entry] = transport.getEntries();
    expect(entry?.component).toBe('root:outbound:messages');
    expect(entry?.data).toEqual({ address: 'sb://test/queue', attempt: 2 });
    expect(entry?.level).toBe(LogLevel.WARN);
  });

  it('should attach Error instances to error entries only', () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');
    const failure = new Error('broker unreachable');

    logger.error('send failed', failure, { attempt: 1 });
    logger.error('odd failure', 'not an error');

    const [first, second] = transport.getEntries(LogLevel.ERROR);
    expect(first?.error).toBe(failure);
    expect(first?.data).toEqual({ attempt: 1 });
    expect(second?.error).toBeUndefined();
  });

  it('should change level at runtime', () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test', LogLevel.ERROR);

    logger.warn('before');
    logger.setLevel('warning');
    logger.warn('after');

    expect(logger.getLevel()).toBe(LogLevel.WARN);
    expect(transport.getMessages()).toEqual(['after']);
  });

  it('should reject unknown level names', () => {
    expect(() => Logger.parseLevel('verbose')).toThrow('Invalid log level: verbose');
    expect(isLogLevel('DEBUG')).toBe(true);
    expect(isLogLevel('debug')).toBe(false);
  });

  it('should keep only the most recent entries in a bounded memory transport', async () => {
    const transport = new MemoryTransport(2);
    const logger = new Logger({ component: 'test', level: 'DEBUG', transports: [transport] });

    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(transport.getMessages()).toEqual(['two', 'three']);

    await logger.close();
    expect(transport.getMessages()).toEqual([]);
  });

  it('should write nothing through a silent logger', () => {
    const logger = LoggerFactory.createSilentLogger();
    expect(() => logger.error('ignored', new Error('x'))).not.toThrow();
    expect(logger.isLevelEnabled(LogLevel.WARN)).toBe(false);
  });
});

describe('formatters', () => {
  const entry: LogEntry = {
    timestamp: new Date('2026-01-02T03:04:05.000Z'),
    level: LogLevel.WARN,
    component: 'brokerlink:outbound',
    message: 'SEND retry',
    data: { attempt: 1 },
  };

  it('should render text lines', () => {
    expect(formatText(entry)).toBe(
      '2026-01-02T03:04:05.000Z WARN [brokerlink:outbound] SEND retry {"attempt":1}'
    );
  });

  it('should omit empty data from text lines', () => {
    expect(formatText({ ...entry, data: {} })).toBe(
      '2026-01-02T03:04:05.000Z WARN [brokerlink:outbound] SEND retry'
    );
  });

  it('should render JSON lines', () => {
    expect(JSON.parse(formatJson(entry))).toEqual({
      timestamp: '2026-01-02T03:04:05.000Z',
      level: 'WARN',
      component: 'brokerlink:outbound',
      message: 'SEND retry',
      data: { attempt: 1 },
    });
  });
});
