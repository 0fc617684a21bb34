/**
 * Tests for the console-backed logger
 */

import { createLogger, isLogLevel, LogLevel } from '../logger';

describe('createLogger', () => {
  const clock = () => new Date('2024-10-01T08:00:00Z');
  let sink: { log: jest.Mock; warn: jest.Mock; error: jest.Mock };

  beforeEach(() => {
    sink = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
  });

  const loggerAt = (level: LogLevel) => createLogger(level, sink, clock);

  it('should prefix messages with timestamp and level', () => {
    loggerAt('info').info('Migration table initialized');

    expect(sink.log).toHaveBeenCalledWith('2024-10-01T08:00:00.000Z - INFO - Migration table initialized');
  });

  it('should route warnings and errors to their console methods', () => {
    const logger = loggerAt('debug');

    logger.warn('careful');
    logger.error('failed');

    expect(sink.warn).toHaveBeenCalledWith('2024-10-01T08:00:00.000Z - WARN - careful');
    expect(sink.error).toHaveBeenCalledWith('2024-10-01T08:00:00.000Z - ERROR - failed');
  });

  it('should drop messages below the threshold', () => {
    const logger = loggerAt('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledTimes(1);
  });

  it('should write nothing when silent', () => {
    loggerAt('silent').error('hidden');

    expect(sink.error).not.toHaveBeenCalled();
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
