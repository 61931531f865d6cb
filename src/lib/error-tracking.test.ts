import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { ValidationError } from './errors';
import { ErrorTracker } from './error-tracking';

function capturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'debug', base: undefined, timestamp: false }, {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

describe('ErrorTracker', () => {
  describe('capture', () => {
    it('should log the error with its context and return the logged id', () => {
      const { logger, lines } = capturingLogger();
      const tracker = new ErrorTracker(logger);

      const errorId = tracker.capture(new Error('Test error'), { userId: 'user-1', stage: 'crawl' });

      expect(errorId).toMatch(/^[0-9a-f]{8}$/);
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 50,
        errorId,
        error: 'Test error',
        name: 'Error',
        userId: 'user-1',
        stage: 'crawl',
        msg: 'Error captured: Test error',
      });
    });

    it('should wrap values that are not errors', () => {
      const { logger, lines } = capturingLogger();
      const tracker = new ErrorTracker(logger);

      tracker.capture('socket gone');
      tracker.capture({ code: 42 });

      expect(lines.map(line => line.error)).toEqual(['socket gone', '{"code":42}']);
    });
  });

  describe('summary', () => {
    it('should tally captured failures by error name', () => {
      const { logger } = capturingLogger();
      const tracker = new ErrorTracker(logger);

      tracker.capture(new ValidationError('bad row'));
      tracker.capture(new ValidationError('another bad row'));
      tracker.capture(new TypeError('oops'));

      expect(tracker.summary()).toEqual({ ValidationError: 2, TypeError: 1 });
    });

    it('should start empty', () => {
      expect(new ErrorTracker(capturingLogger().logger).summary()).toEqual({});
    });
  });

  describe('note', () => {
    it.each([
      ['info', 30],
      ['warning', 40],
      ['error', 50],
    ] as const)('should log a %s message at level %i', (level, numeric) => {
      const { logger, lines } = capturingLogger();

      new ErrorTracker(logger).note('Run stopped', level, { extra: { pending: 3 } });

      expect(lines).toEqual([{ level: numeric, extra: { pending: 3 }, msg: 'Run stopped' }]);
    });

    it('should not count messages as failures', () => {
      const { logger } = capturingLogger();
      const tracker = new ErrorTracker(logger);

      tracker.note('just saying', 'warning');

      expect(tracker.summary()).toEqual({});
    });
  });
});
