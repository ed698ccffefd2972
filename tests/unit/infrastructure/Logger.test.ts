import {
  Logger,
  LogEntry,
  getLogger,
  loggers,
  setGlobalLoggerConfig,
} from '../../../src/infrastructure/logging';

describe('Logger', () => {
  let consoleSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    setGlobalLoggerConfig({});
    consoleSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    setGlobalLoggerConfig({ customHandler: () => undefined });
  });

  describe('levels', () => {
    it('should log info but not debug by default', () => {
      const logger = new Logger('Pool', { useColors: false });

      logger.debug('hidden');
      logger.info('Context created');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      expect(consoleSpy).toHaveBeenCalledWith('[Pool] Context created');
    });

    it('should route warnings and errors to their console streams', () => {
      const logger = new Logger('Health', { useColors: false });

      logger.warn('Circuit opened');
      logger.error('Health check failed');

      expect(consoleWarnSpy).toHaveBeenCalledWith('[Health] Circuit opened');
      expect(consoleErrorSpy).toHaveBeenCalledWith('[Health] Health check failed');
    });

    it('should honour a level set after creation', () => {
      const logger = new Logger('Engine', { useColors: false, minLevel: 'error' });
      logger.warn('dropped');

      logger.setLevel('debug');
      logger.debug('kept');

      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleSpy).toHaveBeenCalledWith('[Engine] kept');
      expect(logger.isLevelEnabled('debug')).toBe(true);
    });
  });

  describe('output', () => {
    it('should append context as key=value pairs', () => {
      const logger = new Logger('Scheduler', { useColors: false });

      logger.info('Cancelling running job', { jobId: 'job-1', attempts: 2, tags: ['a'] });

      expect(consoleSpy).toHaveBeenCalledWith(
        '[Scheduler] Cancelling running job (jobId=job-1 attempts=2 tags=["a"])'
      );
    });

    it('should emit one JSON line per entry', () => {
      const logger = new Logger('Batch', { jsonOutput: true });

      logger.info('Batch finished', { succeeded: 3 });

      const line: unknown = consoleSpy.mock.calls[0][0];
      expect(typeof line).toBe('string');
      const parsed: unknown = JSON.parse(String(line));
      expect(parsed).toMatchObject({
        level: 'info',
        category: 'Batch',
        message: 'Batch finished',
        context: { succeeded: 3 },
      });
    });

    it('should prefix a time when timestamps are enabled', () => {
      const logger = new Logger('Pool', { includeTimestamp: true, useColors: false });

      logger.info('Draining context pool');

      expect(consoleSpy).toHaveBeenCalledWith(
        expect.stringMatching(/^\d{2}:\d{2}:\d{2} \[Pool\] Draining context pool$/)
      );
    });

    it('should give child loggers a combined category', () => {
      const logger = new Logger('Scheduler', { useColors: false }).child('Orchestrator');

      logger.info('Orchestrator started');

      expect(consoleSpy).toHaveBeenCalledWith('[Scheduler:Orchestrator] Orchestrator started');
    });
  });

  describe('global configuration', () => {
    it('should apply to loggers created before it was set', () => {
      const entries: LogEntry[] = [];
      const logger = getLogger('Pool');

      setGlobalLoggerConfig({ minLevel: 'debug', customHandler: entry => entries.push(entry) });
      logger.debug('Context closed', { slot: 0 });

      expect(consoleSpy).not.toHaveBeenCalled();
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: 'debug',
        category: 'Pool',
        message: 'Context closed',
        context: { slot: 0 },
      });
    });

    it('should let per-logger settings win over global ones', () => {
      setGlobalLoggerConfig({ minLevel: 'error', useColors: false });
      const logger = new Logger('Engine', { minLevel: 'info' });

      logger.info('Browser launched');
      loggers.engine.info('suppressed');

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      expect(consoleSpy).toHaveBeenCalledWith('[Engine] Browser launched');
    });
  });
});
