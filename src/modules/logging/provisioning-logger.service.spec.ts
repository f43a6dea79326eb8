import { ProvisioningLogger, CorrelationContext, StructuredLogEntry } from './provisioning-logger.service';
import { LogLevel, LogCategory } from './log-levels';

describe('ProvisioningLogger', () => {
  let logger: ProvisioningLogger;

  let stdoutSpy: jest.SpyInstance;
  let stderrSpy: jest.SpyInstance;

  const firstJson = (spy: jest.SpyInstance): StructuredLogEntry =>
    JSON.parse(spy.mock.calls[0][0] as string) as StructuredLogEntry;

  beforeEach(() => {
    process.env.NODE_ENV = 'test';
    process.env.LOG_LEVEL = 'TRACE';
    process.env.LOG_FORMAT = 'json';
    process.env.LOG_INCLUDE_STACKS = 'true';

    logger = new ProvisioningLogger();

    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('construction', () => {
    it('should build default config from env vars', () => {
      const config = logger.getConfig();
      expect(config.globalLevel).toBe(LogLevel.TRACE);
      expect(config.format).toBe('json');
    });
  });

  describe('configuration', () => {
    it('getConfig should return a copy of config', () => {
      const config = logger.getConfig();
      config.categoryLevels[LogCategory.GROUP] = LogLevel.OFF;
      expect(logger.getConfig().categoryLevels[LogCategory.GROUP]).toBeUndefined();
    });

    it('constructor overrides should take precedence over env vars', () => {
      const configured = new ProvisioningLogger({ globalLevel: LogLevel.WARN });
      expect(configured.getConfig().globalLevel).toBe(LogLevel.WARN);
      expect(configured.getConfig().format).toBe('json');
    });

    it('should read category overrides from LOG_CATEGORY_LEVELS', () => {
      process.env.LOG_CATEGORY_LEVELS = 'license=debug';
      try {
        expect(new ProvisioningLogger().getConfig().categoryLevels[LogCategory.LICENSE]).toBe(LogLevel.DEBUG);
      } finally {
        delete process.env.LOG_CATEGORY_LEVELS;
      }
    });
  });

  // ─── Correlation Context ──────────────────────────────────────────

  describe('correlation context', () => {
    it('getContext should return undefined outside of runWithContext', () => {
      expect(logger.getContext()).toBeUndefined();
    });

    it('runWithContext should provide context inside the callback', () => {
      logger.runWithContext({ runId: 'run-001' }, () => {
        expect(logger.getContext()?.runId).toBe('run-001');
      });
      expect(logger.getContext()).toBeUndefined();
    });

    it('enrichContext should update fields on the current context', () => {
      logger.runWithContext({ runId: 'run-002' }, () => {
        logger.enrichContext({ userPrincipalName: 'John.Doe@example.com' });
        expect(logger.getContext()).toEqual({
          runId: 'run-002',
          userPrincipalName: 'John.Doe@example.com',
        });
      });
    });

    it('enrichContext should be a no-op outside of context', () => {
      logger.enrichContext({ userPrincipalName: 'nobody@example.com' });
      expect(logger.getContext()).toBeUndefined();
    });

    it('runWithContext should return the callback result', () => {
      expect(logger.runWithContext({ runId: 'run-003' }, () => 42)).toBe(42);
    });
  });

  describe('isEnabled', () => {
    it('should allow messages at or above global level', () => {
      logger = new ProvisioningLogger({ globalLevel: LogLevel.INFO });
      expect(logger.isEnabled(LogLevel.INFO)).toBe(true);
      expect(logger.isEnabled(LogLevel.ERROR)).toBe(true);
      expect(logger.isEnabled(LogLevel.DEBUG)).toBe(false);
    });

    it('should use category override over global level', () => {
      logger = new ProvisioningLogger({
        globalLevel: LogLevel.INFO,
        categoryLevels: { [LogCategory.GROUP]: LogLevel.TRACE },
      });

      expect(logger.isEnabled(LogLevel.TRACE, LogCategory.GROUP)).toBe(true);
      expect(logger.isEnabled(LogLevel.TRACE, LogCategory.LICENSE)).toBe(false);
    });

    it('OFF level should suppress all messages', () => {
      logger = new ProvisioningLogger({ globalLevel: LogLevel.OFF });
      expect(logger.isEnabled(LogLevel.FATAL)).toBe(false);
    });
  });

  // ─── Logging Methods ──────────────────────────────────────────────

  describe('logging methods', () => {
    it('info() should emit to stderr with data, leaving stdout to the report', () => {
      logger.info(LogCategory.ORCHESTRATOR, 'User created', { directoryId: 'u1' });
      expect(stdoutSpy).not.toHaveBeenCalled();
      const entry = firstJson(stderrSpy);
      expect(entry.level).toBe('INFO');
      expect(entry.category).toBe('orchestrator');
      expect(entry.message).toBe('User created');
      expect(entry.data).toEqual({ directoryId: 'u1' });
    });

    it('warn() should emit to stderr', () => {
      logger.warn(LogCategory.LICENSE, 'No seats left');
      expect(firstJson(stderrSpy).level).toBe('WARN');
      expect(stdoutSpy).not.toHaveBeenCalled();
    });

    it('error() should emit to stderr with error info', () => {
      logger.error(LogCategory.DIRECTORY, 'Call failed', new Error('test error'));
      const entry = firstJson(stderrSpy);
      expect(entry.level).toBe('ERROR');
      expect(entry.error?.message).toBe('test error');
      expect(entry.error?.name).toBe('Error');
    });

    it('should not emit when level is suppressed', () => {
      logger = new ProvisioningLogger({ globalLevel: LogLevel.ERROR });
      logger.info(LogCategory.GENERAL, 'Should not appear');
      expect(stdoutSpy).not.toHaveBeenCalled();
      expect(stderrSpy).not.toHaveBeenCalled();
    });

    it('should include correlation context in entries', () => {
      const ctx: CorrelationContext = {
        runId: 'ctx-run-001',
        userPrincipalName: 'John.Doe@example.com',
        startTime: Date.now() - 50,
      };

      logger.runWithContext(ctx, () => {
        logger.info(LogCategory.ORCHESTRATOR, 'User created');
      });

      const entry = firstJson(stderrSpy);
      expect(entry.runId).toBe('ctx-run-001');
      expect(entry.userPrincipalName).toBe('John.Doe@example.com');
      expect(entry.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should handle non-Error objects in error()', () => {
      logger.error(LogCategory.GENERAL, 'Something failed', 'string error');
      expect(firstJson(stderrSpy).error?.message).toBe('string error');
    });

    it('should strip stack traces when includeStackTraces is false', () => {
      logger = new ProvisioningLogger({ includeStackTraces: false });
      logger.fatal(LogCategory.ORCHESTRATOR, 'Run failed', new Error('critical'));
      const entry = firstJson(stderrSpy);
      expect(entry.level).toBe('FATAL');
      expect(entry.error?.stack).toBeUndefined();
    });
  });

  describe('sanitization', () => {
    beforeEach(() => {
      logger = new ProvisioningLogger({ maxPayloadSizeBytes: 100 });
    });

    it('should redact sensitive fields', () => {
      logger.info(LogCategory.DIRECTORY, 'Create user', {
        userPrincipalName: 'John.Doe@example.com',
        password: 'test-password',
        clientSecret: 'test-secret',
        accessToken: 'test-token',
      });

      expect(firstJson(stderrSpy).data).toEqual({
        userPrincipalName: 'John.Doe@example.com',
        password: '[REDACTED]',
        clientSecret: '[REDACTED]',
        accessToken: '[REDACTED]',
      });
    });

    it('should truncate large string values', () => {
      logger.info(LogCategory.TICKET, 'Raw ticket', { body: 'x'.repeat(200) });
      expect(firstJson(stderrSpy).data?.body).toBe(`${'x'.repeat(100)}...[truncated 100B]`);
    });

    it('should truncate large object values', () => {
      const bigObject: Record<string, string> = {};
      for (let i = 0; i < 20; i++) {
        bigObject[`field${i}`] = 'x'.repeat(20);
      }
      logger.info(LogCategory.TICKET, 'Fields', { fields: bigObject });
      const value = firstJson(stderrSpy).data?.fields;
      expect(typeof value).toBe('string');
      expect(String(value).endsWith('...[truncated]')).toBe(true);
    });
  });

  describe('pretty output', () => {
    beforeEach(() => {
      logger = new ProvisioningLogger({ format: 'pretty' });
    });

    it('should emit info as one line on stderr', () => {
      logger.info(LogCategory.GROUP, 'Added to group');
      const output = stderrSpy.mock.calls[0][0] as string;
      expect(output).toContain('INFO');
      expect(output).toContain('group');
      expect(output.endsWith('Added to group\n')).toBe(true);
    });

    it('should send every level to stderr and none to stdout', () => {
      logger.debug(LogCategory.GROUP, 'debug msg');
      logger.info(LogCategory.GROUP, 'info msg');
      logger.warn(LogCategory.GROUP, 'warning');
      logger.error(LogCategory.GROUP, 'error', new Error('e'));
      expect(stderrSpy).toHaveBeenCalledTimes(4);
      expect(stdoutSpy).not.toHaveBeenCalled();
    });
  });
});
