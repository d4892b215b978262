/**
 * Structured Logger Tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  logger,
  createServiceLogger,
  StructuredLogger,
  ServiceLogger,
  LoggerConfig
} from '../logger';
import { NetworkError } from '../../utils/errors';

describe('Structured Logger', () => {
  let logDir: string;
  const logFile = 'test-droidmeta.log';
  const originalEnv = process.env;

  const fileLogger = (overrides: Partial<LoggerConfig> = {}): StructuredLogger =>
    new StructuredLogger({ output: 'file', logDir, logFile, level: 'debug', format: 'json', includeTrace: true, ...overrides });

  const readEntries = (): Record<string, unknown>[] =>
    readFileSync(join(logDir, logFile), 'utf8')
      .trim()
      .split('\n')
      .map(line => JSON.parse(line));

  beforeEach(() => {
    process.env = { ...originalEnv };
    logDir = mkdtempSync(join(tmpdir(), 'droidmeta-log-'));
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('Basic Logging Functionality', () => {
    test('should create service logger', () => {
      expect(createServiceLogger('test-service')).toBeInstanceOf(ServiceLogger);
    });

    test('should generate trace IDs', () => {
      const traceId1 = logger.generateTraceId();
      const traceId2 = logger.generateTraceId();

      expect(traceId1).toMatch(/^[a-f0-9]{16}$/);
      expect(traceId2).toMatch(/^[a-f0-9]{16}$/);
      expect(traceId1).not.toBe(traceId2);
    });

    test('should create performance timers', () => {
      const timer = logger.startTimer('test-operation', 'test-trace', { context: 'test' });

      expect(timer.startTime).toBeGreaterThan(0);
      expect(timer.operation).toBe('test-operation');
      expect(timer.traceId).toBe('test-trace');
      expect(timer.context).toEqual({ context: 'test' });
    });

    test('should log the duration of a timed operation', () => {
      const structured = fileLogger();
      const service = new ServiceLogger(structured, 'timing-test');

      const duration = service.startTimer('import', 'trace-1').end({ added: 2 });

      const [entry] = readEntries();
      expect(duration).toBeGreaterThanOrEqual(0);
      expect(entry.service).toBe('performance-monitor');
      expect(entry.event).toBe('operation_duration');
      expect(entry.operation).toBe('timing-test:import');
      expect(entry.added).toBe(2);
    });
  });

  describe('Service Logger Functionality', () => {
    test('should write events with service, severity and metadata', () => {
      const service = new ServiceLogger(fileLogger(), 'test-service');
      service.info('test-event', 'Info message', 'trace-123', { count: 42 });

      const entries = readEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        service: 'test-service',
        event: 'test-event',
        severity: 'info',
        message: 'Info message',
        trace_id: 'trace-123',
        metadata: { count: 42 }
      });
      expect(entries[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    test('should record error details including the error code', () => {
      const service = new ServiceLogger(fileLogger(), 'test-service');
      const error = new NetworkError('feed down', 'https://feed.example.test', 503);

      service.error('feed_failed', 'Error occurred', error);

      const [entry] = readEntries();
      expect(entry.severity).toBe('error');
      expect(entry.error).toMatchObject({ name: 'NetworkError', message: 'feed down', code: 'NETWORK_ERROR' });
    });

    test('should drop trace IDs when includeTrace is off', () => {
      const service = new ServiceLogger(fileLogger({ includeTrace: false }), 'test-service');
      service.warn('test-event', 'Warning message', 'trace-123');

      const [entry] = readEntries();
      expect(entry.trace_id).toBeUndefined();
      expect(entry.severity).toBe('warn');
    });
  });

  describe('Configuration', () => {
    test('should load configuration from environment', () => {
      process.env.LOG_LEVEL = 'debug';
      process.env.LOG_FORMAT = 'text';
      process.env.LOG_OUTPUT = 'both';
      process.env.LOG_INCLUDE_TRACE = 'false';
      process.env.LOG_DIR = logDir;
      process.env.SERVICE_LOG_LEVELS = 'tracker-importer=warn,sample-writer=debug,bogus=loud';

      const config = new StructuredLogger().getConfig();

      expect(config.level).toBe('debug');
      expect(config.format).toBe('text');
      expect(config.output).toBe('both');
      expect(config.includeTrace).toBe(false);
      expect(config.logDir).toBe(logDir);
      expect(config.serviceLevels).toEqual({ 'tracker-importer': 'warn', 'sample-writer': 'debug' });
    });

    test('should fall back to defaults for unknown values', () => {
      process.env.LOG_LEVEL = 'verbose';
      process.env.LOG_OUTPUT = 'syslog';
      delete process.env.LOG_FORMAT;
      delete process.env.LOG_FILE;

      const config = new StructuredLogger().getConfig();

      expect(config.level).toBe('info');
      expect(config.output).toBe('console');
      expect(config.format).toBe('json');
      expect(config.logFile).toBe('droidmeta.log');
    });

    test('should update configuration at runtime', () => {
      const structured = fileLogger();
      structured.updateConfig({ level: 'error', format: 'text' });

      expect(structured.getConfig().level).toBe('error');
      expect(structured.getConfig().format).toBe('text');
    });
  });

  describe('Log Filtering', () => {
    test('should filter debug messages when level is info', () => {
      const service = new ServiceLogger(fileLogger({ level: 'info' }), 'filter-test');

      service.debug('debug-event', 'This should not appear');
      service.info('info-event', 'This should appear');

      const entries = readEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].event).toBe('info-event');
    });

    test('should respect service-specific log levels', () => {
      const structured = fileLogger({ level: 'info', serviceLevels: { 'service-debug': 'debug' } });

      new ServiceLogger(structured, 'service-debug').debug('debug-event', 'Debug from debug service');
      new ServiceLogger(structured, 'service-info').debug('debug-event', 'Debug from info service');
      new ServiceLogger(structured, 'service-info').info('info-event', 'Info from info service');

      const entries = readEntries();
      expect(entries.map(entry => `${entry.service}/${entry.severity}`)).toEqual([
        'service-debug/debug',
        'service-info/info'
      ]);
    });

    test('should not create a log file for console output', () => {
      const consoleSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const service = new ServiceLogger(fileLogger({ output: 'console' }), 'console-test');

      service.info('info-event', 'To the console');

      expect(existsSync(join(logDir, logFile))).toBe(false);
      expect(consoleSpy).toHaveBeenCalledTimes(1);
      consoleSpy.mockRestore();
    });
  });

  describe('Format Options', () => {
    test('should format logs as text when configured', () => {
      const structured = fileLogger({ format: 'text' });

      const line = structured.format({
        service: 'format-test',
        event: 'test-event',
        severity: 'info',
        timestamp: '2024-01-02T03:04:05.000Z',
        trace_id: 'trace-123',
        message: 'Test message',
        metadata: { key: 'value' }
      });

      expect(line).toBe('[2024-01-02T03:04:05.000Z] [INFO] format-test test-event Test message [trace:trace-123] {"key":"value"}');
    });
  });
});
