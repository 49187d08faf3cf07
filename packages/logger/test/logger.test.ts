import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFileSink, createLogger, createMemorySink, type MemorySink } from '../src/index';

function setup(config: Parameters<typeof createLogger>[0] = {}) {
  const sink: MemorySink = createMemorySink();
  const logger = createLogger({ sink, console: 'none', ...config });
  return { sink, logger };
}

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log levels', () => {
    it('debug logs only to console, not persisted', async () => {
      const { sink, logger } = setup({ environment: 'test' });

      logger.debug('debug_event', { foo: 'bar' });
      await logger.flush();

      expect(sink.entries).toHaveLength(0);
    });

    it('info logs are persisted', async () => {
      const { sink, logger } = setup();

      logger.info('info_event', { foo: 'bar' });
      await logger.flush();

      expect(sink.entries).toHaveLength(1);
      expect(sink.entries[0].level).toBe('info');
      expect(sink.entries[0].event_type).toBe('info_event');
      expect(sink.entries[0].metadata).toEqual({ foo: 'bar' });
    });

    it('warn and error logs are persisted', async () => {
      const { sink, logger } = setup();

      logger.warn('warn_event', { issue: 'slow_render' });
      logger.error('error_event', { error: 'validation_failed' });
      await logger.flush();

      expect(sink.entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
    });

    it('fatal logs are flushed immediately', async () => {
      const { sink, logger } = setup();

      logger.fatal('fatal_event', { critical: true });

      // Should be flushed without explicit call
      await vi.waitFor(() => expect(sink.entries).toHaveLength(1));
      expect(sink.entries[0].level).toBe('fatal');
    });
  });

  describe('buffering', () => {
    it('buffers logs until flush is called', async () => {
      const { sink, logger } = setup();

      logger.info('event_1');
      logger.info('event_2');
      expect(sink.entries).toHaveLength(0);

      await logger.flush();
      expect(sink.entries).toHaveLength(2);
    });

    it('auto-flushes at buffer threshold', async () => {
      const { sink, logger } = setup({ bufferSize: 3 });

      logger.info('event_1');
      logger.info('event_2');
      expect(sink.entries).toHaveLength(0);

      logger.info('event_3');
      await vi.waitFor(() => expect(sink.entries).toHaveLength(3));
    });

    it('flush is idempotent when buffer is empty', async () => {
      const { sink, logger } = setup();

      await logger.flush();
      await logger.flush();

      expect(sink.entries).toHaveLength(0);
    });

    it('reports sink failures without throwing', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = createLogger({
        console: 'none',
        sink: {
          write: async () => {
            throw new Error('disk full');
          },
        },
      });

      logger.info('event');
      await expect(logger.flush()).resolves.toBeUndefined();
      expect(consoleError).toHaveBeenCalledWith('Failed to flush logs to sink:', expect.any(Error), { entries: 1 });
    });
  });

  describe('child loggers', () => {
    it('child inherits parent metadata', async () => {
      const { sink, logger } = setup();
      const child = logger.child({ requestId: 'req_123' });

      child.info('child_event', { action: 'render' });
      await child.flush();

      expect(sink.entries[0].metadata).toEqual({ requestId: 'req_123', action: 'render' });
    });

    it('child metadata overwrites parent when keys conflict', async () => {
      const { sink, logger } = setup();
      const grandchild = logger.child({ key: 'parent_value' }).child({ key: 'child_value' });

      grandchild.info('conflict_event');
      await grandchild.flush();

      expect(sink.entries[0].metadata.key).toBe('child_value');
    });

    it('siblings have isolated metadata', async () => {
      const { sink, logger } = setup();
      const child1 = logger.child({ branch: 'a' });
      const child2 = logger.child({ branch: 'b' });

      child1.info('event_a');
      child2.info('event_b');
      await child1.flush();
      await child2.flush();

      expect(sink.entries.map((entry) => entry.metadata)).toEqual([{ branch: 'a' }, { branch: 'b' }]);
    });
  });

  describe('metadata', () => {
    it('serializes errors with their stack outside production', async () => {
      const { sink, logger } = setup({ environment: 'test' });

      logger.error('failed', { error: new TypeError('bad input') });
      await logger.flush();

      expect(sink.entries[0].metadata.error).toMatchObject({ name: 'TypeError', message: 'bad input' });
      expect(sink.entries[0].metadata.error).toHaveProperty('stack');
    });

    it('drops stacks in production', async () => {
      const { sink, logger } = setup({ environment: 'production' });

      logger.error('failed', { error: new Error('boom') });
      await logger.flush();

      expect(sink.entries[0].metadata.error).toEqual({ name: 'Error', message: 'boom' });
    });
  });

  describe('log entry structure', () => {
    it('generates unique IDs and timestamps', async () => {
      const { sink, logger } = setup();
      const before = Date.now();

      logger.info('event_1');
      logger.info('event_2');
      await logger.flush();

      expect(sink.entries[0].id).not.toBe(sink.entries[1].id);
      expect(sink.entries[0].id).toMatch(/^log_/);
      expect(sink.entries[0].timestamp).toBeGreaterThanOrEqual(before);
    });
  });

  describe('console output', () => {
    it('writes JSON lines to stdout by default', () => {
      const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = createLogger({ consoleOnly: true });

      logger.info('console_event', { foo: 'bar' });

      expect(consoleLog).toHaveBeenCalledTimes(1);
      const line = String(consoleLog.mock.calls[0][0]);
      expect(JSON.parse(line)).toMatchObject({ level: 'info', event_type: 'console_event', metadata: { foo: 'bar' } });
    });

    it('writes to stderr when asked to', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = createLogger({ consoleOnly: true, console: 'stderr' });

      logger.warn('console_warn');

      expect(consoleError).toHaveBeenCalledTimes(1);
    });
  });

  describe('console-only mode', () => {
    it('throws if the sink is missing when consoleOnly is false', () => {
      expect(() => createLogger({ consoleOnly: false })).toThrow(
        'LoggerConfig.sink is required when consoleOnly is false',
      );
    });

    it('does not require a sink when consoleOnly is true', async () => {
      const logger = createLogger({ consoleOnly: true, console: 'none' });
      logger.info('test');
      await expect(logger.flush()).resolves.toBeUndefined();
    });
  });

  describe('environment-aware logging', () => {
    it('development environment skips debug messages', async () => {
      const { sink, logger } = setup({ environment: 'development' });
      logger.debug('debug_message');
      logger.info('info_message');
      logger.warn('warn_message');
      await logger.flush();

      expect(sink.entries.map((entry) => entry.level)).toEqual(['info', 'warn']);
    });

    it('production environment only logs warnings and errors', async () => {
      const { sink, logger } = setup({ environment: 'production' });
      logger.debug('debug_message');
      logger.info('info_message');
      logger.warn('warn_message');
      logger.error('error_message');
      await logger.flush();

      expect(sink.entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
    });
  });
});

describe('file sink', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('appends one JSON object per line', async () => {
    dir = await mkdtemp(join(tmpdir(), 'tessera-logger-'));
    const path = join(dir, 'render.log');
    const logger = createLogger({ sink: createFileSink(path), console: 'none' });

    logger.info('first');
    await logger.flush();
    logger.warn('second', { template: 'page.html' });
    await logger.flush();

    const lines = (await readFile(path, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'warn', event_type: 'second', metadata: { template: 'page.html' } });
  });
});
