import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { createCLILogger, formatDuration } from './logger.js';

function lastJson(spy: MockInstance): unknown {
  const call = spy.mock.calls.at(-1);
  return JSON.parse(String(call?.[0]));
}

describe('CLILogger', () => {
  let info: MockInstance;
  let error: MockInstance;
  let log: MockInstance;

  beforeEach(() => {
    info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('JSON output', () => {
    it('should write one object per entry with context', () => {
      const logger = createCLILogger({ json: true, context: { run: 'r1' } });
      logger.info('hello', { rows: 3 });

      expect(lastJson(info)).toMatchObject({
        level: 'info',
        message: 'hello',
        service: 'peakmap',
        run: 'r1',
        rows: 3,
      });
    });

    it('should tag entries with the running command', () => {
      const logger = createCLILogger({ json: true });
      logger.commandStart('build', { dryRun: true });

      expect(lastJson(info)).toMatchObject({
        message: 'Starting build',
        command: 'build',
        dryRun: true,
      });
    });

    it('should report duration on command end', () => {
      const logger = createCLILogger({ json: true });
      logger.commandStart('validate');
      logger.commandEnd(false, { errors: 2 });

      expect(error).toHaveBeenCalledTimes(1);
      const entry = lastJson(error);
      expect(entry).toMatchObject({ message: 'Command failed', command: 'validate', errors: 2 });
      expect(entry).toHaveProperty('duration_ms');
    });
  });

  describe('human output', () => {
    it('should put the formatted duration in the command end line', () => {
      const now = vi.spyOn(Date, 'now').mockReturnValue(1_000);
      const logger = createCLILogger();
      logger.commandStart('build');
      now.mockReturnValue(2_500);
      logger.commandEnd(true, { rows: 8 });

      const line = String(info.mock.calls.at(-1)?.[0]);
      expect(line).toContain('Command completed in 1.50s');
      expect(line).toContain('\x1b[36mrows\x1b[0m=8');
      expect(line).not.toContain('duration_ms');
    });

    it('should print level, message and metadata', () => {
      createCLILogger().info('hello', { rows: 3 });

      const line = String(info.mock.calls[0]?.[0]);
      expect(line).toContain('INFO ');
      expect(line).toContain('hello');
      expect(line).toContain('\x1b[36mrows\x1b[0m=3');
    });
  });

  it('should drop entries below the configured level', () => {
    const logger = createCLILogger({ level: 'warn' });
    logger.info('quiet');
    logger.debug('quieter');

    expect(info).not.toHaveBeenCalled();
  });

  it('should merge context into child loggers', () => {
    const logger = createCLILogger({ json: true, context: { run: 'r1' } });
    logger.commandStart('build');
    logger.child({ module: 'map-assembler' }).info('child entry');

    expect(lastJson(info)).toMatchObject({
      message: 'child entry',
      command: 'build',
      run: 'r1',
      module: 'map-assembler',
    });
  });

  describe('table()', () => {
    const rows = [
      { layer: 'Gipuzkoa', markers: 2 },
      { layer: 'Japan', markers: 0 },
    ];

    it('should align columns', () => {
      createCLILogger().table(rows);

      expect(log.mock.calls.map((call) => call[0])).toEqual([
        'layer    | markers',
        '---------+--------',
        'Gipuzkoa | 2      ',
        'Japan    | 0      ',
      ]);
    });

    it('should print a JSON array in JSON mode', () => {
      createCLILogger({ json: true }).table(rows);
      expect(log).toHaveBeenCalledWith('[{"layer":"Gipuzkoa","markers":2},{"layer":"Japan","markers":0}]');
    });

    it('should say so when there is nothing to show', () => {
      createCLILogger().table([]);

      expect(log).not.toHaveBeenCalled();
      expect(String(info.mock.calls[0]?.[0])).toContain('No data to display');
    });
  });
});

describe('formatDuration', () => {
  it('should pick a readable unit', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(90_000)).toBe('1m 30.0s');
  });
});
