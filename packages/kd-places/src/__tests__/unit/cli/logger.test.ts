/**
 * CLI Logger Tests
 *
 * Lines are captured through a sink instead of the console.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CLILogger, createCLILogger, type LogLevel } from '../../../cli/lib/logger.js';

interface Captured {
  readonly level: LogLevel;
  readonly line: string;
}

describe('CLILogger', () => {
  let lines: Captured[];
  const sink = (level: LogLevel, line: string): void => {
    lines.push({ level, line });
  };

  beforeEach(() => {
    lines = [];
  });

  it('drops messages below the configured level', () => {
    const logger = createCLILogger({ level: 'warn' }, sink);

    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('warn');
  });

  it('writes JSON entries with service, command and metadata', () => {
    const logger = new CLILogger({ level: 'debug', json: true }, sink);

    logger.commandStart('nearest', { type: 'cafe' });
    logger.info('Found place', { id: 'cafe-1' });

    const entry: unknown = JSON.parse(lines[1].line);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Found place',
      service: 'kd-places',
      command: 'nearest',
      id: 'cafe-1',
    });
  });

  it('logs the start of a command at debug level', () => {
    const logger = new CLILogger({ level: 'debug', json: true }, sink);

    logger.commandStart('area', { radius: 2 });

    expect(lines[0].level).toBe('debug');
    expect(JSON.parse(lines[0].line)).toMatchObject({ message: 'Starting area', radius: 2 });
  });

  it('reports failure with its duration', () => {
    const logger = new CLILogger({ level: 'info', json: true }, sink);

    logger.commandStart('import');
    logger.commandEnd(false, { reason: 'offline' });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('error');

    const entry: unknown = JSON.parse(lines[0].line);
    expect(entry).toMatchObject({ message: 'Command failed', reason: 'offline' });
    expect(entry).toHaveProperty('duration_ms');
  });

  it('writes human lines with key=value metadata', () => {
    const logger = new CLILogger({ level: 'info', json: false }, sink);

    logger.info('Saved', { places: 8 });

    expect(lines[0].line).toContain('Saved');
    expect(lines[0].line).toContain('places\x1b[0m=8');
  });
});
