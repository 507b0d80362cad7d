import { describe, it, expect } from 'vitest';
import { Logger, errorFields } from './logger';

function capture() {
  const lines: Record<string, unknown>[] = [];
  const sink = (line: string) => {
    lines.push(JSON.parse(line));
  };
  return { lines, sink };
}

describe('Logger', () => {
  it('should write one JSON object per entry', () => {
    const { lines, sink } = capture();
    const logger = new Logger('info', {}, sink);

    logger.info('Counted', { channel: 'c1' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'info', msg: 'Counted', channel: 'c1' });
    expect(typeof lines[0].timestamp).toBe('string');
  });

  it('should drop entries below the configured level', () => {
    const { lines, sink } = capture();
    const logger = new Logger('warn', {}, sink);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(lines.map((l) => l.level)).toEqual(['warn', 'error']);
  });

  it('should carry bound context into children', () => {
    const { lines, sink } = capture();
    const logger = new Logger('debug', { service: 'suit-tally' }, sink).child({ component: 'telegram' });

    logger.debug('ready');

    expect(lines[0]).toMatchObject({ service: 'suit-tally', component: 'telegram', msg: 'ready' });
  });
});

describe('errorFields', () => {
  it('should keep the message and name of an Error', () => {
    expect(errorFields(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
  });

  it('should stringify anything else', () => {
    expect(errorFields('plain')).toEqual({ error: 'plain' });
  });
});
