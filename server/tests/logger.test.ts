import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger, LOG_LEVELS } from '../src/logger.js';

function captureStream() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...chunk.toString().split('\n').filter((l) => l.length > 0));
      callback();
    },
  });
  return { stream, lines };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('createLogger', () => {
  it('exposes a method per level, trace included', () => {
    const log = createLogger({ level: 'trace', silent: true });
    expect(Object.keys(log).sort()).toEqual([...LOG_LEVELS].sort());
    for (const level of LOG_LEVELS) {
      expect(() => log[level](`${level} message`, { stream: { name: 'cam1' } })).not.toThrow();
    }
  });

  it('drops levels below the configured one', async () => {
    const { stream, lines } = captureStream();
    const log = createLogger({ level: 'info', stream });
    log.error('stats unreachable');
    log.info('decision ready');
    log.debug('request aborted');
    log.trace('<rtmp/>');
    await flush();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/ \[error\] stats unreachable$/);
    expect(lines[1]).toMatch(/ \[info\] decision ready$/);
  });

  it('writes trace lines with their metadata when enabled', async () => {
    const { stream, lines } = captureStream();
    const log = createLogger({ level: 'trace', stream });
    log.trace('[Nginx] live/cam1', { bwVideo: 1024 });
    await flush();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ \[trace\] \[Nginx\] live\/cam1 \{"bwVideo":1024\}$/);
  });
});
