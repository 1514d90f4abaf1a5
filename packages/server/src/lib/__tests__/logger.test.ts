import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../logger.js';

function captureOutput() {
  return {
    stdout: vi.spyOn(process.stdout, 'write').mockReturnValue(true),
    stderr: vi.spyOn(process.stderr, 'write').mockReturnValue(true),
  };
}

function parseLine(chunk: unknown): unknown {
  return typeof chunk === 'string' ? JSON.parse(chunk.trim()) : null;
}

describe('createLogger', () => {
  const origLevel = process.env['LOG_LEVEL'];

  afterEach(() => {
    vi.restoreAllMocks();
    if (origLevel === undefined) delete process.env['LOG_LEVEL'];
    else process.env['LOG_LEVEL'] = origLevel;
  });

  it('info writes one JSON line to stdout', () => {
    const { stdout } = captureOutput();
    createLogger('App').info('hello', { userId: 'user-1' });

    const out = parseLine(stdout.mock.calls[0]?.[0]);
    expect(out).toMatchObject({ level: 'info', ns: 'App', msg: 'hello', data: { userId: 'user-1' } });
    expect(out).toHaveProperty('ts');
  });

  it('error writes to stderr', () => {
    const { stdout, stderr } = captureOutput();
    createLogger('App').error('boom');

    expect(stdout).not.toHaveBeenCalled();
    expect(parseLine(stderr.mock.calls[0]?.[0])).toMatchObject({ level: 'error', ns: 'App', msg: 'boom' });
  });

  it('omits data when none is given', () => {
    const { stdout } = captureOutput();
    createLogger('App').warn('careful');
    expect(parseLine(stdout.mock.calls[0]?.[0])).not.toHaveProperty('data');
  });

  it('filters debug at the default level', () => {
    delete process.env['LOG_LEVEL'];
    const { stdout } = captureOutput();
    createLogger('App').debug('hidden');
    expect(stdout).not.toHaveBeenCalled();
  });

  it('honours LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'error';
    const { stdout } = captureOutput();
    createLogger('App').warn('hidden');
    expect(stdout).not.toHaveBeenCalled();

    process.env['LOG_LEVEL'] = 'debug';
    createLogger('App').debug('visible');
    expect(parseLine(stdout.mock.calls[0]?.[0])).toMatchObject({ level: 'debug', msg: 'visible' });
  });

  it('falls back to info for an unknown LOG_LEVEL', () => {
    process.env['LOG_LEVEL'] = 'verbose';
    const { stdout } = captureOutput();
    const log = createLogger('App');
    log.debug('hidden');
    log.info('shown');
    expect(stdout).toHaveBeenCalledTimes(1);
  });

  it('child loggers extend the namespace', () => {
    const { stdout } = captureOutput();
    createLogger('Payments').child('webhook').info('received');
    expect(parseLine(stdout.mock.calls[0]?.[0])).toMatchObject({ ns: 'Payments:webhook' });
  });
});
