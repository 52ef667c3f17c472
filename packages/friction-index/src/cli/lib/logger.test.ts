import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCLILogger } from './logger.js';

describe('CLILogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps stdout free of log lines at every level', () => {
    const stdout = [
      vi.spyOn(console, 'log').mockImplementation(() => undefined),
      vi.spyOn(console, 'info').mockImplementation(() => undefined),
      vi.spyOn(console, 'debug').mockImplementation(() => undefined),
    ];
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createCLILogger({ level: 'debug', json: true });

    logger.debug('one');
    logger.info('two');
    logger.warn('three');
    logger.error('four');

    for (const spy of stdout) expect(spy).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('tags JSON entries with the service and active command', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createCLILogger({ level: 'info', json: true });

    logger.commandStart('top', { limit: 2 });

    const entry: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toEqual(
      expect.objectContaining({
        level: 'info',
        message: 'Starting top',
        service: 'friction-index',
        command: 'top',
        limit: 2,
      })
    );
  });
});
