import { describe, it, expect, afterEach, vi } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  const now = () => new Date(2012, 2, 4, 5, 6, 7);

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints verbose lines with a timestamp when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger({ verbose: true, now }).verbose('/data/in/a.fits -> /data/out/a.fits.gz');

    expect(log).toHaveBeenCalledWith('[2012-03-04 05:06:07] /data/in/a.fits -> /data/out/a.fits.gz');
  });

  it('drops verbose lines otherwise', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger({ verbose: false, now }).verbose('hidden');

    expect(log).not.toHaveBeenCalled();
  });

  it('always prints errors to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    createLogger({ verbose: false, now }).error('loop crashed');

    expect(error).toHaveBeenCalledWith('[2012-03-04 05:06:07] Error: loop crashed');
  });
});
