import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('enables only the listed scopes', () => {
    const log = createLogger('haul, cost');
    expect(log.isEnabled('haul')).toBe(true);
    expect(log.isEnabled('cost')).toBe(true);
    expect(log.isEnabled('slope')).toBe(false);
  });

  it('enables everything with *', () => {
    expect(createLogger('*').isEnabled('grid')).toBe(true);
  });

  it('stays quiet for disabled scopes but always warns', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = createLogger('');

    log.debug('engine', 'hidden');
    log.warn('grid', 'shown', { cells: 2 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] [GRID] shown', { cells: 2 });
  });
});
