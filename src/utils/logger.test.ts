import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BufferedLogger } from './logger';

describe('BufferedLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('echoes each message with the reporter prefix', () => {
    const logger = new BufferedLogger();
    logger.log('Detected build environment: circleci');

    expect(console.log).toHaveBeenCalledWith('<test-reporter> Detected build environment: circleci');
  });

  it('keeps every message without the prefix', () => {
    const logger = new BufferedLogger();
    logger.log('first');
    logger.log('second');

    expect(logger.text()).toBe('first\nsecond');
    expect(console.log).toHaveBeenCalledWith('<test-reporter> second');
  });

  it('stays quiet when echo is disabled', () => {
    const logger = new BufferedLogger({ echo: false });
    logger.log('hidden');

    expect(console.log).not.toHaveBeenCalled();
    expect(logger.text()).toBe('hidden');
  });

  it('returns an empty string before anything is logged', () => {
    expect(new BufferedLogger({ echo: false }).text()).toBe('');
  });
});
