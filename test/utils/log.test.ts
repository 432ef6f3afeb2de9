// Filename: test/utils/log.test.ts

import { describe, it, expect, vi, afterEach } from 'vitest';
import { log, setLogLevel, ERR, INFO, TMI, WARN } from '../../utils/log.js';

describe('log', () => {
  afterEach(() => {
    setLogLevel(INFO);
    vi.restoreAllMocks();
  });

  it('should route messages to the console method for their level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel(INFO);

    log('broken', ERR);
    log('careful', WARN);
    log('hello', INFO);

    expect(error).toHaveBeenCalledWith(expect.stringMatching(/ broken$/));
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/ careful$/));
    expect(info).toHaveBeenCalledWith(expect.stringMatching(/ hello$/));
  });

  it('should drop messages above the threshold', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    log('chatty', TMI);
    log('hello', INFO);
    log('careful', WARN);

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should accept numeric thresholds', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('9');

    log('chatty', TMI);

    expect(info).toHaveBeenCalledTimes(1);
  });
});
