import React from 'react';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { render } from 'ink-testing-library';
import { CacheView, executeCacheReset } from '../../../src/cli/commands/cache.js';
import { createContext } from '../../../src/cli/context.js';
import { byCommand, scriptedFactory } from '../../helpers/scripted-transport.js';

describe('CacheView', () => {
  it('should show usage and a fill bar', () => {
    const { lastFrame } = render(<CacheView cache={{ used: 300, free: 700, total: 1000 }} />);
    const output = lastFrame() ?? '';

    expect(output).toContain('300 B');
    expect(output).toContain('700 B');
    expect(output).toContain('1000 B');
    expect(output).toContain('[██████░░░░░░░░░░░░░░]  30%');
  });

  it('should show an empty bar for a cache without space', () => {
    const { lastFrame } = render(<CacheView cache={{ used: 0, free: 0, total: 0 }} />);
    expect(lastFrame()).toContain('[░░░░░░░░░░░░░░░░░░░░]   0%');
  });
});

describe('executeCacheReset', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should reset the cache and confirm', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { factory, transports } = scriptedFactory(byCommand({ 'CACHE-RESET': 'code: 200\nmessage: OK\n\n' }));

    await executeCacheReset(createContext({ json: false, verbose: false }, {}, factory));

    expect(transports[0].sent).toEqual(['CACHE-RESET\n']);
    expect(log).toHaveBeenCalledWith('\x1b[32m[OK] Cache reset\x1b[0m');
  });

  it('should report a rejected reset', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { factory } = scriptedFactory(byCommand({ 'CACHE-RESET': 'code: 409\nmessage: transfer active\n\n' }));
    const context = createContext({ json: false, verbose: false }, { ONDD_LOG_LEVEL: 'silent' }, factory);

    await executeCacheReset(context);

    expect(error).toHaveBeenCalledWith('\x1b[31m[ERROR] CACHE-RESET rejected (409): transfer active\x1b[0m');
    expect(process.exitCode).toBe(1);
  });
});
