import { describe, it, expect, vi, afterEach } from 'vitest';
import { executeOutput } from '../../../src/cli/commands/output.js';
import { createContext } from '../../../src/cli/context.js';
import { byCommand, scriptedFactory } from '../../helpers/scripted-transport.js';

const flags = { json: false, verbose: false };

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('output command', () => {
  it('should print the current output path', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { factory } = scriptedFactory(byCommand({ OUTPUT: 'path: /srv/downloads\n\n' }));

    await executeOutput(createContext(flags, {}, factory));

    expect(log).toHaveBeenCalledWith('/srv/downloads');
  });

  it('should set a new output path', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { factory, transports } = scriptedFactory(byCommand({}));

    await executeOutput(createContext(flags, {}, factory), '/media/usb');

    expect(transports[0].sent).toEqual(['SET-OUTPUT /media/usb\n']);
    expect(log).toHaveBeenCalledWith('\x1b[32m[OK] Output path set to /media/usb\x1b[0m');
  });

  it('should print JSON when asked', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { factory } = scriptedFactory(byCommand({ OUTPUT: 'path: /srv\n\n' }));

    await executeOutput(createContext({ ...flags, json: true }, {}, factory));

    expect(log).toHaveBeenCalledWith('{\n  "path": "/srv"\n}');
  });
});
