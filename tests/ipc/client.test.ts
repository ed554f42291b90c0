import { describe, it, expect, afterEach } from 'vitest';
import { OnddClient } from '../../src/ipc/client.js';
import {
  AbortError,
  CommandRejectedError,
  ConnectionError,
  InvalidArgumentError,
  MalformedResponseError,
  MissingFieldError,
  TimeoutError,
} from '../../src/ipc/errors.js';
import { silentLogger } from '../../src/utils/logger.js';
import { byCommand, scriptedFactory, type Script, type ScriptedTransportOptions } from '../helpers/scripted-transport.js';
import { startFakeDaemon, type FakeDaemon } from '../helpers/fake-daemon.js';

function createClient(script: Script, options: ScriptedTransportOptions & { perCall?: boolean; autoOpen?: boolean } = {}) {
  const { factory, transports } = scriptedFactory(script, options);
  const client = new OnddClient({
    logger: silentLogger,
    transportFactory: factory,
    connectionMode: options.perCall ? 'per-call' : 'persistent',
    autoOpen: options.autoOpen,
  });
  return { client, transports };
}

describe('OnddClient', () => {
  describe('queries', () => {
    it('should map the current status', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\nprogress: 0\n\n' }));

      const status = await client.getStatus();

      expect(status.state).toBe('idle');
      expect(status.progress).toBe(0);
      expect(transports[0].sent).toEqual(['STATUS\n']);
    });

    it('should list transfers in daemon order', async () => {
      const { client } = createClient(
        byCommand({ LIST: 'id: 1\nsize: 100\nreceived: 10\n\nid: 2\nsize: 200\nreceived: 200\n\n' })
      );

      const transfers = await client.listTransfers();

      expect(transfers.map((t) => [t.id, t.size, t.received])).toEqual([
        ['1', 100, 10],
        ['2', 200, 200],
      ]);
      expect(transfers[0].progress).toBe(10);
    });

    it('should return an empty list for an empty response', async () => {
      const { client } = createClient(byCommand({ LIST: '' }));
      expect(await client.listTransfers()).toEqual([]);
    });

    it('should require exactly one stanza for single-record calls', async () => {
      const { client } = createClient(byCommand({ STATUS: 'state: a\n\nstate: b\n\n', CACHE: '' }));

      await expect(client.getStatus()).rejects.toThrow('STATUS: expected exactly one stanza, got 2');
      await expect(client.getCacheInfo()).rejects.toBeInstanceOf(MalformedResponseError);
    });

    it('should propagate decode errors', async () => {
      const { client } = createClient(byCommand({ TUNER: 'lock yes\n' }));
      await expect(client.getTunerStatus()).rejects.toThrow('TUNER: line 1 has no key separator');
    });

    it('should propagate mapping errors', async () => {
      const { client } = createClient(byCommand({ CACHE: 'used: 10\n\n' }));
      await expect(client.getCacheInfo()).rejects.toBeInstanceOf(MissingFieldError);
    });

    it('should map the remaining queries', async () => {
      const { client } = createClient(
        byCommand({
          FILES: 'path: /news/a.html\nsize: 10\n\n',
          CACHE: 'used: 1\nfree: 3\n\n',
          TUNER: 'lock: yes\nsignal: 80\nsnr: 9.5\n\n',
          STREAMS: 'ident: s1\nbitrate: 64000\n\n',
          SETTINGS: 'frequency: 1721\nsymbolrate: 27500\nvoltage: 13\n\n',
          OUTPUT: 'path: /srv/downloads\n\n',
          EVENTS: 'type: started\n\ntype: completed\npath: /a\n\n',
        })
      );

      expect(await client.listFiles()).toEqual([{ path: '/news/a.html', filename: 'a.html', size: 10 }]);
      expect(await client.getCacheInfo()).toEqual({ used: 1, free: 3, total: 4 });
      expect(await client.getTunerStatus()).toEqual({ locked: true, signal: 80, snr: 9.5 });
      expect(await client.listStreams()).toEqual([{ id: 's1', bitrate: 64000 }]);
      expect((await client.getTunerSettings()).polarization).toBe('v');
      expect(await client.getOutputPath()).toBe('/srv/downloads');
      expect((await client.getEvents()).map((e) => e.type)).toEqual(['started', 'completed']);
    });

    it('should not cache records between calls', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\n\n' }));

      const first = await client.getStatus();
      const second = await client.getStatus();

      expect(second).toEqual(first);
      expect(second).not.toBe(first);
      expect(transports[0].sent).toEqual(['STATUS\n', 'STATUS\n']);
    });

    it('should execute raw commands', async () => {
      const { client, transports } = createClient(byCommand({ CUSTOM: 'a: 1\n\n' }));

      const stanzas = await client.execute({ name: 'CUSTOM', args: ['x'] });

      expect(stanzas).toHaveLength(1);
      expect(stanzas[0].get('a')).toBe('1');
      expect(transports[0].sent).toEqual(['CUSTOM x\n']);
    });

    it('should use the configured line terminator', async () => {
      const { factory, transports } = scriptedFactory(byCommand({ STATUS: 'state: idle\r\n\r\n' }));
      const client = new OnddClient({ logger: silentLogger, transportFactory: factory, lineTerminator: '\r\n' });

      expect((await client.getStatus()).state).toBe('idle');
      expect(transports[0].sent).toEqual(['STATUS\r\n']);
    });
  });

  describe('control commands', () => {
    it('should accept an empty response', async () => {
      const { client, transports } = createClient(byCommand({ 'CACHE-RESET': '' }));

      await expect(client.resetCache()).resolves.toBeUndefined();
      expect(transports[0].sent).toEqual(['CACHE-RESET\n']);
    });

    it('should accept a success acknowledgement', async () => {
      const { client } = createClient(byCommand({ 'CACHE-RESET': 'code: 200\nmessage: OK\n\n' }));
      await expect(client.resetCache()).resolves.toBeUndefined();
    });

    it('should raise CommandRejectedError for a failure code', async () => {
      const { client } = createClient(byCommand({ 'CACHE-RESET': 'code: 500\nmessage: cache busy\n\n' }));

      const error = await client.resetCache().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CommandRejectedError);
      if (error instanceof CommandRejectedError) {
        expect(error.message).toBe('CACHE-RESET rejected (500): cache busy');
        expect(error.code).toBe(500);
        expect(error.command).toBe('CACHE-RESET');
      }
    });

    it('should reject more than one stanza', async () => {
      const { client } = createClient(byCommand({ 'SET-OUTPUT': 'code: 200\n\ncode: 200\n\n' }));
      await expect(client.setOutputPath('/srv')).rejects.toThrow('SET-OUTPUT: expected at most one stanza, got 2');
    });

    it('should encode tuner parameters', async () => {
      const { client, transports } = createClient(byCommand({}));

      await client.setTunerParameters({ frequency: 1721, symbolRate: 27500 });

      expect(transports[0].sent).toEqual([
        'SET-TUNER frequency=1721 symbolrate=27500 delivery=dvb-s modulation=qpsk tone=yes voltage=13 azimuth=0\n',
      ]);
    });

    it('should tune to a transponder', async () => {
      const { client, transports } = createClient(byCommand({}));

      await client.tuneTransponder({
        transponderFrequency: 12245,
        symbolRate: 27500,
        lnb: 'u',
        polarization: 'h',
        delivery: 'dvb-s2',
        modulation: '8psk',
      });

      expect(transports[0].sent).toEqual([
        'SET-TUNER frequency=1645 symbolrate=27500 delivery=dvb-s2 modulation=8psk tone=yes voltage=18 azimuth=0\n',
      ]);
    });

    it('should set the output path', async () => {
      const { client, transports } = createClient(byCommand({}));
      await client.setOutputPath('/srv/downloads');
      expect(transports[0].sent).toEqual(['SET-OUTPUT /srv/downloads\n']);
    });
  });

  describe('argument validation', () => {
    it('should reject invalid tuner parameters without any I/O', async () => {
      const { client, transports } = createClient(byCommand({}));

      await expect(client.setTunerParameters({ frequency: 100, symbolRate: 27500 })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      expect(transports).toHaveLength(0);
    });

    it('should reject a relative output path', async () => {
      const { client, transports } = createClient(byCommand({}));

      await expect(client.setOutputPath('downloads')).rejects.toThrow(
        'Invalid path: expected an absolute path, got "downloads"'
      );
      expect(transports).toHaveLength(0);
    });

    it('should reject an output path with whitespace', async () => {
      const { client, transports } = createClient(byCommand({}));

      await expect(client.setOutputPath('/my files')).rejects.toThrow(
        'Invalid SET-OUTPUT argument 1: contains forbidden character " "'
      );
      expect(transports).toHaveLength(0);
    });

    it('should reject a non-positive timeout', async () => {
      const { client } = createClient(byCommand({}));

      await expect(client.getStatus({ timeout: 0 })).rejects.toThrow(
        'Invalid timeout: expected a positive integer, got 0'
      );
      expect(() => new OnddClient({ timeout: -5 })).toThrow(InvalidArgumentError);
    });

    it('should reject a timeout longer than a timer can wait before any I/O', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\n\n' }));

      await expect(client.getStatus({ timeout: 3_000_000_000 })).rejects.toThrow(
        'Invalid timeout: must not exceed 2147483647ms, got 3000000000'
      );
      expect(transports).toHaveLength(0);
      expect(() => new OnddClient({ timeout: 2147483648 })).toThrow(InvalidArgumentError);
      expect(() => new OnddClient({ connectTimeout: 2147483648 })).toThrow('Invalid connectTimeout');
    });
  });

  describe('persistent connections', () => {
    it('should open one connection and reuse it', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\n\n' }));

      await client.getStatus();
      await client.getStatus();
      await client.listTransfers();

      expect(transports).toHaveLength(1);
      expect(transports[0].opens).toBe(1);
      expect(client.isOpen()).toBe(true);
    });

    it('should serialize concurrent calls on the shared connection', async () => {
      const { client, transports } = createClient(
        byCommand({ STATUS: 'state: idle\n\n', TUNER: 'lock: yes\n\n', CACHE: 'used: 1\nfree: 1\n\n' }),
        { delayMs: 10 }
      );

      const [status, tuner, cache] = await Promise.all([
        client.getStatus(),
        client.getTunerStatus(),
        client.getCacheInfo(),
      ]);

      expect(status.state).toBe('idle');
      expect(tuner.locked).toBe(true);
      expect(cache.total).toBe(2);
      expect(transports[0].maxInFlight).toBe(1);
      expect(transports[0].sent).toEqual(['STATUS\n', 'TUNER\n', 'CACHE\n']);
    });

    it('should fail when closed and auto-open is off', async () => {
      const { client } = createClient(byCommand({ STATUS: 'state: idle\n\n' }), { autoOpen: false });

      await expect(client.getStatus()).rejects.toThrow('Not connected to /var/run/ondd.ctrl');

      await client.open();
      await expect(client.getStatus()).resolves.toMatchObject({ state: 'idle' });
    });

    it('should reopen after a timeout closed the connection', async () => {
      let calls = 0;
      const { client, transports } = createClient((line) => {
        calls++;
        return calls === 1 ? new TimeoutError(20000, line) : 'state: idle\n\n';
      });

      await expect(client.getStatus()).rejects.toBeInstanceOf(TimeoutError);
      expect(client.isOpen()).toBe(false);

      await expect(client.getStatus()).resolves.toMatchObject({ state: 'idle' });
      expect(transports[0].opens).toBe(2);
    });

    it('should release the lock after a failed call', async () => {
      let calls = 0;
      const { client } = createClient(() => {
        calls++;
        return calls === 1 ? new ConnectionError('reset by peer') : 'state: idle\n\n';
      });

      await expect(client.getStatus()).rejects.toThrow('reset by peer');
      await expect(client.getStatus()).resolves.toMatchObject({ state: 'idle' });
    });

    it('should not send when the signal is already aborted', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\n\n' }));
      const controller = new AbortController();
      controller.abort();

      await expect(client.getStatus({ signal: controller.signal })).rejects.toBeInstanceOf(AbortError);
      expect(transports).toHaveLength(0);
    });

    it('should stop waiting for the connection when aborted while queued', async () => {
      const { client, transports } = createClient(
        byCommand({ STATUS: 'state: idle\n\n', CACHE: 'used: 1\nfree: 1\n\n', TUNER: 'lock: yes\n\n' }),
        { delayMs: 300 }
      );
      const controller = new AbortController();

      const first = client.getStatus();
      const queued = client.getCacheInfo({ signal: controller.signal });
      const third = client.getTunerStatus();
      const started = Date.now();
      setTimeout(() => controller.abort(), 20);

      await expect(queued).rejects.toThrow('CACHE aborted');
      expect(Date.now() - started).toBeLessThan(250);

      await expect(first).resolves.toMatchObject({ state: 'idle' });
      await expect(third).resolves.toMatchObject({ locked: true });
      expect(transports[0].sent).toEqual(['STATUS\n', 'TUNER\n']);
    });

    it('should close idempotently', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\n\n' }));

      await client.getStatus();
      client.close();
      client.close();

      expect(client.isOpen()).toBe(false);
      expect(transports[0].closes).toBe(1);
    });
  });

  describe('per-call connections', () => {
    it('should open and close a connection for every call', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'state: idle\n\n' }), { perCall: true });

      await client.getStatus();
      await client.getStatus();

      expect(transports).toHaveLength(2);
      expect(transports.map((t) => [t.opens, t.closes])).toEqual([
        [1, 1],
        [1, 1],
      ]);
      expect(client.isOpen()).toBe(false);
    });

    it('should close the connection when the call fails', async () => {
      const { client, transports } = createClient(byCommand({ STATUS: 'garbage\n' }), { perCall: true });

      await expect(client.getStatus()).rejects.toBeInstanceOf(MalformedResponseError);
      expect(transports[0].isOpen).toBe(false);
    });

    it('should treat open() as a no-op', async () => {
      const { client, transports } = createClient(byCommand({}), { perCall: true });
      await client.open();
      expect(transports).toHaveLength(0);
    });
  });

  describe('ping', () => {
    it('should answer true when the daemon responds', async () => {
      const { client, transports } = createClient(byCommand({ PING: '' }));
      expect(await client.ping()).toBe(true);
      expect(transports[0].sent).toEqual(['PING\n']);
    });

    it('should answer false when the daemon is unreachable', async () => {
      const { client } = createClient(byCommand({}), {
        openError: new ConnectionError('Failed to connect to /var/run/ondd.ctrl: connect ENOENT'),
      });
      expect(await client.ping()).toBe(false);
    });

    it('should answer false on timeout', async () => {
      const { client } = createClient(() => new TimeoutError(20000, 'PING'));
      expect(await client.ping()).toBe(false);
    });

    it('should rethrow other errors', async () => {
      const { client } = createClient(byCommand({ PING: 'nonsense\n' }));
      await expect(client.ping()).rejects.toBeInstanceOf(MalformedResponseError);
    });
  });

  describe('over a Unix socket', () => {
    let daemon: FakeDaemon;
    let client: OnddClient;

    afterEach(async () => {
      client.close();
      await daemon.close();
    });

    it('should talk to the daemon end to end', async () => {
      daemon = await startFakeDaemon({
        STATUS: 'state: idle\nprogress: 0\n\n',
        LIST: 'id: 1\nsize: 100\nreceived: 50\n\nid: 2\nsize: 200\nreceived: 0\n\n',
        'CACHE-RESET': 'code: 200\nmessage: OK\n\n',
      });
      client = new OnddClient({ endpoint: daemon.path, logger: silentLogger });

      const [status, transfers] = await Promise.all([client.getStatus(), client.listTransfers()]);
      await client.resetCache();

      expect(status.state).toBe('idle');
      expect(transfers.map((t) => t.progress)).toEqual([50, 0]);
      expect(daemon.received).toEqual(['STATUS', 'LIST', 'CACHE-RESET']);
      expect(daemon.connections).toBe(1);
    });

    it('should reject an unknown command with the daemon failure code', async () => {
      daemon = await startFakeDaemon();
      client = new OnddClient({ endpoint: daemon.path, logger: silentLogger });

      await expect(client.resetCache()).rejects.toThrow('CACHE-RESET rejected (400): unknown command');
    });

    it('should time out and close the shared connection', async () => {
      daemon = await startFakeDaemon({ STATUS: null });
      client = new OnddClient({ endpoint: daemon.path, logger: silentLogger, timeout: 100 });

      await expect(client.getStatus()).rejects.toThrow('No response to STATUS within 100ms');
      expect(client.isOpen()).toBe(false);
    });
  });
});
