import type { Server } from 'net';
import { ProbeDispatcher } from '../src/features/liveness/probe-dispatcher';
import { MalformedAddressError, ProbeCancelledError } from '../src/features/liveness/probe-errors';
import { ControllerRegistry, DuplicateOperationError } from '../src/shared/abort/controller-registry';
import { dialTcp, type Dialer } from '../src/shared/net/tcp-dial';
import { closeServer, getFreePort, listenOn, sleep } from './helpers/net';

const POLL_INTERVAL_MS = 100;
// タイマー・ソケットのスケジューリング誤差
const SLACK_MS = 150;

type Outcome = 'live' | 'cancelled' | 'malformed' | 'duplicate' | 'unknown';

// startProbe の結果を reject させずに取り出す
const settle = (probe: Promise<void>): Promise<Outcome> =>
  probe.then(
    (): Outcome => 'live',
    (error: unknown): Outcome => {
      if (error instanceof ProbeCancelledError) return 'cancelled';
      if (error instanceof MalformedAddressError) return 'malformed';
      if (error instanceof DuplicateOperationError) return 'duplicate';
      return 'unknown';
    },
  );

describe('ProbeDispatcher', () => {
  let registry: ControllerRegistry;
  let dial: jest.Mock<ReturnType<Dialer>, Parameters<Dialer>>;
  let dispatcher: ProbeDispatcher;
  let servers: Server[];

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    registry = new ControllerRegistry();
    dial = jest.fn(dialTcp);
    dispatcher = new ProbeDispatcher(registry, {
      intervalMs: POLL_INTERVAL_MS,
      logIntervalMs: 1000,
      dial,
    });
    servers = [];
  });

  afterEach(async () => {
    for (const id of registry.activeIds()) {
      registry.cancelOperation(id);
    }
    await Promise.all(servers.map(closeServer));
    jest.restoreAllMocks();
  });

  it('ignores cancellation of unknown ids', () => {
    expect(() => dispatcher.cancel(123n)).not.toThrow();
    expect(registry.size).toBe(0);
  });

  it.each(['not-an-ip:80', '127.0.0.1:99999', '127.0.0.1'])(
    'fails immediately for malformed address %s',
    async (address) => {
      const startedAt = Date.now();

      await expect(dispatcher.startProbe(1n, address)).rejects.toBeInstanceOf(MalformedAddressError);

      expect(Date.now() - startedAt).toBeLessThan(POLL_INTERVAL_MS);
      expect(dial).not.toHaveBeenCalled();
      expect(registry.has(1n)).toBe(false);
    },
  );

  it('resolves once something starts listening on the address', async () => {
    const port = await getFreePort();
    const outcome = settle(dispatcher.startProbe(1n, `127.0.0.1:${port}`));
    let finished = false;
    void outcome.then(() => {
      finished = true;
    });

    await sleep(500);
    expect(finished).toBe(false);
    expect(registry.has(1n)).toBe(true);
    expect(dial.mock.calls.length).toBeGreaterThanOrEqual(4);

    servers.push(await listenOn(port));
    const listeningAt = Date.now();

    await expect(outcome).resolves.toBe('live');
    expect(Date.now() - listeningAt).toBeLessThan(POLL_INTERVAL_MS + SLACK_MS);
    expect(registry.has(1n)).toBe(false);
  });

  it('returns a cancellation outcome within one poll interval of cancel', async () => {
    const port = await getFreePort();
    const outcome = settle(dispatcher.startProbe(2n, `127.0.0.1:${port}`));

    await sleep(250);
    const cancelledAt = Date.now();
    dispatcher.cancel(2n);

    await expect(outcome).resolves.toBe('cancelled');
    expect(Date.now() - cancelledAt).toBeLessThan(POLL_INTERVAL_MS + SLACK_MS);
    expect(registry.has(2n)).toBe(false);
  });

  it('frees the id after completion so it can be cancelled as a no-op and reused', async () => {
    const server = await listenOn(0);
    servers.push(server);
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }

    await expect(dispatcher.startProbe(3n, `127.0.0.1:${address.port}`)).resolves.toBeUndefined();
    expect(registry.has(3n)).toBe(false);

    dispatcher.cancel(3n);
    await expect(dispatcher.startProbe(3n, `127.0.0.1:${address.port}`)).resolves.toBeUndefined();
  });

  it('frees the id after a malformed address', async () => {
    await expect(dispatcher.startProbe(4n, 'localhost:80')).rejects.toBeInstanceOf(MalformedAddressError);

    const outcome = settle(dispatcher.startProbe(4n, '127.0.0.1:9'));
    dispatcher.cancel(4n);
    await expect(outcome).resolves.toBe('cancelled');
  });

  it('rejects a duplicate active id without disturbing the running probe', async () => {
    const port = await getFreePort();
    const first = settle(dispatcher.startProbe(5n, `127.0.0.1:${port}`));

    await expect(settle(dispatcher.startProbe(5n, `127.0.0.1:${port}`))).resolves.toBe('duplicate');
    expect(registry.has(5n)).toBe(true);

    dispatcher.cancel(5n);
    await expect(first).resolves.toBe('cancelled');
  });

  it('keeps concurrent probes with different ids independent', async () => {
    const port = await getFreePort();
    const address = `127.0.0.1:${port}`;
    const a = settle(dispatcher.startProbe(10n, address));
    const b = settle(dispatcher.startProbe(11n, address));

    await sleep(150);
    dispatcher.cancel(10n);
    await expect(a).resolves.toBe('cancelled');

    expect(registry.activeIds()).toEqual([11n]);

    servers.push(await listenOn(port));
    await expect(b).resolves.toBe('live');
    expect(registry.size).toBe(0);
  });

  it('cancels the probe when the caller-supplied signal is aborted', async () => {
    const base = new AbortController();
    const outcome = settle(dispatcher.startProbe(12n, '127.0.0.1:9', base.signal));

    setTimeout(() => base.abort(), 50);

    await expect(outcome).resolves.toBe('cancelled');
    expect(registry.has(12n)).toBe(false);
  });
});
