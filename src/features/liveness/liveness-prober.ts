import { APP_CONFIG } from '../../shared/config';
import { logInfo } from '../../shared/logger';
import { isIpLiteral, parsePort, splitHostPort, type HostPort } from '../../shared/net/host-port';
import { dialTcp, type Dialer } from '../../shared/net/tcp-dial';
import { MalformedAddressError, ProbeCancelledError } from './probe-errors';

export type LivenessProbeOptions = {
  // 接続試行の間隔
  intervalMs?: number;
  // 「checking address」ログの最短出力間隔
  logIntervalMs?: number;
  dial?: Dialer;
};

/**
 * `host:port` を検証して接続先に変換する。
 * ホストはIPリテラルのみ、ポートは0〜65535の10進数のみ許可。
 */
export const parseProbeAddress = (address: string): HostPort => {
  const split = splitHostPort(address);
  if (!split.success) {
    throw new MalformedAddressError(address, split.reason);
  }
  if (!isIpLiteral(split.host)) {
    throw new MalformedAddressError(address, 'invalid IP');
  }
  const port = parsePort(split.port);
  if (port === null) {
    throw new MalformedAddressError(address, 'invalid port');
  }
  return { host: split.host, port };
};

// 次のティックまで待つ。キャンセルされたら false
const waitForTick = (delayMs: number, signal: AbortSignal): Promise<boolean> => {
  return new Promise<boolean>((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, Math.max(0, delayMs));
    signal.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * 指定アドレスにTCP接続できるようになるまで一定間隔で接続を試みる。
 *
 * - 形式不正のアドレスは接続を試みずに MalformedAddressError
 * - signal が中断されると ProbeCancelledError
 * - 接続できたら即座に切断して resolve
 *
 * 試行回数の上限やタイムアウトは持たない（呼び出し側が signal で制御する）。
 */
export async function probeLiveness(
  signal: AbortSignal,
  address: string,
  options: LivenessProbeOptions = {},
): Promise<void> {
  const target = parseProbeAddress(address);

  const intervalMs = options.intervalMs ?? APP_CONFIG.PROBE_INTERVAL_MS;
  const logIntervalMs = options.logIntervalMs ?? APP_CONFIG.PROBE_LOG_INTERVAL_MS;
  const dial = options.dial ?? dialTcp;

  let lastLoggedAt: number | null = null;
  let nextTickAt = Date.now() + intervalMs;

  for (;;) {
    const ticked = await waitForTick(nextTickAt - Date.now(), signal);
    if (!ticked || signal.aborted) {
      throw new ProbeCancelledError(address);
    }

    // 固定レートで刻む。接続に時間がかかって遅れたティックは捨てる
    const now = Date.now();
    nextTickAt += intervalMs;
    if (nextTickAt <= now) {
      nextTickAt = now + intervalMs;
    }

    if (lastLoggedAt === null || now - lastLoggedAt >= logIntervalMs) {
      logInfo('checking address', { address });
      lastLoggedAt = now;
    }

    if (await dial(target, signal)) {
      return;
    }
  }
}
