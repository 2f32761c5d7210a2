import { Socket } from 'net';
import type { HostPort } from './host-port';

export type Dialer = (target: HostPort, signal: AbortSignal) => Promise<boolean>;

/**
 * TCP接続を1回だけ試みる。
 * 接続できたら即座に切断して true、失敗または中断された場合は false を返す（reject しない）。
 */
export const dialTcp: Dialer = (target, signal) => {
  return new Promise<boolean>((resolve) => {
    if (signal.aborted) {
      resolve(false);
      return;
    }

    const socket = new Socket();
    let settled = false;

    const finish = (connected: boolean) => {
      if (settled) return;
      settled = true;
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(connected);
    };

    // 接続中にキャンセルされた場合もソケットを破棄する
    const onAbort = () => finish(false);

    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('connect', () => finish(true));
    socket.on('error', () => finish(false));

    socket.connect(target.port, target.host);
  });
};
