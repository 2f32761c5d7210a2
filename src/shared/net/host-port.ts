import { isIP } from 'net';

export type SplitHostPortResult =
  | { success: true; host: string; port: string }
  | { success: false; reason: string };

export type HostPort = {
  host: string;
  port: number;
};

const MAX_PORT = 65535;

/**
 * `host:port` 形式の文字列をホストとポートに分割する。
 *
 * - ポートは最後の `:` 以降
 * - IPv6 は `[::1]:80` のように角括弧で囲む必要がある
 * - ホスト・ポートの中身の妥当性はここでは検証しない
 */
export const splitHostPort = (address: string): SplitHostPortResult => {
  const lastColon = address.lastIndexOf(':');
  if (lastColon < 0) {
    return { success: false, reason: 'missing port in address' };
  }

  let host: string;
  // 角括弧の検査開始位置
  let openFrom = 0;
  let closeFrom = 0;

  if (address.startsWith('[')) {
    const closing = address.indexOf(']');
    if (closing < 0) {
      return { success: false, reason: "missing ']' in address" };
    }
    if (closing + 1 === address.length) {
      return { success: false, reason: 'missing port in address' };
    }
    if (closing + 1 !== lastColon) {
      return {
        success: false,
        reason: address[closing + 1] === ':' ? 'too many colons in address' : 'missing port in address',
      };
    }
    host = address.slice(1, closing);
    openFrom = 1;
    closeFrom = closing + 1;
  } else {
    host = address.slice(0, lastColon);
    if (host.includes(':')) {
      return { success: false, reason: 'too many colons in address' };
    }
  }

  if (address.indexOf('[', openFrom) >= 0) {
    return { success: false, reason: "unexpected '[' in address" };
  }
  if (address.indexOf(']', closeFrom) >= 0) {
    return { success: false, reason: "unexpected ']' in address" };
  }

  return { success: true, host, port: address.slice(lastColon + 1) };
};

// IPリテラルのみ許可（DNS名・ゾーンID付きIPv6は受け付けない）
export const isIpLiteral = (host: string): boolean => !host.includes('%') && isIP(host) !== 0;

// 10進数かつ16bitに収まるポートのみ許可
export const parsePort = (port: string): number | null => {
  if (!/^[0-9]+$/.test(port)) {
    return null;
  }
  const value = Number(port);
  return value <= MAX_PORT ? value : null;
};
