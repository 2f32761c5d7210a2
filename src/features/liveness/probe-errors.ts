import { BusinessError, BusinessErrorCode } from '../../shared/logger';

// アドレス形式が不正（リトライしない）
export class MalformedAddressError extends BusinessError {
  constructor(
    public readonly address: string,
    public readonly reason: string
  ) {
    super(BusinessErrorCode.MALFORMED_ADDRESS, `Malformed address "${address}": ${reason}`, 400);
    this.name = 'MalformedAddressError';
  }
}

// 疎通確認の完了前にキャンセルされた
export class ProbeCancelledError extends BusinessError {
  constructor(public readonly address: string) {
    super(BusinessErrorCode.PROBE_CANCELLED, `Probe of ${address} was cancelled`);
    this.name = 'ProbeCancelledError';
  }
}
