import { operationIdSchema } from '../src/features/liveness/operation-id';
import { probeDispatcher } from '../src/features/liveness/probe-dispatcher';

/**
 * 使い方: check_live.ts <host:port> [id]
 * 接続できるまで待機する。Ctrl+C でキャンセル。
 */
async function main() {
  const address = process.argv[2];
  const idResult = operationIdSchema.safeParse(process.argv[3] ?? '1');

  if (!address || !idResult.success) {
    // eslint-disable-next-line no-console
    console.error('Usage: check_live.ts <host:port> [id]');
    process.exitCode = 1;
    return;
  }

  const id = idResult.data;
  process.once('SIGINT', () => probeDispatcher.cancel(id));

  try {
    await probeDispatcher.startProbe(id, address);

    // eslint-disable-next-line no-console
    console.log('Address is live.', { address });
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('Liveness check failed.', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

void main();
