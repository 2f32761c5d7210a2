import { SystemError, SystemErrorCode } from '../logger';

export type OperationId = bigint;

export type OperationScope = {
  signal: AbortSignal;
  // 終了時に必ず呼び出す（複数回呼んでも2回目以降は何もしない）
  done: () => void;
};

/**
 * 同一IDの操作が実行中に再登録された場合のエラー。
 * 呼び出し側の契約違反なので、上書きせずに必ず呼び出し元へ伝播させる。
 */
export class DuplicateOperationError extends SystemError {
  constructor(public readonly operationId: OperationId) {
    super(
      SystemErrorCode.DUPLICATE_OPERATION,
      `Operation ${operationId.toString()} is already active`,
      409
    );
    this.name = 'DuplicateOperationError';
  }
}

/**
 * 操作ID → AbortController の対応表。
 *
 * Node.js のイベントループ上では Map の読み書きが途中で割り込まれることはないため、
 * ロックは持たない。AbortController.abort() は abort リスナーを同期的に呼び出すので、
 * 対応表の更新を先に済ませてから abort する（リスナーから再入されても状態が崩れない）。
 */
export class ControllerRegistry {
  private map = new Map<OperationId, AbortController>();

  beginOperation(id: OperationId, baseSignal?: AbortSignal): OperationScope {
    if (this.map.has(id)) {
      throw new DuplicateOperationError(id);
    }

    const controller = new AbortController();

    // 親のキャンセルを子へ伝播させる
    const onBaseAbort = () => controller.abort(baseSignal?.reason);
    if (baseSignal?.aborted) {
      controller.abort(baseSignal.reason);
    } else {
      baseSignal?.addEventListener('abort', onBaseAbort, { once: true });
    }

    this.map.set(id, controller);

    let finished = false;
    const done = () => {
      if (finished) return;
      finished = true;
      baseSignal?.removeEventListener('abort', onBaseAbort);
      // 同じIDで後から登録された別の操作は消さない
      if (this.map.get(id) === controller) {
        this.map.delete(id);
      }
      controller.abort();
    };

    return { signal: controller.signal, done };
  }

  cancelOperation(id: OperationId, reason?: unknown): boolean {
    const c = this.map.get(id);
    if (!c) return false;
    this.map.delete(id);
    c.abort(reason);
    return true;
  }

  has(id: OperationId): boolean {
    return this.map.has(id);
  }

  activeIds(): OperationId[] {
    return Array.from(this.map.keys());
  }

  get size(): number {
    return this.map.size;
  }
}

export const controllerRegistry = new ControllerRegistry();
