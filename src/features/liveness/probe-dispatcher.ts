import {
  ControllerRegistry,
  controllerRegistry,
  type OperationId,
} from '../../shared/abort/controller-registry';
import { APP_CONFIG } from '../../shared/config';
import { logDebug } from '../../shared/logger';
import { probeLiveness, type LivenessProbeOptions } from './liveness-prober';

/**
 * 操作IDごとに疎通確認を実行・キャンセルする窓口。
 *
 * startProbe は疎通確認が終わるまで（成功・キャンセル・形式不正のいずれか）待つ。
 * cancel は別経路から任意のタイミングで呼べる。終了済み・未知のIDは無視する。
 */
export class ProbeDispatcher {
  constructor(
    private readonly registry: ControllerRegistry = new ControllerRegistry(),
    private readonly probeOptions: LivenessProbeOptions = {},
  ) {}

  async startProbe(id: OperationId, address: string, baseSignal?: AbortSignal): Promise<void> {
    const { signal, done } = this.registry.beginOperation(id, baseSignal);
    logDebug('Probe started', { id: id.toString(), address });
    try {
      await probeLiveness(signal, address, this.probeOptions);
    } finally {
      done();
      logDebug('Probe finished', { id: id.toString(), address });
    }
  }

  cancel(id: OperationId): void {
    this.registry.cancelOperation(id);
  }

  activeIds(): OperationId[] {
    return this.registry.activeIds();
  }
}

export const probeDispatcher = new ProbeDispatcher(controllerRegistry, {
  intervalMs: APP_CONFIG.PROBE_INTERVAL_MS,
  logIntervalMs: APP_CONFIG.PROBE_LOG_INTERVAL_MS,
});
