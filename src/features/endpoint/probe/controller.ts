import { Request, Response } from 'express';
import { z } from 'zod';
import { DuplicateOperationError } from '../../../shared/abort/controller-registry';
import { MAX_TIMER_DELAY_MS } from '../../../shared/config';
import { logError, logFatal, logInfo } from '../../../shared/logger';
import { operationIdSchema } from '../../liveness/operation-id';
import { probeDispatcher } from '../../liveness/probe-dispatcher';
import { MalformedAddressError, ProbeCancelledError } from '../../liveness/probe-errors';

/**
 * 疎通確認開始のリクエストスキーマ
 * address の形式（IPリテラル:ポート）は疎通確認側で検証する
 */
const startProbeSchema = z.object({
  address: z.string().min(1, 'address is required'),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
});

/**
 * 疎通確認コントローラー
 */
export class ProbeController {
  /**
   * POST /probes/{id}
   * 疎通確認を開始し、終了（成功・キャンセル・形式不正）まで待って結果を返す
   */
  static async startProbe(req: Request, res: Response): Promise<void> {
    const idResult = operationIdSchema.safeParse(req.params.id);
    if (!idResult.success) {
      res.status(400).json({
        error: 'Bad Request',
        message: 'Invalid probe id',
        details: idResult.error.issues,
      });
      return;
    }

    // リクエストボディのバリデーション
    const bodyResult = startProbeSchema.safeParse(req.body);
    if (!bodyResult.success) {
      res.status(400).json({
        error: 'Bad Request',
        message: 'Invalid request body',
        details: bodyResult.error.issues,
      });
      return;
    }

    const id = idResult.data;
    const { address, timeoutMs } = bodyResult.data;

    // クライアント切断・タイムアウトで疎通確認を打ち切る
    const lifetime = new AbortController();
    const onClose = () => {
      if (!res.writableEnded) {
        lifetime.abort(new Error('client disconnected'));
      }
    };
    res.on('close', onClose);
    const timer = timeoutMs !== undefined
      ? setTimeout(() => lifetime.abort(new Error('probe timed out')), timeoutMs)
      : undefined;

    try {
      await probeDispatcher.startProbe(id, address, lifetime.signal);
      logInfo('Address is live', { id: id.toString(), address });
      res.status(200).json({ id: id.toString(), address, status: 'live' });
    } catch (error: unknown) {
      if (error instanceof ProbeCancelledError) {
        res.status(200).json({ id: id.toString(), address, status: 'cancelled' });
        return;
      }

      if (error instanceof MalformedAddressError) {
        res.status(error.statusCode).json({
          error: 'Bad Request',
          message: error.message,
          code: error.code,
        });
        return;
      }

      // 実行中のIDの再利用は呼び出し側の契約違反
      if (error instanceof DuplicateOperationError) {
        logFatal('Probe id reused while still active', {
          id: id.toString(),
          address,
          code: error.code,
        });
        res.status(error.statusCode).json({
          error: 'Conflict',
          message: error.message,
          code: error.code,
        });
        return;
      }

      logError('Failed to run probe', {
        id: id.toString(),
        address,
        errorMessage: error instanceof Error ? error.message : String(error),
        errorStack: error instanceof Error ? error.stack : undefined,
      });
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'Failed to run probe',
      });
    } finally {
      clearTimeout(timer);
      res.off('close', onClose);
    }
  }

  /**
   * DELETE /probes/{id}
   * 実行中の疎通確認をキャンセルする（終了済み・未知のIDでも 204）
   */
  static cancelProbe(req: Request, res: Response): void {
    const idResult = operationIdSchema.safeParse(req.params.id);
    if (!idResult.success) {
      res.status(400).json({
        error: 'Bad Request',
        message: 'Invalid probe id',
        details: idResult.error.issues,
      });
      return;
    }

    probeDispatcher.cancel(idResult.data);
    res.status(204).end();
  }

  /**
   * GET /probes
   * 実行中の疎通確認IDの一覧
   */
  static listProbes(_req: Request, res: Response): void {
    res.status(200).json({
      probes: probeDispatcher.activeIds().map((id) => id.toString()),
    });
  }
}
