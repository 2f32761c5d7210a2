import { z } from 'zod';
import type { OperationId } from '../../shared/abort/controller-registry';

export const MAX_OPERATION_ID: OperationId = 0xffff_ffff_ffff_ffffn;

/**
 * パスパラメータ等の10進文字列を符号なし64bitの操作IDに変換するスキーマ
 */
export const operationIdSchema = z
  .string()
  .regex(/^\d{1,20}$/, 'id must be an unsigned decimal integer')
  .transform((value) => BigInt(value))
  .refine((value) => value <= MAX_OPERATION_ID, {
    message: 'id must fit in 64 bits',
  });

export type { OperationId };
