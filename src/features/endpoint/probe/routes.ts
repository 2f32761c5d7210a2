import { Router } from 'express';
import { requireS2SAuth } from '../../../shared/auth/s2s-jwt.middleware';
import { ProbeController } from './controller';

const router = Router();

/**
 * 疎通確認API
 *
 * 全エンドポイントにS2S JWT認証を適用
 */
router.get(
  '/probes',
  requireS2SAuth,
  ProbeController.listProbes.bind(ProbeController)
);

router.post(
  '/probes/:id',
  requireS2SAuth,
  ProbeController.startProbe.bind(ProbeController)
);

router.delete(
  '/probes/:id',
  requireS2SAuth,
  ProbeController.cancelProbe.bind(ProbeController)
);

export default router;
