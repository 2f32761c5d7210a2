import { Router } from 'express';
import probeRoutes from '../features/endpoint/probe/routes';

const router = Router();

// ヘルスチェック（認証不要）
router.get('/health', (_req, res) => {
  res.status(200).json({ status: 'ok' });
});

router.use('/', probeRoutes);

export default router;
