import { Router } from 'express';
import { CFP_CORE_VERSION } from '@core/index';
import type { ApiResponse } from '@shared/types';

const router = Router();

router.get('/health', (_req, res) => {
  const response: ApiResponse<{ status: string; version: string; timestamp: string }> = {
    success: true,
    data: {
      status: 'ok',
      version: CFP_CORE_VERSION,
      timestamp: new Date().toISOString(),
    },
  };
  res.json(response);
});

export default router;
