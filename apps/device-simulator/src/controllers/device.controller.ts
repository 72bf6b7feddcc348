import { Router } from 'express';
import type { Request, Response } from 'express';
import type { DeviceConfig } from '@cellsim/domain';

export function deviceRouter(readConfig: () => Readonly<DeviceConfig>): Router {
  const router = Router();

  /** GET /api/device/config: current shadow config */
  router.get('/config', (_req: Request, res: Response) => {
    res.json(readConfig());
  });

  return router;
}
