import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { SIMULATOR_COMMANDS } from '@cellsim/domain';
import type { CommandBus } from '../commands/command-bus.js';

const commandSchema = z.object({
  command: z.enum(SIMULATOR_COMMANDS),
});

export function commandsRouter(bus: CommandBus): Router {
  const router = Router();

  /** POST /api/commands: queue a command as if it was typed at the console */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { command } = commandSchema.parse(req.body);
      if (!bus.submit(command, 'api')) {
        res.status(503).json({ error: 'command queue is closed' });
        return;
      }
      res.status(202).json({ accepted: command });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
