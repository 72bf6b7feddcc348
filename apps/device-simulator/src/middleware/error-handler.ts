import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { SimulatorError } from '@cellsim/domain';

function httpStatusOf(err: Error): number {
  return 'status' in err && typeof err.status === 'number' ? err.status : 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof SimulatorError) {
    res.status(500).json({ error: err.message, stage: err.stage });
    return;
  }
  if (err instanceof Error) {
    res.status(httpStatusOf(err)).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
