import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer, type Server } from 'node:http';
import type { DeviceConfig, SessionState } from '@cellsim/domain';

import type { CommandBus } from './commands/command-bus.js';
import { commandsRouter } from './controllers/commands.controller.js';
import { deviceRouter } from './controllers/device.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface ControlApiDeps {
  bus: CommandBus;
  sessionState(): SessionState;
  deviceConfig(): Readonly<DeviceConfig>;
  /** request log format; `null` turns request logging off */
  logFormat?: string | null;
}

export function buildApp(deps: ControlApiDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  const logFormat = deps.logFormat === undefined ? 'tiny' : deps.logFormat;
  if (logFormat) app.use(morgan(logFormat));
  app.use(express.json({ limit: '16kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/commands', commandsRouter(deps.bus));
  app.use('/api/device', deviceRouter(deps.deviceConfig));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      session: deps.sessionState(),
      ts: new Date().toISOString(),
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

/** Listen on loopback; resolves once the port is bound. */
export function startControlServer(app: ReturnType<typeof express>, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => {
      server.off('error', reject);
      console.log(`[control] listening on http://127.0.0.1:${port}`);
      resolve(server);
    });
  });
}

export function stopControlServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
