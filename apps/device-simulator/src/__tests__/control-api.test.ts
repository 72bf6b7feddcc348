/**
 * Local control API: express app exercised with supertest.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import request from 'supertest';
import type { DeviceConfig, SessionState, SimulatorCommand } from '@cellsim/domain';
import { buildApp } from '../app.js';
import { CommandBus } from '../commands/command-bus.js';

let bus: CommandBus;
let seen: SimulatorCommand[];
let state: SessionState;
const config: DeviceConfig = { locationInterval: 300, counterEnable: false };

function app() {
  return buildApp({ bus, sessionState: () => state, deviceConfig: () => config, logFormat: null });
}

beforeEach(() => {
  bus = new CommandBus();
  seen = [];
  bus.setHandler(({ command }) => {
    seen.push(command);
  });
  state = 'connected';
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('GET /healthz', () => {
  it('reports the session state', async () => {
    state = 'degraded';
    const res = await request(app()).get('/healthz');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', session: 'degraded' });
    expect(typeof res.body.ts).toBe('string');
  });
});

describe('POST /api/commands', () => {
  it('queues a known command', async () => {
    const res = await request(app()).post('/api/commands').send({ command: 'alert' });
    await bus.drain();

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ accepted: 'alert' });
    expect(seen).toEqual(['alert']);
  });

  it('rejects an unknown command with validation details', async () => {
    const res = await request(app()).post('/api/commands').send({ command: 'reboot' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('validation_error');
    expect(res.body.details[0].path).toEqual(['command']);
    expect(seen).toEqual([]);
  });

  it('rejects a missing body', async () => {
    const res = await request(app()).post('/api/commands').send({});
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('answers 400 for malformed JSON', async () => {
    const res = await request(app())
      .post('/api/commands')
      .set('Content-Type', 'application/json')
      .send('{"command":');
    expect(res.status).toBe(400);
  });

  it('answers 503 once the queue is closed', async () => {
    bus.close();
    const res = await request(app()).post('/api/commands').send({ command: 'gnss' });

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ error: 'command queue is closed' });
  });
});

describe('GET /api/device/config', () => {
  it('returns the current device config', async () => {
    const res = await request(app()).get('/api/device/config');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ locationInterval: 300, counterEnable: false });
  });
});
