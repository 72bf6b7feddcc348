/**
 * nRF Cloud REST adapter tests against an undici MockAgent.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { MockAgent } from 'undici';
import { DirectoryError } from '@cellsim/domain';
import { NrfCloudDirectoryAdapter } from '../nrf-cloud/nrf-cloud-directory.adapter.js';

const HOST = 'https://api.cloud.test';
const CERT = '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----\n';

let agent: MockAgent;
let directory: NrfCloudDirectoryAdapter;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
  directory = new NrfCloudDirectoryAdapter({ apiKey: 'test-key', apiHost: HOST, dispatcher: agent });
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  jest.restoreAllMocks();
  await agent.close();
});

function interceptAccount(prefix = 'prod/team-1/'): void {
  agent
    .get(HOST)
    .intercept({ path: '/v1/account', method: 'GET', headers: { authorization: 'Bearer test-key' } })
    .reply(200, { mqttEndpoint: 'mqtt.cloud.test', mqttTopicPrefix: prefix, teamId: 'team-1' });
}

// ═══════════════════════════════════════════════════════════════════════════════
// register
// ═══════════════════════════════════════════════════════════════════════════════

describe('register', () => {
  it('onboards and uses topics from the device shadow', async () => {
    agent.get(HOST).intercept({ path: '/v1/devices', method: 'POST' }).reply(202, '');
    interceptAccount();
    agent
      .get(HOST)
      .intercept({ path: '/v1/devices/sim-001', method: 'GET' })
      .reply(200, {
        id: 'sim-001',
        state: { desired: { pairing: { topics: { d2c: 'prod/t/m/d/sim-001/d2c', c2d: 'prod/t/m/d/sim-001/+/r' } } } },
        tags: ['simulator'],
      });

    const info = await directory.register('sim-001', CERT);

    expect(info).toEqual({
      deviceId: 'sim-001',
      brokerHost: 'mqtt.cloud.test',
      brokerPort: 8883,
      topicPrefix: 'prod/team-1/',
      stage: 'prod',
      topics: { d2c: 'prod/t/m/d/sim-001/d2c', c2d: 'prod/t/m/d/sim-001/+/r' },
    });
  });

  it('treats 409 as re-registration and derives topics when the shadow has none', async () => {
    agent.get(HOST).intercept({ path: '/v1/devices', method: 'POST' }).reply(409, 'Device already exists');
    interceptAccount();
    agent.get(HOST).intercept({ path: '/v1/devices/sim-001', method: 'GET' }).reply(200, { id: 'sim-001' });

    const info = await directory.register('sim-001', CERT);

    expect(info.topics).toEqual({ d2c: 'prod/team-1/m/d/sim-001/d2c', c2d: 'prod/team-1/m/d/sim-001/+/r' });
  });

  it('surfaces other onboarding failures as DirectoryError', async () => {
    agent.get(HOST).intercept({ path: '/v1/devices', method: 'POST' }).reply(400, 'bad csv');

    const err = await directory.register('sim-001', CERT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DirectoryError);
    expect(err).toMatchObject({ statusCode: 400, body: 'bad csv' });
  });
});

describe('lookup', () => {
  it('reads routing with GETs only', async () => {
    interceptAccount('dev/team-2/');
    agent.get(HOST).intercept({ path: '/v1/devices/sim-001', method: 'GET' }).reply(200, { id: 'sim-001' });

    const info = await directory.lookup('sim-001');

    expect(info).toEqual({
      deviceId: 'sim-001',
      brokerHost: 'mqtt.cloud.test',
      brokerPort: 8883,
      topicPrefix: 'dev/team-2/',
      stage: 'dev',
      topics: { d2c: 'dev/team-2/m/d/sim-001/d2c', c2d: 'dev/team-2/m/d/sim-001/+/r' },
    });
    agent.assertNoPendingInterceptors();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// fetchStatus / getAccount
// ═══════════════════════════════════════════════════════════════════════════════

describe('fetchStatus', () => {
  it('returns the device status', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/v1/devices/sim-001', method: 'GET' })
      .reply(200, { id: 'sim-001', connected: true, state: { reported: { a: 1 } }, tags: ['simulator'] });

    const status = await directory.fetchStatus('sim-001');

    expect(status.id).toBe('sim-001');
    expect(status.connected).toBe(true);
    expect(status.tags).toEqual(['simulator']);
    expect(status.state).toEqual({ reported: { a: 1 } });
  });

  it('maps 404 to DirectoryError with status and body', async () => {
    agent.get(HOST).intercept({ path: '/v1/devices/sim-404', method: 'GET' }).reply(404, 'not found');

    await expect(directory.fetchStatus('sim-404')).rejects.toMatchObject({
      name: 'DirectoryError',
      statusCode: 404,
      body: 'not found',
    });
  });

  it('reports a missing response with a null status code', async () => {
    await expect(directory.fetchStatus('sim-001')).rejects.toMatchObject({ statusCode: null });
  });

  it('rejects a body without an id', async () => {
    agent.get(HOST).intercept({ path: '/v1/devices/sim-001', method: 'GET' }).reply(200, { tags: [] });

    await expect(directory.fetchStatus('sim-001')).rejects.toBeInstanceOf(DirectoryError);
  });
});

describe('getAccount', () => {
  it('falls back to the tenant segment of the topic prefix for the team id', async () => {
    agent
      .get(HOST)
      .intercept({ path: '/v1/account', method: 'GET' })
      .reply(200, { mqttEndpoint: 'mqtt.cloud.test', mqttTopicPrefix: 'prod/tenant-9/' });

    const account = await directory.getAccount();

    expect(account).toEqual({
      mqttEndpoint: 'mqtt.cloud.test',
      mqttTopicPrefix: 'prod/tenant-9/',
      teamId: 'tenant-9',
    });
  });
});
