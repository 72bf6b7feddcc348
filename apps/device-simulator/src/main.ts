#!/usr/bin/env node
import 'dotenv/config';
import {
  FileConnectionCache,
  FileCredentialStore,
  HttpRootCaSource,
  MqttTransportAdapter,
  NrfCloudDirectoryAdapter,
  OpensslCertificateGenerator,
  mathRng,
  systemClock,
} from '@cellsim/adapters';
import { SimulatorError, errorMessage, type DeviceIdentity } from '@cellsim/domain';

import { buildApp, startControlServer, stopControlServer } from './app.js';
import { CommandBus } from './commands/command-bus.js';
import { KEY_HELP, attachKeyboard } from './commands/keyboard.js';
import { loadConfig, type SimulatorConfig } from './config/simulator-config.js';
import { NormalRunner } from './runners/normal-runner.js';
import { CertificateStore } from './services/certificates/certificate-store.js';
import { ControlHandler } from './services/control/control-handler.js';
import { DiagnosticRunner } from './services/diagnostics/diagnostic-runner.js';
import { ReadOnlyConnectionCache, ReadOnlyConnectionResolver } from './services/diagnostics/read-only-routing.js';
import { Provisioner } from './services/provisioning/provisioner.js';
import { RouteInterpolator } from './services/route/route-interpolator.js';
import { SessionManager } from './services/session/session-manager.js';
import { TelemetryScheduler } from './services/telemetry/telemetry-scheduler.js';
import { TemperatureModel } from './services/telemetry/temperature-model.js';

function buildProvisioning(config: SimulatorConfig) {
  const directory = new NrfCloudDirectoryAdapter({
    apiKey: config.apiKey,
    apiHost: config.apiHost,
    mqttPort: config.mqttPort,
    timeoutMs: config.requestTimeoutMs,
  });
  const cache = new FileConnectionCache(config.certsDir);
  const certificates = new CertificateStore(
    new FileCredentialStore(config.certsDir),
    new OpensslCertificateGenerator(),
    new HttpRootCaSource({ timeoutMs: config.requestTimeoutMs }),
  );
  const provisioner = new Provisioner(certificates, directory, cache);
  return { directory, cache, certificates, provisioner };
}

async function runNormal(config: SimulatorConfig, identity: DeviceIdentity): Promise<void> {
  const { provisioner } = buildProvisioning(config);
  const context = await provisioner.prepare(identity);
  const info = context.connectionInfo ?? (await provisioner.resolve(context));

  const session = new SessionManager(new MqttTransportAdapter(), context, provisioner, {
    keepaliveSeconds: config.keepaliveSeconds,
  });
  await session.connect(context.bundle, info);

  const route = new RouteInterpolator(mathRng);
  const scheduler = new TelemetryScheduler(
    session,
    route,
    new TemperatureModel(mathRng, { base: config.temperatureBase, variation: config.temperatureVariation }),
    systemClock,
    { locationInterval: config.locationIntervalSeconds, counterEnable: false },
    { temperatureIntervalSeconds: config.temperatureIntervalSeconds },
  );
  const control = new ControlHandler(
    config.deviceId,
    {
      publishRaw: (m) => session.publishRaw(m),
      applyConfig: (patch) => scheduler.applyConfig(patch),
    },
    systemClock,
  );
  const bus = new CommandBus();
  const { controlPort } = config;

  const runner = new NormalRunner({
    session,
    scheduler,
    control,
    route,
    bus,
    clock: systemClock,
    appVersion: config.appVersion,
    startKeyboard: () => {
      console.log(`\nCommands:\n${KEY_HELP}\n`);
      return attachKeyboard(bus);
    },
    ...(controlPort !== undefined
      ? {
          startControlApi: () =>
            startControlServer(
              buildApp({
                bus,
                sessionState: () => session.state,
                deviceConfig: () => scheduler.deviceConfig,
              }),
              controlPort,
            ),
          stopControlApi: stopControlServer,
        }
      : {}),
  });

  const quit = () => {
    if (!bus.submit('quit', 'internal')) console.log('[runner] already shutting down');
  };
  process.once('SIGINT', quit);
  process.once('SIGTERM', quit);

  await runner.run();
}

async function runDiagnostics(config: SimulatorConfig, identity: DeviceIdentity): Promise<boolean> {
  const { directory, cache, certificates } = buildProvisioning(config);
  // nothing here may onboard the device or rewrite its cached routing
  const provisioner = new Provisioner(certificates, directory, new ReadOnlyConnectionCache(cache));
  const resolver = new ReadOnlyConnectionResolver(directory);
  const runner = new DiagnosticRunner({
    deviceId: identity.deviceId,
    directory,
    loadContext: () => provisioner.loadExisting(identity),
    resolver,
    createSession: (context) =>
      new SessionManager(new MqttTransportAdapter(), context, resolver, {
        keepaliveSeconds: config.keepaliveSeconds,
        autoReconnect: false,
        backoff: { baseMs: 1_000, capMs: 1_000, maxAttempts: 1 },
      }),
  });
  const report = await runner.run();
  return report.ok;
}

function reportFatal(err: unknown): void {
  if (err instanceof SimulatorError) {
    console.error(`[${err.stage}] ${err.message}`);
    if (err.hint) console.error(`  hint: ${err.hint}`);
    return;
  }
  console.error(`[fatal] ${errorMessage(err)}`);
}

async function main(argv: readonly string[]): Promise<number> {
  const config = loadConfig();
  const identity: DeviceIdentity = { deviceId: config.deviceId, apiKey: config.apiKey };

  console.log('='.repeat(60));
  console.log('  Cellular tracker simulator (nRF9151-class) for nRF Cloud');
  console.log('='.repeat(60));

  if (argv.includes('--diag')) {
    console.log('[diag] running connection diagnostics\n');
    return (await runDiagnostics(config, identity)) ? 0 : 1;
  }
  await runNormal(config, identity);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    reportFatal(err);
    process.exit(1);
  },
);
