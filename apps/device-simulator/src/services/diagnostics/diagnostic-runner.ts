import {
  DiagnosticStepError,
  errorMessage,
  type CloudDirectoryPort,
  type ConnectionInfo,
  type CertificateBundle,
  type SessionState,
} from '@cellsim/domain';
import type { DeviceSessionContext } from '../../context/device-session-context.js';
import type { ConnectionInfoResolver } from '../session/session-manager.js';

export type DiagnosticStepName = 'rest-status' | 'transport' | 'subscribe';

export const DIAGNOSTIC_STEPS: readonly DiagnosticStepName[] = ['rest-status', 'transport', 'subscribe'];

export interface DiagnosticStepResult {
  step: DiagnosticStepName;
  ok: boolean;
  detail: string;
  error?: DiagnosticStepError;
}

export interface DiagnosticReport {
  ok: boolean;
  steps: DiagnosticStepResult[];
  /** first failing step; nothing after it was attempted */
  rootCause: DiagnosticStepError | null;
}

/** What the probes need from a session. SessionManager satisfies it. */
export interface DiagnosticSession {
  readonly state: SessionState;
  readonly connectionInfo: ConnectionInfo | null;
  connect(bundle: CertificateBundle, info: ConnectionInfo): Promise<void>;
  subscribeControlTopic(): Promise<void>;
  disconnect(): Promise<void>;
}

export interface DiagnosticRunnerDeps {
  deviceId: string;
  directory: Pick<CloudDirectoryPort, 'fetchStatus'>;
  /** stored credentials only; null when the device was never provisioned */
  loadContext(): Promise<DeviceSessionContext | null>;
  resolver: ConnectionInfoResolver;
  /** build a session that does not reconnect on its own */
  createSession(context: DeviceSessionContext): DiagnosticSession;
}

export interface DiagnosticRunnerOptions {
  observationSeconds?: number;
  subscribeWatchSeconds?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Connectivity probes, strictly in order:
 *
 *   rest-status → transport (connect, hold without subscribing) → subscribe
 *
 * The first failing step is the root cause and ends the run.
 */
export class DiagnosticRunner {
  private readonly observationSeconds: number;
  private readonly subscribeWatchSeconds: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private session: DiagnosticSession | null = null;

  constructor(private readonly deps: DiagnosticRunnerDeps, opts: DiagnosticRunnerOptions = {}) {
    this.observationSeconds = opts.observationSeconds ?? 10;
    this.subscribeWatchSeconds = opts.subscribeWatchSeconds ?? 3;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  async run(): Promise<DiagnosticReport> {
    const steps: DiagnosticStepResult[] = [];
    let rootCause: DiagnosticStepError | null = null;

    try {
      for (const step of DIAGNOSTIC_STEPS) {
        console.log(`[diag] step ${steps.length + 1}/${DIAGNOSTIC_STEPS.length}: ${step}`);
        try {
          const detail = await this.execute(step);
          steps.push({ step, ok: true, detail });
          console.log(`[diag] ${step}: ok (${detail})`);
        } catch (err) {
          const error =
            err instanceof DiagnosticStepError ? err : new DiagnosticStepError(step, errorMessage(err), { cause: err });
          steps.push({ step, ok: false, detail: error.message, error });
          rootCause = error;
          console.error(`[diag] ${step}: FAILED (${error.message})`);
          break;
        }
      }
    } finally {
      await this.closeSession();
    }

    const report: DiagnosticReport = { ok: rootCause === null, steps, rootCause };
    console.log(
      report.ok ? '[diag] all checks passed' : `[diag] root cause: ${rootCause?.step ?? 'unknown'}`,
    );
    return report;
  }

  private execute(step: DiagnosticStepName): Promise<string> {
    switch (step) {
      case 'rest-status':
        return this.checkRestStatus();
      case 'transport':
        return this.checkTransport();
      case 'subscribe':
        return this.checkSubscribe();
    }
  }

  private async checkRestStatus(): Promise<string> {
    const status = await this.deps.directory.fetchStatus(this.deps.deviceId);
    const connected = status.connected === undefined ? 'unknown' : String(status.connected);
    console.log(`[diag]   state: ${JSON.stringify(status.state).slice(0, 300)}`);
    console.log(`[diag]   firmware: ${JSON.stringify(status.firmware ?? {})}`);
    console.log(`[diag]   tags: ${JSON.stringify(status.tags)}`);
    return `device ${status.id} found, connected=${connected}`;
  }

  private async checkTransport(): Promise<string> {
    const context = await this.deps.loadContext();
    if (!context) {
      throw new DiagnosticStepError('transport', 'no stored credentials; run once without --diag to provision');
    }
    const info = await this.deps.resolver.resolve(context);
    const session = this.deps.createSession(context);
    this.session = session;

    await session.connect(context.bundle, info);
    for (let second = 1; second <= this.observationSeconds; second++) {
      await this.sleep(1_000);
      console.log(`[diag]   ${second}s: ${session.state}`);
      if (session.state !== 'connected') {
        throw new DiagnosticStepError(
          'transport',
          `connection dropped after ${second}s without subscribing or publishing; check the certificate and IoT policy`,
        );
      }
    }
    return `connection held for ${this.observationSeconds}s`;
  }

  private async checkSubscribe(): Promise<string> {
    const { session } = this;
    if (!session) {
      throw new DiagnosticStepError('subscribe', 'no session to subscribe on');
    }
    await session.subscribeControlTopic();
    await this.sleep(this.subscribeWatchSeconds * 1_000);
    if (session.state !== 'connected') {
      throw new DiagnosticStepError(
        'subscribe',
        'connection dropped after subscribing; the device is not authorised for its c2d topic',
      );
    }
    return `subscribed to ${session.connectionInfo?.topics.c2d ?? 'the c2d topic'}`;
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session || session.state === 'disconnected') return;
    try {
      await session.disconnect();
    } catch (err) {
      console.warn(`[diag] closing session: ${errorMessage(err)}`);
    }
  }
}
