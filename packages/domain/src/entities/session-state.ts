export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'degraded';

export type DisconnectReason =
  | 'client_initiated'
  | 'session_taken_over'
  | 'not_authorized'
  | 'bad_credentials'
  | 'keep_alive_timeout'
  | 'server_shutdown'
  | 'network_error'
  | 'unknown';

export interface DisconnectInfo {
  readonly reason: DisconnectReason;
  /** MQTT reason / return code, when the broker sent one. */
  readonly code?: number;
  readonly message?: string;
}

/** Reasons that mean another client holds this identity or the credentials were refused. */
const IDENTITY_CONFLICTS: ReadonlySet<DisconnectReason> = new Set([
  'session_taken_over',
  'not_authorized',
  'bad_credentials',
]);

export function isIdentityConflict(reason: DisconnectReason): boolean {
  return IDENTITY_CONFLICTS.has(reason);
}

/**
 * Map an MQTT v5 reason code (or v3.1.1 CONNACK return code) onto a
 * disconnect reason.
 */
export function reasonFromCode(code: number | undefined): DisconnectReason {
  switch (code) {
    case undefined:
      return 'unknown';
    case 0:
      return 'client_initiated';
    case 142:
      return 'session_taken_over';
    case 5:
    case 135:
      return 'not_authorized';
    case 4:
    case 134:
    case 140:
      return 'bad_credentials';
    case 141:
      return 'keep_alive_timeout';
    case 3:
    case 136:
    case 139:
      return 'server_shutdown';
    default:
      return 'unknown';
  }
}
