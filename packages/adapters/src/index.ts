// ─── nRF Cloud Adapters ───────────────────────────────────────────────────────
export { NrfCloudDirectoryAdapter } from './nrf-cloud/nrf-cloud-directory.adapter.js';
export type { NrfCloudDirectoryOptions } from './nrf-cloud/nrf-cloud-directory.adapter.js';
export { HttpRootCaSource, AMAZON_ROOT_CA1_URL } from './nrf-cloud/root-ca.js';

// ─── Credential Adapters ──────────────────────────────────────────────────────
export { OpensslCertificateGenerator } from './certs/openssl-certificate-generator.js';
export { FileCredentialStore, ROOT_CA_FILENAME } from './certs/file-credential-store.js';
export { FileConnectionCache } from './certs/file-connection-cache.js';

// ─── MQTT Adapter ─────────────────────────────────────────────────────────────
export { MqttTransportAdapter } from './mqtt/mqtt-transport.adapter.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export {
  DeterministicClock,
  SeededRng,
  gaussian,
  mathRng,
  systemClock,
} from './clock/deterministic-clock.js';
