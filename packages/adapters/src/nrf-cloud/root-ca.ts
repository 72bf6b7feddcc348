import { fetch, type Dispatcher } from 'undici';
import { ProvisioningError, errorMessage, type RootCaSourcePort } from '@cellsim/domain';

export const AMAZON_ROOT_CA1_URL = 'https://www.amazontrust.com/repository/AmazonRootCA1.pem';

export interface HttpRootCaSourceOptions {
  url?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/** Downloads the broker's trust anchor. Anything short of a PEM body is fatal. */
export class HttpRootCaSource implements RootCaSourcePort {
  constructor(private readonly opts: HttpRootCaSourceOptions = {}) {}

  async fetchRootCa(): Promise<string> {
    const url = this.opts.url ?? AMAZON_ROOT_CA1_URL;
    const hint = `Check network access to ${new URL(url).host}, or place the root CA in the certs directory manually.`;
    let text: string;
    try {
      const res = await fetch(url, {
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 10_000),
        ...(this.opts.dispatcher ? { dispatcher: this.opts.dispatcher } : {}),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      text = await res.text();
    } catch (err) {
      throw new ProvisioningError(`root CA download failed: ${errorMessage(err)}`, hint, { cause: err });
    }
    if (!text.includes('-----BEGIN CERTIFICATE-----')) {
      throw new ProvisioningError('root CA download did not return a PEM certificate', hint);
    }
    return text;
  }
}
