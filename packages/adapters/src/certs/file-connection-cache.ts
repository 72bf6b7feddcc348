import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { errorCode, type ConnectionInfo, type ConnectionInfoCachePort } from '@cellsim/domain';

const connectionInfoSchema = z.object({
  deviceId: z.string().min(1),
  brokerHost: z.string().min(1),
  brokerPort: z.number().int().positive(),
  topicPrefix: z.string(),
  stage: z.string(),
  topics: z.object({ d2c: z.string().min(1), c2d: z.string().min(1) }),
});

/** `<certsDir>/<id>.mqtt_info.json`, trusted only when its deviceId matches. */
export class FileConnectionCache implements ConnectionInfoCachePort {
  constructor(private readonly certsDir: string) {}

  filePath(deviceId: string): string {
    return path.join(this.certsDir, `${deviceId}.mqtt_info.json`);
  }

  async load(deviceId: string): Promise<ConnectionInfo | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(deviceId), 'utf8');
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        console.warn(`[cache] cannot read ${this.filePath(deviceId)}, ignoring`, err);
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn(`[cache] ${this.filePath(deviceId)} is not valid JSON, discarding`);
      return null;
    }

    const parsed = connectionInfoSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[cache] ${this.filePath(deviceId)} has unexpected shape, discarding`);
      return null;
    }
    if (parsed.data.deviceId !== deviceId) {
      console.warn(`[cache] cached connection info belongs to ${parsed.data.deviceId}, discarding`);
      return null;
    }
    return parsed.data;
  }

  async save(info: ConnectionInfo): Promise<void> {
    await mkdir(this.certsDir, { recursive: true, mode: 0o700 });
    await writeFile(this.filePath(info.deviceId), JSON.stringify(info, null, 2), { mode: 0o600 });
  }

  async clear(deviceId: string): Promise<void> {
    await rm(this.filePath(deviceId), { force: true });
  }
}
