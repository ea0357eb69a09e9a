import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { atomicWriteFile, readFileIfExists } from '../utils/atomicWrite';
import LibLogger from '../logger';

const logger = LibLogger.get('CredentialStore');

/**
 * Key-value store for secrets. Only the catalog API key is kept today.
 */
export interface CredentialStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class MemoryCredentialStore implements CredentialStore {
  private readonly values = new Map<string, string>();

  public constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  public async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  public async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  public async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

const credentialFileSchema = z.record(z.string(), z.string());

/**
 * Credentials in a JSON file readable only by the owner (mode 0600).
 */
export class FileCredentialStore implements CredentialStore {
  public constructor(private readonly filePath: string) { }

  public static inDirectory(directory: string): FileCredentialStore {
    return new FileCredentialStore(path.join(directory, 'credentials.json'));
  }

  public async get(key: string): Promise<string | null> {
    const values = await this.readAll();
    return values[key] ?? null;
  }

  public async set(key: string, value: string): Promise<void> {
    const values = await this.readAll();
    values[key] = value;
    await this.writeAll(values);
  }

  public async delete(key: string): Promise<void> {
    const values = await this.readAll();
    if (!(key in values)) {
      return;
    }
    delete values[key];
    if (Object.keys(values).length === 0) {
      await fs.rm(this.filePath, { force: true });
      return;
    }
    await this.writeAll(values);
  }

  private async readAll(): Promise<Record<string, string>> {
    const raw = await readFileIfExists(this.filePath);
    if (raw === null) {
      return {};
    }
    try {
      return credentialFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      logger.error('Credential file is malformed, ignoring its contents', { filePath: this.filePath, error });
      return {};
    }
  }

  private async writeAll(values: Record<string, string>): Promise<void> {
    await atomicWriteFile(this.filePath, JSON.stringify(values, null, 2), { mode: 0o600 });
  }
}
