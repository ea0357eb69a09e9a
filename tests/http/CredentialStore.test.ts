import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCredentialStore, MemoryCredentialStore } from '../../src/http/CredentialStore';

describe('MemoryCredentialStore', () => {
  it('should get, set and delete values', async () => {
    const store = new MemoryCredentialStore({ existing: 'value' });

    expect(await store.get('existing')).toBe('value');
    await store.set('other', 'test-secret');
    expect(await store.get('other')).toBe('test-secret');
    await store.delete('other');
    expect(await store.get('other')).toBeNull();
  });
});

describe('FileCredentialStore', () => {
  let directory: string;
  let store: FileCredentialStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'reel-cache-credentials-'));
    store = FileCredentialStore.inDirectory(directory);
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should return null when nothing is stored', async () => {
    expect(await store.get('catalog.apiKey')).toBeNull();
  });

  it('should persist values in a file only the owner can read', async () => {
    await store.set('catalog.apiKey', 'test-secret');

    const file = path.join(directory, 'credentials.json');
    const stat = await fs.stat(file);
    expect(stat.mode & 0o777).toBe(0o600);
    expect(JSON.parse(await fs.readFile(file, 'utf-8'))).toEqual({ 'catalog.apiKey': 'test-secret' });
    expect(await new FileCredentialStore(file).get('catalog.apiKey')).toBe('test-secret');
  });

  it('should remove the file when the last value is deleted', async () => {
    await store.set('catalog.apiKey', 'test-secret');
    await store.delete('catalog.apiKey');

    await expect(fs.stat(path.join(directory, 'credentials.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should ignore a malformed file', async () => {
    await fs.writeFile(path.join(directory, 'credentials.json'), '{"catalog.apiKey": 42}');

    expect(await store.get('catalog.apiKey')).toBeNull();
  });
});
