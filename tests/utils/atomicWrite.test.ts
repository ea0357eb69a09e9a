import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { atomicWriteFile, isErrnoException, readFileIfExists } from '../../src/utils/atomicWrite';

describe('atomicWrite', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'reel-cache-atomic-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should write the file and leave no temporary file behind', async () => {
    const file = path.join(directory, 'state.json');

    await atomicWriteFile(file, '{"a":1}');
    await atomicWriteFile(file, '{"a":2}');

    expect(await fs.readFile(file, 'utf-8')).toBe('{"a":2}');
    expect(await fs.readdir(directory)).toEqual(['state.json']);
  });

  it('should create missing parent directories', async () => {
    const file = path.join(directory, 'a', 'b', 'state.json');

    await atomicWriteFile(file, 'x');

    expect(await readFileIfExists(file)).toBe('x');
  });

  it('should apply the requested file mode', async () => {
    const file = path.join(directory, 'secret.json');

    await atomicWriteFile(file, '{}', { mode: 0o600 });

    expect((await fs.stat(file)).mode & 0o777).toBe(0o600);
  });

  it('should remove the temporary file when the rename fails', async () => {
    const target = path.join(directory, 'occupied');
    await fs.mkdir(target);

    await expect(atomicWriteFile(target, 'x')).rejects.toThrow();
    expect(await fs.readdir(directory)).toEqual(['occupied']);
  });

  it('should read a missing file as null', async () => {
    expect(await readFileIfExists(path.join(directory, 'missing.json'))).toBeNull();
  });

  it('should rethrow errors other than a missing file', async () => {
    await expect(readFileIfExists(directory)).rejects.toThrow();
  });

  it('should recognise errno errors', () => {
    const error = Object.assign(new Error('gone'), { code: 'ENOENT' });

    expect(isErrnoException(error)).toBe(true);
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
  });
});
