import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ApiKeyStorage, CredentialStoreError } from '../apikey-storage.js';

describe('ApiKeyStorage', () => {
  let dir: string;
  let storage: ApiKeyStorage;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clickup-cli-key-'));
    storage = new ApiKeyStorage(path.join(dir, 'nested', 'apikey.enc'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return null when nothing is stored', () => {
    expect(storage.load()).toBeNull();
    expect(storage.has()).toBe(false);
  });

  it('should round-trip a trimmed key', () => {
    storage.save('  pk_test_key \n');

    expect(storage.has()).toBe(true);
    expect(storage.load()).toBe('pk_test_key');
    expect(new ApiKeyStorage(storage.storagePath).load()).toBe('pk_test_key');
  });

  it('should not write the key in clear text', () => {
    storage.save('pk_test_key');

    expect(fs.readFileSync(storage.storagePath).includes('pk_test_key')).toBe(false);
  });

  it('should refuse an empty key', () => {
    expect(() => storage.save('   ')).toThrow('API key cannot be empty');
    expect(storage.has()).toBe(false);
  });

  it('should report a truncated file', () => {
    fs.mkdirSync(path.dirname(storage.storagePath), { recursive: true });
    fs.writeFileSync(storage.storagePath, Buffer.alloc(10));

    expect(() => storage.load()).toThrow(CredentialStoreError);
  });

  it('should report a tampered file', () => {
    storage.save('pk_test_key');
    const bytes = fs.readFileSync(storage.storagePath);
    bytes[bytes.length - 1] ^= 0xff;
    fs.writeFileSync(storage.storagePath, bytes);

    expect(() => storage.load()).toThrow(`read API key: cannot decrypt ${storage.storagePath}`);
  });

  it('should clear the stored key once', () => {
    storage.save('pk_test_key');

    expect(storage.clear()).toBe(true);
    expect(storage.clear()).toBe(false);
    expect(storage.load()).toBeNull();
  });
});
