/**
 * Encrypted file storage for the ClickUp personal API token.
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { APP_NAME } from '../constants.js';
import { configDir, ensureConfigDir } from '../config/config.js';

export class CredentialStoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CredentialStoreError';
  }
}

const FILE_NAME = 'apikey.enc';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

interface StoredKey {
  apiKey: string;
  savedAt: number;
}

function isStoredKey(value: unknown): value is StoredKey {
  return (
    typeof value === 'object' &&
    value !== null &&
    'apiKey' in value &&
    typeof value.apiKey === 'string' &&
    'savedAt' in value &&
    typeof value.savedAt === 'number'
  );
}

/**
 * AES-256-GCM encrypted key file with a machine-derived key.
 *
 * File layout: IV (12 bytes) + auth tag (16 bytes) + ciphertext.
 */
export class ApiKeyStorage {
  readonly storagePath: string;
  private key: Buffer;

  constructor(storagePath?: string) {
    this.storagePath = storagePath ?? path.join(configDir(), FILE_NAME);
    this.key = ApiKeyStorage.deriveKey();
  }

  private static deriveKey(): Buffer {
    const machineId = [
      process.env.COMPUTERNAME || '',
      process.env.USER || process.env.USERNAME || '',
      os.hostname(),
      os.platform(),
      `${APP_NAME}-apikey`,
    ].join('');

    return crypto.createHash('sha256').update(machineId).digest();
  }

  save(apiKey: string): void {
    const trimmed = apiKey.trim();
    if (trimmed === '') {
      throw new CredentialStoreError('API key cannot be empty');
    }

    const stored: StoredKey = { apiKey: trimmed, savedAt: Date.now() };
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.key, iv);
    const encrypted = Buffer.concat([cipher.update(JSON.stringify(stored), 'utf8'), cipher.final()]);

    ensureConfigDir(path.dirname(this.storagePath));
    fs.writeFileSync(this.storagePath, Buffer.concat([iv, cipher.getAuthTag(), encrypted]), { mode: 0o600 });
  }

  /**
   * Decrypt the stored key. Returns null when nothing is stored.
   */
  load(): string | null {
    if (!fs.existsSync(this.storagePath)) {
      return null;
    }

    const combined = fs.readFileSync(this.storagePath);
    if (combined.length <= IV_LENGTH + TAG_LENGTH) {
      throw new CredentialStoreError(`read API key: ${this.storagePath} is truncated`);
    }

    let decoded: unknown;
    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', this.key, combined.subarray(0, IV_LENGTH));
      decipher.setAuthTag(combined.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH));
      const decrypted = Buffer.concat([
        decipher.update(combined.subarray(IV_LENGTH + TAG_LENGTH)),
        decipher.final(),
      ]);
      decoded = JSON.parse(decrypted.toString('utf8'));
    } catch (error) {
      throw new CredentialStoreError(`read API key: cannot decrypt ${this.storagePath}`, { cause: error });
    }

    if (!isStoredKey(decoded) || decoded.apiKey === '') {
      throw new CredentialStoreError(`read API key: unexpected contents in ${this.storagePath}`);
    }
    return decoded.apiKey;
  }

  /**
   * Remove the stored key. Returns false when there was none.
   */
  clear(): boolean {
    if (!fs.existsSync(this.storagePath)) {
      return false;
    }
    fs.unlinkSync(this.storagePath);
    return true;
  }

  has(): boolean {
    return fs.existsSync(this.storagePath);
  }
}
