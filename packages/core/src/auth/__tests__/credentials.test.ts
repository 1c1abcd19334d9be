import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeConfig } from '../../config/config.js';
import { ApiKeyStorage } from '../apikey-storage.js';
import { MissingCredentialsError, resolveApiKey, resolveTeamId, resolveWorkspaceId } from '../credentials.js';

describe('credential resolution', () => {
  let dir: string;
  let storage: ApiKeyStorage;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clickup-cli-creds-'));
    storage = new ApiKeyStorage(path.join(dir, 'apikey.enc'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('resolveApiKey', () => {
    it('should prefer the environment over storage', () => {
      storage.save('stored-key');

      expect(resolveApiKey(storage, { CLICKUP_API_KEY: ' test-secret ' })).toEqual({
        apiKey: 'test-secret',
        source: 'env',
      });
    });

    it('should fall back to the stored key', () => {
      storage.save('stored-key');

      expect(resolveApiKey(storage, { CLICKUP_API_KEY: '' })).toEqual({ apiKey: 'stored-key', source: 'storage' });
    });

    it('should explain how to add a key when none is found', () => {
      expect(() => resolveApiKey(storage, {})).toThrow(
        new MissingCredentialsError('no credentials found; run: clickup-cli auth set-key')
      );
    });
  });

  describe('resolveTeamId', () => {
    it('should take the flag first', () => {
      writeConfig({ team_id: 'from-config' }, dir);

      expect(resolveTeamId(' 42 ', { env: { CLICKUP_TEAM_ID: '7' }, configDir: dir })).toBe('42');
    });

    it('should take the environment before the config file', () => {
      writeConfig({ team_id: 'from-config' }, dir);

      expect(resolveTeamId(undefined, { env: { CLICKUP_TEAM_ID: '7' }, configDir: dir })).toBe('7');
      expect(resolveTeamId('', { env: {}, configDir: dir })).toBe('from-config');
    });

    it('should fail when no team is configured', () => {
      expect(() => resolveTeamId(undefined, { env: {}, configDir: dir })).toThrow(
        'no team ID configured; run: clickup-cli auth set-team <TEAM_ID>'
      );
    });
  });

  describe('resolveWorkspaceId', () => {
    it('should be empty when nothing is configured', () => {
      expect(resolveWorkspaceId(undefined, { env: {}, configDir: dir })).toBe('');
    });

    it('should read the config file', () => {
      writeConfig({ workspace_id: 'ws-1' }, dir);

      expect(resolveWorkspaceId(undefined, { env: {}, configDir: dir })).toBe('ws-1');
    });
  });
});
