import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigError, configDir, readConfig, writeConfig } from '../config.js';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'clickup-cli-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('configDir', () => {
    it('should honour XDG_CONFIG_HOME on linux', () => {
      expect(configDir({ XDG_CONFIG_HOME: '/xdg' }, 'linux')).toBe(path.join('/xdg', 'clickup-cli'));
    });

    it('should fall back to ~/.config', () => {
      expect(configDir({}, 'linux')).toBe(path.join(os.homedir(), '.config', 'clickup-cli'));
    });

    it('should use Application Support on macOS', () => {
      expect(configDir({ XDG_CONFIG_HOME: '/xdg' }, 'darwin')).toBe(
        path.join(os.homedir(), 'Library', 'Application Support', 'clickup-cli')
      );
    });
  });

  it('should read an empty config when no file exists', () => {
    expect(readConfig(path.join(dir, 'missing'))).toEqual({});
  });

  it('should merge updates into the stored values', () => {
    writeConfig({ team_id: '111' }, dir);
    const merged = writeConfig({ workspace_id: '222' }, dir);

    expect(merged).toEqual({ team_id: '111', workspace_id: '222' });
    expect(fs.readFileSync(path.join(dir, 'config.json'), 'utf-8')).toBe(
      '{\n  "team_id": "111",\n  "workspace_id": "222"\n}\n'
    );
  });

  it('should create the directory on first write', () => {
    const nested = path.join(dir, 'a', 'b');

    writeConfig({ team_id: '1' }, nested);

    expect(readConfig(nested)).toEqual({ team_id: '1', workspace_id: undefined });
  });

  it('should ignore values of the wrong type', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '{"team_id": 42, "workspace_id": "9"}');

    expect(readConfig(dir)).toEqual({ team_id: undefined, workspace_id: '9' });
  });

  it('should reject malformed JSON', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '{team_id:');

    expect(() => readConfig(dir)).toThrow(ConfigError);
  });

  it('should reject a top-level array', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '[]');

    expect(() => readConfig(dir)).toThrow('parse config file: expected a JSON object');
  });
});
