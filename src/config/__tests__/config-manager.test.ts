/**
 * ConfigManager テスト
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigManager, getConfigDir } from '../config-manager';
import { DEFAULT_CONFIG } from '../defaults';
import { ErrorCodes } from '../../types';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;
  let manager: ConfigManager;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xvpn-config-'));
    configPath = path.join(tempDir, 'nested', 'config.json');
    manager = new ConfigManager({ configPath });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should use defaults when the file does not exist', async () => {
    await expect(manager.load()).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('should merge the file over the defaults', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify({ timeouts: { connect: 15000 }, log: { level: 'info' } }));

    const config = await manager.load();

    expect(config.timeouts).toEqual({ response: 500, handshake: 1000, connect: 15000, disconnect: 10000 });
    expect(config.log.level).toBe('info');
    expect(manager.getConfig()).toBe(config);
  });

  it('should reject invalid JSON', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '{');

    await expect(manager.load()).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
      message: 'Invalid JSON in config file',
    });
  });

  it('should reject invalid values', async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify({ polling: { connect: 0 } }));

    await expect(manager.load()).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
      message: 'Invalid configuration: polling.connect: Must be a number >= 1',
    });
  });

  it('should read nested values', async () => {
    await manager.load();

    expect(manager.getNested('timeouts.response')).toBe(500);
    expect(manager.getNested('polling')).toEqual({ dispatch: 20, connect: 20, disconnect: 200 });
    expect(manager.getNested('timeouts.unknown')).toBeUndefined();
    expect(manager.getNested('log.level.deeper')).toBeUndefined();
  });

  it('should set nested values and save them', async () => {
    await manager.load();

    await manager.setNested('timeouts.connect', 20000);

    const saved: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    expect(saved).toMatchObject({ timeouts: { connect: 20000 } });
    expect(manager.getNested('timeouts.connect')).toBe(20000);
  });

  it('should refuse to set an invalid value', async () => {
    await manager.load();

    await expect(manager.setNested('log.level', 'loud')).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
    });
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('should reset to defaults', async () => {
    await manager.load();
    await manager.setNested('manifestName', 'com.example.helper');

    await manager.reset();

    expect(manager.getConfig()).toEqual(DEFAULT_CONFIG);
    await expect(new ConfigManager({ configPath }).load()).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('should report the config path', () => {
    expect(manager.getConfigPath()).toBe(configPath);
  });
});

describe('getConfigDir', () => {
  it('should use XDG_CONFIG_HOME on Linux when set', () => {
    const previous = process.env.XDG_CONFIG_HOME;
    process.env.XDG_CONFIG_HOME = '/tmp/xdg';
    try {
      expect(getConfigDir('linux')).toBe(path.join('/tmp/xdg', 'xvpn-cli'));
    } finally {
      if (previous === undefined) {
        delete process.env.XDG_CONFIG_HOME;
      } else {
        process.env.XDG_CONFIG_HOME = previous;
      }
    }
  });

  it('should use Application Support on macOS', () => {
    expect(getConfigDir('darwin')).toBe(path.join(os.homedir(), 'Library', 'Application Support', 'xvpn-cli'));
  });
});
