import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import {
  DEFAULT_FILE_SERVER,
  DEFAULT_SONOS_API_URL,
  loadConfig,
  parsePlayMode,
  resolveGatewayConfig,
} from '../config.js';

let dir: string;
let configPath: string;

beforeEach(() => {
  chalk.level = 0;
  dir = mkdtempSync(join(tmpdir(), 'sonos-gateway-'));
  configPath = join(dir, 'config.json');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('resolveGatewayConfig', () => {
  it('applies the defaults to unset fields', () => {
    expect(resolveGatewayConfig({})).toStrictEqual({
      apiUrl: 'http://192.168.0.5:5005',
      fileServer: '192.168.0.6/mp3',
      playMode: 'share',
    });
  });

  it('drops trailing slashes from the API URL', () => {
    expect(resolveGatewayConfig({ apiUrl: 'http://sonos.local:5005//' }).apiUrl).toBe(
      'http://sonos.local:5005'
    );
  });

  it('parses the request timeout', () => {
    expect(resolveGatewayConfig({ requestTimeoutMs: '2500' }).requestTimeoutMs).toBe(2500);
    expect(() => resolveGatewayConfig({ requestTimeoutMs: '0' })).toThrow(
      'Request timeout must be a positive number of milliseconds, got "0"'
    );
    expect(() => resolveGatewayConfig({ requestTimeoutMs: 'soon' })).toThrow(/got "soon"/);
  });
});

describe('parsePlayMode', () => {
  it('accepts known modes in any case', () => {
    expect(parsePlayMode('share')).toBe('share');
    expect(parsePlayMode('CLIP')).toBe('clip');
  });

  it('rejects unknown modes', () => {
    expect(() => parsePlayMode('stream')).toThrow(
      'Unknown play mode "stream" (expected one of: share, clip)'
    );
  });
});

describe('loadConfig', () => {
  it('uses the defaults without environment or config file', () => {
    const config = loadConfig({}, configPath);

    expect(config).toStrictEqual({
      apiUrl: DEFAULT_SONOS_API_URL,
      fileServer: DEFAULT_FILE_SERVER,
      playMode: 'share',
      requestTimeoutMs: undefined,
      defaultRoom: undefined,
    });
  });

  it('reads the config file', () => {
    writeFileSync(
      configPath,
      JSON.stringify({
        sonosApiUrl: 'http://10.0.0.2:5005',
        fileServer: 'nas.local/music',
        playMode: 'clip',
        defaultRoom: 'Kitchen',
        requestTimeoutMs: 4000,
      })
    );

    expect(loadConfig({}, configPath)).toStrictEqual({
      apiUrl: 'http://10.0.0.2:5005',
      fileServer: 'nas.local/music',
      playMode: 'clip',
      requestTimeoutMs: 4000,
      defaultRoom: 'Kitchen',
    });
  });

  it('prefers the environment over the config file', () => {
    writeFileSync(
      configPath,
      JSON.stringify({ sonosApiUrl: 'http://10.0.0.2:5005', defaultRoom: 'Kitchen' })
    );

    const config = loadConfig(
      {
        SONOS_API_URL: 'http://10.0.0.9:5005',
        SONOS_FILE_SERVER: 'fileserver/share',
        SONOS_PLAY_MODE: 'clip',
        SONOS_DEFAULT_ROOM: 'Office',
      },
      configPath
    );

    expect(config.apiUrl).toBe('http://10.0.0.9:5005');
    expect(config.fileServer).toBe('fileserver/share');
    expect(config.playMode).toBe('clip');
    expect(config.defaultRoom).toBe('Office');
  });

  it('ignores a config file that is not valid JSON', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(configPath, '{ sonosApiUrl: ');

    const config = loadConfig({}, configPath);

    expect(config.apiUrl).toBe(DEFAULT_SONOS_API_URL);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain(`[Config] Ignoring ${configPath}: `);
  });

  it('ignores a config file that is not an object', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(configPath, '["http://10.0.0.2:5005"]');

    expect(loadConfig({}, configPath).apiUrl).toBe(DEFAULT_SONOS_API_URL);
    expect(warn).toHaveBeenCalledWith(`[Config] Ignoring ${configPath}: expected a JSON object`);
  });

  it('does not validate the play mode or timeout itself', () => {
    const config = loadConfig(
      { SONOS_PLAY_MODE: 'stream', SONOS_REQUEST_TIMEOUT_MS: '-5' },
      configPath
    );

    expect(config.playMode).toBe('stream');
    expect(config.requestTimeoutMs).toBe('-5');
    expect(() => resolveGatewayConfig(config)).toThrow('Unknown play mode "stream"');
  });
});
