import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { loadConfig, parseConfig, resolveConfigPath } from '@/config/index.js';

describe('Config Loading', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-'));
    configPath = join(dir, 'config.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
  });

  it('should load an empty document with defaults', () => {
    writeFileSync(configPath, '{}');
    const config = loadConfig(configPath);

    expect(config.server.host).toBe('0.0.0.0');
    expect(config.server.port).toBe(3000);
    expect(config.logging.level).toBe('info');
    expect(config.env).toBe('development');
    // Drive defaults
    expect(config.drive.metadataRepository).toBe('metadata');
    expect(config.drive.repositoryPrefix).toBe('storage-');
    expect(config.drive.chunkSizeBytes).toBe(2 * 1024 * 1024);
    expect(config.drive.maxSizePerRepoBytes).toBe(20 * 1024 * 1024);
    expect(config.provisioning.minIntervalMs).toBe(1300);
    expect(config.transfer.retry.maxAttempts).toBe(5);
    expect(config.transfer.concurrency).toBe(4);
    expect(config.host).toEqual({ type: 'local', local: { rootDir: './data/repositories' } });
    expect(config.lease.redis).toBeUndefined();
  });

  it('should fill defaults inside a partially given section', () => {
    writeFileSync(
      configPath,
      JSON.stringify({
        server: { port: 8080 },
        logging: { level: 'debug' },
        drive: { chunkSizeBytes: 1024 },
        host: { type: 'github', github: { account: 'drive-owner' } },
      })
    );
    const config = loadConfig(configPath);

    expect(config.server.port).toBe(8080);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.logging.level).toBe('debug');
    expect(config.drive.chunkSizeBytes).toBe(1024);
    expect(config.drive.maxSizePerRepoBytes).toBe(20 * 1024 * 1024);
    expect(config.host).toMatchObject({
      type: 'github',
      github: { account: 'drive-owner', visibility: 'private', branch: 'main', gitBinary: 'git' },
    });
  });

  it('should throw ConfigMissingError for non-existent file', () => {
    try {
      loadConfig('/nonexistent/path/config.json');
      expect.fail('Expected error to be thrown');
    } catch (error) {
      expect((error as { code: string }).code).toBe('CONFIG_MISSING');
    }
  });

  it('should throw ConfigParseError for invalid JSON', () => {
    writeFileSync(configPath, 'not valid json');
    try {
      loadConfig(configPath);
      expect.fail('Expected error to be thrown');
    } catch (error) {
      expect((error as { code: string }).code).toBe('CONFIG_PARSE_ERROR');
    }
  });

  it('should reject a chunk size above the repository ceiling', () => {
    expect(() =>
      parseConfig({ drive: { chunkSizeBytes: 2048, maxSizePerRepoBytes: 1024 } })
    ).toThrow('drive.chunkSizeBytes: chunkSizeBytes must not exceed maxSizePerRepoBytes');
  });

  it('should reject a metadata repository named like a data repository', () => {
    expect(() => parseConfig({ drive: { metadataRepository: 'storage-0042' } })).toThrow(
      'metadataRepository collides with the data repository naming scheme'
    );
  });

  it('should reject a metadata repository name outside [A-Za-z0-9._-]', () => {
    expect(() => parseConfig({ drive: { metadataRepository: 'team/metadata' } })).toThrow(
      'drive.metadataRepository: Metadata repository name may only contain [A-Za-z0-9._-]'
    );
    expect(() => parseConfig({ drive: { metadataRepository: '' } })).toThrow(/drive\.metadataRepository/);
  });

  it('should reject an unknown host type', () => {
    try {
      parseConfig({ host: { type: 'ftp' } });
      expect.fail('Expected error to be thrown');
    } catch (error) {
      expect((error as { code: string }).code).toBe('CONFIG_INVALID');
    }
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => parseConfig({ drive: { chunkSizeBytes: 0 } })).toThrow(/drive\.chunkSizeBytes/);
  });
});

describe('resolveConfigPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers an explicit path', () => {
    vi.stubEnv('REPODRIVE_CONFIG', '/etc/repodrive/config.json');

    expect(resolveConfigPath('custom.json')).toBe(resolve('custom.json'));
  });

  it('falls back to REPODRIVE_CONFIG', () => {
    vi.stubEnv('REPODRIVE_CONFIG', '/etc/repodrive/config.json');

    expect(resolveConfigPath()).toBe('/etc/repodrive/config.json');
  });

  it('defaults to config/config.json under the working directory', () => {
    vi.stubEnv('REPODRIVE_CONFIG', '');

    expect(resolveConfigPath()).toBe(resolve(process.cwd(), 'config', 'config.json'));
  });
});
