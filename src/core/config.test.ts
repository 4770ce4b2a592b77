import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import {
  resolveSettings,
  initConfigFile,
  redactSettings,
  getConfigPath,
  starterConfig,
  CONFIG_FILE_NAME,
} from './config.js';
import { ConfigError, NotFoundError } from './errors.js';
import { makeTempDir } from '../testing/fakes.js';

describe('resolveSettings', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const writeConfig = (config: unknown) =>
    writeFile(path.join(root, CONFIG_FILE_NAME), JSON.stringify(config));

  it('falls back to defaults without a config file', async () => {
    const settings = await resolveSettings({ root, env: {} });

    expect(settings.root).toBe(path.resolve(root));
    expect(settings.assetsDir).toBe('images');
    expect(settings.batchSize).toBe(500);
    expect(settings.maxRetries).toBe(3);
    expect(settings.retryDelayMs).toBe(5000);
    expect(settings.assetExtensions).toEqual(['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.webp']);
    expect(settings.hub).toEqual({ repo: undefined, branch: 'main', endpoint: undefined, token: undefined });
    expect(settings.mirror.transports).toEqual(['ssh', 'https']);
    expect(settings.mirror.commitMessage).toBe('Update dataset files');
  });

  it('applies file, then environment, then explicit overrides', async () => {
    await writeConfig({ batchSize: 100, maxRetries: 5, retryDelayMs: 10, hub: { repo: 'file/repo' } });

    const fromFile = await resolveSettings({ root, env: {} });
    expect(fromFile.batchSize).toBe(100);
    expect(fromFile.hub.repo).toBe('file/repo');

    const env = { DATASET_SYNC_BATCH_SIZE: '50', DATASET_SYNC_HUB_REPO: 'env/repo', HF_TOKEN: 'test-secret' };
    const fromEnv = await resolveSettings({ root, env });
    expect(fromEnv.batchSize).toBe(50);
    expect(fromEnv.maxRetries).toBe(5);
    expect(fromEnv.hub.repo).toBe('env/repo');
    expect(fromEnv.hub.token).toBe('test-secret');

    const fromFlags = await resolveSettings({ root, env, overrides: { batchSize: 7, hubRepo: 'flag/repo' } });
    expect(fromFlags.batchSize).toBe(7);
    expect(fromFlags.hub.repo).toBe('flag/repo');
    expect(fromFlags.retryDelayMs).toBe(10);
  });

  it('normalizes extension lists', async () => {
    await writeConfig({ assetExtensions: ['PNG', '.Jpg'], ancillaryExtensions: ['md'] });

    const settings = await resolveSettings({ root, env: {} });

    expect(settings.assetExtensions).toEqual(['.png', '.jpg']);
    expect(settings.ancillaryExtensions).toEqual(['.md']);
  });

  it('resolves a relative mirror workspace against the root', async () => {
    await writeConfig({ mirror: { workDir: '../work' } });

    const settings = await resolveSettings({ root, env: {} });

    expect(settings.mirror.workDir).toBe(path.resolve(root, '../work'));
  });

  it('rejects a mirror workspace inside the project', async () => {
    await writeConfig({ mirror: { workDir: '.' } });
    await expect(resolveSettings({ root, env: {} })).rejects.toThrow(
      new ConfigError(`mirror.workDir must be outside the project root (${path.resolve(root)})`)
    );

    await writeConfig({ mirror: { workDir: 'build/mirror' } });
    await expect(resolveSettings({ root, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a mirror workspace that contains the project', async () => {
    await writeConfig({ mirror: { workDir: '..' } });
    await expect(resolveSettings({ root, env: {} })).rejects.toThrow(
      new ConfigError(`mirror.workDir must not contain the project root (${path.resolve(root, '..')})`)
    );
  });

  it('keeps dotenv files out of the mirror by default', async () => {
    const settings = await resolveSettings({ root, env: {} });
    expect(settings.excludeFiles).toEqual(['.env', '.env.*']);
  });

  it('treats empty environment variables as unset', async () => {
    const settings = await resolveSettings({
      root,
      env: { HF_TOKEN: '', HF_ENDPOINT: '', DATASET_SYNC_BATCH_SIZE: '', DATASET_SYNC_HUB_REPO: ' ' },
    });

    expect(settings.hub.token).toBeUndefined();
    expect(settings.hub.endpoint).toBeUndefined();
    expect(settings.hub.repo).toBeUndefined();
    expect(settings.batchSize).toBe(500);
  });

  it('rejects invalid values', async () => {
    await writeConfig({ batchSize: 0 });
    await expect(resolveSettings({ root, env: {} })).rejects.toThrow(/batchSize/);
  });

  it('rejects unknown keys', async () => {
    await writeConfig({ batchsize: 10 });
    await expect(resolveSettings({ root, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects malformed repository ids', async () => {
    await writeConfig({ mirror: { repo: 'no-slash' } });
    await expect(resolveSettings({ root, env: {} })).rejects.toThrow(/mirror\.repo: expected "owner\/name"/);
  });

  it('rejects malformed JSON', async () => {
    await writeFile(path.join(root, CONFIG_FILE_NAME), '{ nope');
    await expect(resolveSettings({ root, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects invalid environment values', async () => {
    await expect(
      resolveSettings({ root, env: { DATASET_SYNC_MAX_RETRIES: 'many' } })
    ).rejects.toThrow(/^environment: DATASET_SYNC_MAX_RETRIES/);
  });

  it('requires an explicitly named config file to exist', async () => {
    await expect(
      resolveSettings({ root, configPath: path.join(root, 'other.json'), env: {} })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('initConfigFile', () => {
  let root: string;

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes a starter config once', async () => {
    root = await makeTempDir();

    const filePath = await initConfigFile(root);

    expect(filePath).toBe(getConfigPath(path.resolve(root)));
    expect(JSON.parse(await readFile(filePath, 'utf-8'))).toEqual(starterConfig());
    await expect(initConfigFile(root)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('redactSettings', () => {
  it('masks the hub token', async () => {
    const root = await makeTempDir();
    const settings = await resolveSettings({ root, env: { HF_TOKEN: 'test-secret' } });

    expect(redactSettings(settings).hub.token).toBe('tes…****');
    expect(settings.hub.token).toBe('test-secret');
    await rm(root, { recursive: true, force: true });
  });
});
