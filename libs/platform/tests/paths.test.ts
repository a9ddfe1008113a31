import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import {
  DEFAULT_DATA_DIR,
  getDataDir,
  getAppsPath,
  getSettingsPath,
  ensureDataDir,
} from '../src/paths.js';

describe('paths.ts', () => {
  let tempDir: string;
  let dataDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'platform-paths-test-'));
    dataDir = path.join(tempDir, 'data');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('getDataDir', () => {
    it('should resolve a configured directory to an absolute path', () => {
      expect(getDataDir(dataDir)).toBe(dataDir);
    });

    it('should fall back to ./data for empty values', () => {
      expect(getDataDir('')).toBe(path.resolve(DEFAULT_DATA_DIR));
      expect(getDataDir('   ')).toBe(path.resolve(DEFAULT_DATA_DIR));
      expect(getDataDir()).toBe(path.resolve('data'));
    });
  });

  describe('file paths', () => {
    it('should return the bookmark store path', () => {
      expect(getAppsPath(dataDir)).toBe(path.join(dataDir, 'apps.json'));
    });

    it('should return the settings path', () => {
      expect(getSettingsPath(dataDir)).toBe(path.join(dataDir, 'settings.json'));
    });
  });

  describe('ensureDataDir', () => {
    it('should create the directory and return its path', async () => {
      const result = await ensureDataDir(dataDir);

      expect(result).toBe(dataDir);
      const stats = await fs.stat(dataDir);
      expect(stats.isDirectory()).toBe(true);
    });

    it('should succeed if the directory already exists', async () => {
      await fs.mkdir(dataDir, { recursive: true });
      await expect(ensureDataDir(dataDir)).resolves.toBe(dataDir);
    });
  });
});
