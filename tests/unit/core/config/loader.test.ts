/**
 * Tests for settings loading and resolver wiring.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  DEFAULT_SETTINGS_PATH,
  getDefaultSettings,
  loadSettings,
  mergeSettings,
  toResolveOptions,
  toScannerFactory,
} from '../../../../src/core/config/loader.js';
import { createPartitions } from '../../../../src/core/partitions/model.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { createTestRoot, overlayInfo, removeTestRoot, writeAt } from '../../../helpers/fixture.js';

describe('settings loader', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTestRoot('settings');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeTestRoot(testDir);
  });

  describe('getDefaultSettings', () => {
    it('returns the built-in locations', () => {
      const settings = getDefaultSettings();

      expect(settings.partition_order_file).toBe(join('product', 'overlay', 'partition_order.xml'));
      expect(settings.policy.config_file).toBe(join('config', 'config.xml'));
      expect(settings.policy.max_merge_depth).toBe(5);
      expect(settings.scan.include).toEqual(['*.overlay.yaml', '*/*.overlay.yaml']);
      expect(settings.scan.exclude).toEqual(['config/**']);
      expect(settings.log_level).toBe('info');
    });
  });

  describe('loadSettings', () => {
    it('returns defaults when no settings file exists', async () => {
      expect(await loadSettings(testDir)).toEqual(getDefaultSettings());
    });

    it('merges a settings file over the defaults', async () => {
      writeAt(testDir, DEFAULT_SETTINGS_PATH, [
        'partition_order_file: etc/order.xml',
        'policy:',
        '  max_merge_depth: 2',
        'log_level: warn',
      ].join('\n'));

      const settings = await loadSettings(testDir);

      expect(settings.partition_order_file).toBe('etc/order.xml');
      expect(settings.policy).toEqual({ config_file: join('config', 'config.xml'), max_merge_depth: 2 });
      expect(settings.scan.exclude).toEqual(['config/**']);
      expect(settings.log_level).toBe('warn');
    });

    it('reads a custom settings path', async () => {
      writeAt(testDir, 'conf/resolver.yaml', 'scan:\n  include:\n    - "**/*.overlay.yaml"\n');

      const settings = await loadSettings(testDir, 'conf/resolver.yaml');

      expect(settings.scan.include).toEqual(['**/*.overlay.yaml']);
    });

    it('wraps invalid settings in a ConfigError', async () => {
      writeAt(testDir, DEFAULT_SETTINGS_PATH, 'log_level: loud\n');

      await expect(loadSettings(testDir)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadSettings(testDir)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
    });

    it('wraps unparseable YAML in a ConfigError', async () => {
      writeAt(testDir, DEFAULT_SETTINGS_PATH, 'policy: [unclosed\n');

      await expect(loadSettings(testDir)).rejects.toThrow(/^Failed to load settings from /);
    });
  });

  describe('mergeSettings', () => {
    it('fills in missing sections', () => {
      const settings = mergeSettings({ log_level: 'debug' });

      expect(settings.log_level).toBe('debug');
      expect(settings.policy.max_merge_depth).toBe(5);
    });
  });

  describe('toResolveOptions', () => {
    it('passes the order file through', () => {
      const options = toResolveOptions(mergeSettings({ partition_order_file: 'etc/order.xml' }));

      expect(options.partitionOrderFile).toBe('etc/order.xml');
    });

    it('builds a policy parser reading the configured file', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const settings = mergeSettings({ policy: { config_file: 'policy.xml', max_merge_depth: 5 } });
      const vendor = createPartitions(testDir)[1];
      writeAt(testDir, 'vendor/overlay/policy.xml', '<config>\n  <overlay package="a" enabled="true"/>\n</config>\n');

      const fragments = toResolveOptions(settings).policyParser?.(vendor, [
        overlayInfo('a', join(vendor.overlayPath, 'a.overlay.yaml')),
      ]);

      expect(fragments?.[0]).toMatchObject({ packageName: 'a', enabled: true, origin: 'config' });
    });
  });

  describe('toScannerFactory', () => {
    it('scans with the configured globs', () => {
      const settings = mergeSettings({ scan: { include: ['nested/*.overlay.yaml'], exclude: [] } });
      writeAt(testDir, 'nested/a.overlay.yaml', 'package: com.example.a\ntarget: com.example.app\n');
      writeAt(testDir, 'b.overlay.yaml', 'package: com.example.b\ntarget: com.example.app\n');

      const found = [...toScannerFactory(settings)().scanDir(testDir)];

      expect(found.map((overlay) => overlay.packageName)).toEqual(['com.example.a']);
    });
  });
});
