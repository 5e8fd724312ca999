/**
 * Tests for the order command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { createOrderCommand } from '../../../../src/cli/commands/order.js';
import { logger } from '../../../../src/utils/logger.js';
import { createTestRoot, partitionOrderXml, removeTestRoot, writeAt } from '../../../helpers/fixture.js';

// Mock chalk
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    gray: (s: string) => s,
    blue: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
  },
}));

describe('order command', () => {
  let testDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function run(...args: string[]): Promise<unknown> {
    return createOrderCommand().parseAsync(['node', 'test', testDir, ...args, '--config', join(testDir, 'absent.yaml')]);
  }

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    testDir = createTestRoot('cli-order');
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setLevel('info');
    removeTestRoot(testDir);
  });

  it('prints the default order', async () => {
    await run();

    expect(printed()).toEqual([
      'system, vendor, odm, oem, product, system_ext',
      'Source: default order',
    ]);
  });

  it('prints an accepted override', async () => {
    writeAt(testDir, 'product/overlay/partition_order.xml', partitionOrderXml(
      ['product', 'system', 'vendor', 'odm', 'oem', 'system_ext']
    ));

    await run();

    expect(printed()).toEqual([
      'product, system, vendor, odm, oem, system_ext',
      'Source: partition order override',
    ]);
  });

  it('falls back to the default order for a rejected override', async () => {
    writeAt(testDir, 'product/overlay/partition_order.xml', partitionOrderXml(['product', 'system']));

    await run('--json');

    expect(JSON.parse(printed()[0] ?? '')).toEqual({
      partitions: ['system', 'vendor', 'odm', 'oem', 'product', 'system_ext'],
      overridden: false,
    });
  });

  it('honours partition_order_file from the settings file', async () => {
    writeAt(testDir, 'etc/order.xml', partitionOrderXml(['vendor', 'system', 'odm', 'oem', 'product', 'system_ext']));
    const settings = writeAt(testDir, 'settings.yaml', 'partition_order_file: etc/order.xml\n');

    await createOrderCommand().parseAsync(['node', 'test', testDir, '--config', settings]);

    expect(printed()[0]).toBe('vendor, system, odm, oem, product, system_ext');
  });
});
