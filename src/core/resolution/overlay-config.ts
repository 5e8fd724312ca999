/**
 * Read-only view over one resolution run.
 */
import { compareCodeUnits } from '../../utils/string.js';
import { isDefaultOrder } from '../partitions/model.js';
import { sortPartitions } from '../partitions/order-validator.js';
import type { OverlayPartition, PartitionOrder } from '../partitions/types.js';
import { DEFAULT_ENABLED_STATE, DEFAULT_MUTABILITY } from '../policy/types.js';
import type { OverlayScannerFactory, PackageProvider } from '../scanner/types.js';
import { resolve } from './engine.js';
import type { Configuration, ConfigurationTable, ResolutionResult, ResolveOptions } from './types.js';

/**
 * Resolves eagerly on construction and answers policy queries from the
 * resulting snapshot.
 *
 * @example
 * ```ts
 * const config = new OverlayConfig('/', createDirectoryScannerFactory(), null);
 * config.getPartitionOrder(); // "system, vendor, odm, oem, product, system_ext"
 * config.isEnabled('com.example.overlay');
 * ```
 */
export class OverlayConfig {
  private readonly result: ResolutionResult;

  constructor(
    rootDir: string,
    scannerFactory: OverlayScannerFactory | null,
    packageProvider: PackageProvider | null,
    options: ResolveOptions = {}
  ) {
    this.result = resolve(rootDir, scannerFactory, packageProvider, options);
  }

  getConfiguration(packageName: string): Configuration | undefined {
    return this.result.configurations.get(packageName);
  }

  getConfigurations(): ConfigurationTable {
    return this.result.configurations;
  }

  /**
   * Effective partition order as comma-joined names.
   */
  getPartitionOrder(): string {
    return this.result.partitionOrder;
  }

  getPartitions(): PartitionOrder {
    return this.result.partitions;
  }

  /**
   * Whether a partition-order override file was accepted.
   */
  isPartitionOrderOverridden(): boolean {
    return this.result.orderAccepted;
  }

  isDefaultPartitionOrder(): boolean {
    return isDefaultOrder(this.result.partitions);
  }

  isEnabled(packageName: string): boolean {
    return this.getConfiguration(packageName)?.enabled ?? DEFAULT_ENABLED_STATE;
  }

  isMutable(packageName: string): boolean {
    return this.getConfiguration(packageName)?.mutable ?? DEFAULT_MUTABILITY;
  }

  /**
   * Package names ordered by configIndex, ties broken by name.
   */
  getSortedOverlays(): string[] {
    return [...this.result.configurations.values()]
      .sort((a, b) => a.configIndex - b.configIndex || compareCodeUnits(a.packageName, b.packageName))
      .map((configuration) => configuration.packageName);
  }

  /**
   * Reorder `partitions` in place from an override file.
   * Returns false, leaving `partitions` untouched, when the file is rejected.
   */
  sortPartitions(overrideFilePath: string, partitions: OverlayPartition[]): boolean {
    return sortPartitions(overrideFilePath, partitions);
  }

  /**
   * Human-readable listing for diagnostics.
   */
  dump(): string {
    const lines = [`Partition order: ${this.result.partitionOrder}`];
    for (const name of this.getSortedOverlays()) {
      const configuration = this.result.configurations.get(name);
      if (!configuration) continue;
      lines.push(
        `${configuration.packageName}: partition=${configuration.partition}` +
        ` configIndex=${configuration.configIndex}` +
        ` enabled=${configuration.enabled} mutable=${configuration.mutable}` +
        ` origin=${configuration.origin}`
      );
    }
    return lines.join('\n');
  }
}
