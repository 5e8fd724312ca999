/**
 * Partition model: the fixed set of partitions and their default order.
 */
import * as path from 'node:path';
import { isPathInside } from '../../utils/file-system.js';
import { PartitionName, type OverlayPartition, type PartitionOrder } from './types.js';

export const OVERLAY_DIRECTORY = 'overlay';

export const DEFAULT_PARTITION_ORDER: readonly PartitionName[] = Object.freeze([
  PartitionName.System,
  PartitionName.Vendor,
  PartitionName.Odm,
  PartitionName.Oem,
  PartitionName.Product,
  PartitionName.SystemExt,
]);

const KNOWN_NAMES: ReadonlySet<string> = new Set<string>(Object.values(PartitionName));

export function isPartitionName(value: string): value is PartitionName {
  return KNOWN_NAMES.has(value);
}

/**
 * Create the partitions rooted under `rootDir`, in default order.
 */
export function createPartitions(rootDir: string): PartitionOrder {
  return Object.freeze(
    DEFAULT_PARTITION_ORDER.map((name, rank) => {
      const rootPath = path.join(rootDir, name);
      return Object.freeze({
        name,
        rootPath,
        overlayPath: path.join(rootPath, OVERLAY_DIRECTORY),
        defaultRank: rank,
      });
    })
  );
}

/**
 * Render an order as comma-joined partition names, e.g. `system, vendor, odm`.
 */
export function formatPartitionOrder(order: PartitionOrder): string {
  return order.map((partition) => partition.name).join(', ');
}

/**
 * Whether partitions appear in their default ranking.
 */
export function isDefaultOrder(order: PartitionOrder): boolean {
  return order.every((partition, index) => partition.defaultRank === index);
}

/**
 * Whether an overlay package at `filePath` belongs to the partition.
 */
export function partitionContainsOverlay(partition: OverlayPartition, filePath: string): boolean {
  return isPathInside(partition.overlayPath, filePath);
}
