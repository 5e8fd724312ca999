/**
 * Types for the partition model.
 */

/**
 * Filesystem layers that may contribute overlay packages.
 */
export enum PartitionName {
  System = 'system',
  Vendor = 'vendor',
  Odm = 'odm',
  Oem = 'oem',
  Product = 'product',
  SystemExt = 'system_ext',
}

/**
 * A partition rooted under a resolver root directory.
 */
export interface OverlayPartition {
  readonly name: PartitionName;
  /** Partition mount point, `<root>/<name>` */
  readonly rootPath: string;
  /** Directory scanned for overlay packages, `<rootPath>/overlay` */
  readonly overlayPath: string;
  /** Position in the compiled-in default order */
  readonly defaultRank: number;
}

/**
 * Every known partition, each exactly once, highest precedence last.
 */
export type PartitionOrder = readonly OverlayPartition[];

/**
 * Outcome of reading a partition-order override file.
 */
export interface PartitionOrderResult {
  /** The validated order when accepted, otherwise the caller's default order */
  order: PartitionOrder;
  accepted: boolean;
  /** Why the file was rejected */
  reason?: string;
}
