/**
 * Types for per-partition overlay policy.
 */
import type { OverlayPartition, PartitionName } from '../partitions/types.js';
import type { ParsedOverlayInfo } from '../scanner/types.js';

/**
 * Where a fragment's flags came from:
 * - `config`: an `<overlay>` declaration in the partition's config files
 * - `static`: a static overlay, always enabled and immutable
 * - `default`: discovered but not configured
 */
export type PolicyOrigin = 'config' | 'static' | 'default';

/**
 * Policy declared for one overlay package by one partition.
 */
export interface PolicyFragment {
  readonly packageName: string;
  readonly enabled: boolean;
  readonly mutable: boolean;
  readonly partition: PartitionName;
  readonly origin: PolicyOrigin;
  /** Config file holding the declaration, for `config` fragments */
  readonly declaredIn?: string;
  readonly overlay: ParsedOverlayInfo;
}

/**
 * Turns a partition's scanned overlays into policy fragments.
 */
export type PolicyParser = (
  partition: OverlayPartition,
  overlays: readonly ParsedOverlayInfo[]
) => PolicyFragment[];

export const DEFAULT_ENABLED_STATE = false;
export const DEFAULT_MUTABILITY = true;
