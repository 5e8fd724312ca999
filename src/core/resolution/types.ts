/**
 * Types for overlay configuration resolution.
 */
import type { PartitionName, PartitionOrder } from '../partitions/types.js';
import type { PolicyOrigin, PolicyParser } from '../policy/types.js';

/**
 * Final policy for one overlay package.
 */
export interface Configuration {
  readonly packageName: string;
  readonly enabled: boolean;
  readonly mutable: boolean;
  /**
   * Position of the owning partition in the effective partition order.
   * Packages from the same partition share an index.
   */
  readonly configIndex: number;
  readonly partition: PartitionName;
  readonly origin: PolicyOrigin;
  readonly declaredIn?: string;
  readonly targetPackageName: string;
  readonly priority: number;
  readonly path: string;
}

export type ConfigurationTable = ReadonlyMap<string, Configuration>;

export interface ResolveOptions {
  /** Override file path relative to the root directory */
  partitionOrderFile?: string;
  /** Policy parser; defaults to the XML config parser */
  policyParser?: PolicyParser;
}

export interface ResolutionResult {
  readonly configurations: ConfigurationTable;
  /** Effective order, highest precedence last */
  readonly partitions: PartitionOrder;
  /** Effective order as comma-joined partition names */
  readonly partitionOrder: string;
  /** Whether a partition-order override was applied */
  readonly orderAccepted: boolean;
}
