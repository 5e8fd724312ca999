/**
 * Overlay configuration resolution.
 *
 * Partitions are processed in effective order and each package's policy is
 * taken from the last partition that mentions it, together with that
 * partition's index.
 */
import * as path from 'node:path';
import { ConfigError, ErrorCodes, SystemError } from '../../utils/errors.js';
import { isDirectorySync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { createPartitions, formatPartitionOrder, partitionContainsOverlay } from '../partitions/model.js';
import { DEFAULT_PARTITION_ORDER_FILE, resolveOrder } from '../partitions/order-validator.js';
import type { OverlayPartition } from '../partitions/types.js';
import { createXmlPolicyParser } from '../policy/parser.js';
import type { PolicyFragment } from '../policy/types.js';
import type { OverlayScannerFactory, PackageProvider, ParsedOverlayInfo } from '../scanner/types.js';
import type { Configuration, ResolutionResult, ResolveOptions } from './types.js';

const log = logger.child('resolve');

function collectProvided(packageProvider: PackageProvider): ParsedOverlayInfo[] {
  const provided: ParsedOverlayInfo[] = [];
  packageProvider.forEachPackage((overlay) => {
    provided.push(overlay);
  });
  return provided;
}

/**
 * A partition whose scan fails contributes no packages.
 */
function scanPartition(partition: OverlayPartition, scannerFactory: OverlayScannerFactory): ParsedOverlayInfo[] {
  try {
    return [...scannerFactory().scanDir(partition.overlayPath)];
  } catch (error) {
    log.warn(
      `Failed to scan partition ${partition.name}: ${error instanceof Error ? error.message : String(error)}`,
      { directory: partition.overlayPath }
    );
    return [];
  }
}

function packageSource(
  scannerFactory: OverlayScannerFactory | null,
  packageProvider: PackageProvider | null
): (partition: OverlayPartition) => ParsedOverlayInfo[] {
  if (scannerFactory) {
    const factory = scannerFactory;
    return (partition) => scanPartition(partition, factory);
  }
  if (packageProvider) {
    const provided = collectProvided(packageProvider);
    return (partition) => provided.filter((overlay) => partitionContainsOverlay(partition, overlay.path));
  }
  throw new ConfigError(
    ErrorCodes.NO_PACKAGE_SOURCE,
    'Either a scanner factory or a package provider is required'
  );
}

/**
 * Keep the first descriptor of each package name within one partition.
 */
function dedupe(partition: OverlayPartition, overlays: readonly ParsedOverlayInfo[]): ParsedOverlayInfo[] {
  const seen = new Map<string, ParsedOverlayInfo>();
  for (const overlay of overlays) {
    const first = seen.get(overlay.packageName);
    if (first) {
      log.warn(`Duplicate overlay ${overlay.packageName} in partition ${partition.name}: ${overlay.path} ignored, using ${first.path}`);
      continue;
    }
    seen.set(overlay.packageName, overlay);
  }
  return [...seen.values()];
}

function toConfiguration(fragment: PolicyFragment, configIndex: number): Configuration {
  const configuration: Configuration = {
    packageName: fragment.packageName,
    enabled: fragment.enabled,
    mutable: fragment.mutable,
    configIndex,
    partition: fragment.partition,
    origin: fragment.origin,
    ...(fragment.declaredIn !== undefined ? { declaredIn: fragment.declaredIn } : {}),
    targetPackageName: fragment.overlay.targetPackageName,
    priority: fragment.overlay.priority,
    path: fragment.overlay.path,
  };
  return Object.freeze(configuration);
}

/**
 * Resolve the partition order and every overlay package's configuration
 * beneath `rootDir`.
 *
 * Packages come from a fresh scanner per partition when `scannerFactory`
 * is given, otherwise from `packageProvider`. Throws only when the root
 * cannot be read or no package source is given.
 */
export function resolve(
  rootDir: string,
  scannerFactory: OverlayScannerFactory | null,
  packageProvider: PackageProvider | null,
  options: ResolveOptions = {}
): ResolutionResult {
  if (!isDirectorySync(rootDir)) {
    throw new SystemError(
      ErrorCodes.ROOT_INACCESSIBLE,
      `Root directory ${rootDir} does not exist or cannot be read`,
      { rootDir }
    );
  }
  const discover = packageSource(scannerFactory, packageProvider);

  const orderFile = path.resolve(rootDir, options.partitionOrderFile ?? DEFAULT_PARTITION_ORDER_FILE);
  const { order, accepted } = resolveOrder(orderFile, createPartitions(rootDir));
  const partitionOrder = formatPartitionOrder(order);
  log.debug(`Partition order: ${partitionOrder}${accepted ? ` (from ${orderFile})` : ''}`);

  const policyParser = options.policyParser ?? createXmlPolicyParser();
  const configurations = new Map<string, Configuration>();

  order.forEach((partition, configIndex) => {
    const fragments = policyParser(partition, dedupe(partition, discover(partition)));
    for (const fragment of fragments) {
      const previous = configurations.get(fragment.packageName);
      if (previous && previous.partition !== fragment.partition) {
        log.debug(`${fragment.packageName}: ${fragment.partition} overrides ${previous.partition}`);
      }
      configurations.set(fragment.packageName, toConfiguration(fragment, configIndex));
    }
  });

  return Object.freeze({
    configurations,
    partitions: order,
    partitionOrder,
    orderAccepted: accepted,
  });
}
