/**
 * Partition-order override validation.
 *
 * The override file reorders every known partition:
 * ```xml
 * <partition-order>
 *   <partition name="system"/>
 *   <partition name="vendor"/>
 *   ...
 * </partition-order>
 * ```
 * It is applied as a unit or not at all. Any defect keeps the default order.
 */
import * as path from 'node:path';
import { fileExistsSync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { loadXmlSync, type XmlElement } from '../../utils/xml.js';
import { OVERLAY_DIRECTORY } from './model.js';
import { PartitionName, type OverlayPartition, type PartitionOrder, type PartitionOrderResult } from './types.js';

const log = logger.child('partition-order');

export const PARTITION_ORDER_ROOT_TAG = 'partition-order';
export const PARTITION_TAG = 'partition';
export const PARTITION_ORDER_FILE_NAME = 'partition_order.xml';

/**
 * Default override file location relative to the resolver root.
 */
export const DEFAULT_PARTITION_ORDER_FILE = path.join(
  PartitionName.Product,
  OVERLAY_DIRECTORY,
  PARTITION_ORDER_FILE_NAME
);

type OrderParse =
  | { ok: true; order: PartitionOrder }
  | { ok: false; reason: string };

function reject(reason: string): OrderParse {
  return { ok: false, reason };
}

function readOrder(root: XmlElement, known: PartitionOrder): OrderParse {
  if (root.tag !== PARTITION_ORDER_ROOT_TAG) {
    return reject(`root element is <${root.tag}>, expected <${PARTITION_ORDER_ROOT_TAG}>`);
  }

  const byName = new Map<string, OverlayPartition>(known.map((p) => [p.name, p]));
  const seen = new Set<string>();
  const ordered: OverlayPartition[] = [];

  for (const child of root.children) {
    if (child.tag !== PARTITION_TAG) {
      return reject(`unexpected element <${child.tag}>`);
    }
    const name = child.attributes.name;
    if (name === undefined) {
      return reject(`<${PARTITION_TAG}> without a name attribute`);
    }
    const partition = byName.get(name);
    if (!partition) {
      return reject(`unknown partition '${name}'`);
    }
    if (seen.has(name)) {
      return reject(`partition '${name}' listed more than once`);
    }
    seen.add(name);
    ordered.push(partition);
  }

  if (ordered.length !== known.length) {
    return reject(`lists ${ordered.length} of ${known.length} partitions`);
  }
  return { ok: true, order: Object.freeze(ordered) };
}

/**
 * Validate an override file against the current order.
 *
 * On acceptance returns a fresh order in file order; otherwise returns
 * `defaultOrder` itself. `defaultOrder` is never modified.
 */
export function resolveOrder(overrideFilePath: string, defaultOrder: PartitionOrder): PartitionOrderResult {
  if (!fileExistsSync(overrideFilePath)) {
    log.debug(`No partition order override at ${overrideFilePath}`);
    return { order: defaultOrder, accepted: false, reason: 'file not found' };
  }

  let parsed: OrderParse;
  try {
    parsed = readOrder(loadXmlSync(overrideFilePath), defaultOrder);
  } catch (error) {
    parsed = reject(error instanceof Error ? error.message : String(error));
  }

  if (!parsed.ok) {
    log.warn(`Ignoring ${overrideFilePath}: ${parsed.reason}`);
    return { order: defaultOrder, accepted: false, reason: parsed.reason };
  }
  return { order: parsed.order, accepted: true };
}

/**
 * In-place variant of resolveOrder: reorders `partitions` only when the
 * override is accepted, and returns whether it was.
 */
export function sortPartitions(overrideFilePath: string, partitions: OverlayPartition[]): boolean {
  const result = resolveOrder(overrideFilePath, [...partitions]);
  if (result.accepted) {
    partitions.splice(0, partitions.length, ...result.order);
  }
  return result.accepted;
}
