/**
 * Partition config file parser.
 *
 * Each partition may declare overlay policy in `overlay/config/config.xml`:
 * ```xml
 * <config>
 *   <merge path="auto-generated.xml"/>
 *   <overlay package="com.example.overlay" enabled="true" mutable="false"/>
 * </config>
 * ```
 * Declarations that cannot be honoured are skipped and logged; the rest of
 * the partition's configuration still applies.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { fileExistsSync, isPathInside } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { compareCodeUnits } from '../../utils/string.js';
import { loadXmlSync, type XmlElement } from '../../utils/xml.js';
import { formatZodError } from '../../utils/yaml.js';
import type { OverlayPartition } from '../partitions/types.js';
import type { ParsedOverlayInfo } from '../scanner/types.js';
import {
  DEFAULT_ENABLED_STATE,
  DEFAULT_MUTABILITY,
  type PolicyFragment,
  type PolicyParser,
} from './types.js';

const log = logger.child('policy');

export const CONFIG_ROOT_TAG = 'config';
export const OVERLAY_TAG = 'overlay';
export const MERGE_TAG = 'merge';
export const DEFAULT_CONFIG_FILE = path.join('config', 'config.xml');
export const DEFAULT_MAX_MERGE_DEPTH = 5;

const BooleanAttribute = z.enum(['true', 'false']).transform((value) => value === 'true');

const OverlayElementSchema = z.object({
  package: z.string().min(1),
  enabled: BooleanAttribute.optional(),
  mutable: BooleanAttribute.optional(),
});

const MergeElementSchema = z.object({
  path: z.string().min(1),
});

export interface XmlPolicyParserOptions {
  /** Config file relative to the partition's overlay directory */
  configFile?: string;
  /** Deepest allowed chain of `<merge>` includes */
  maxMergeDepth?: number;
}

/**
 * Per-partition parse state.
 */
interface ParseContext {
  readonly partition: OverlayPartition;
  readonly configDir: string;
  readonly maxMergeDepth: number;
  readonly overlays: ReadonlyMap<string, ParsedOverlayInfo>;
  readonly visited: Set<string>;
  readonly configured: Map<string, PolicyFragment>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseOverlayElement(element: XmlElement, file: string, ctx: ParseContext): void {
  const result = OverlayElementSchema.safeParse(element.attributes);
  if (!result.success) {
    log.warn(`${file}: invalid <${OVERLAY_TAG}> (${formatZodError(result.error)})`);
    return;
  }

  const { package: packageName, enabled, mutable } = result.data;
  const overlay = ctx.overlays.get(packageName);
  if (!overlay) {
    log.warn(`${file}: overlay ${packageName} is not present in partition ${ctx.partition.name}`);
    return;
  }
  if (overlay.isStatic) {
    log.warn(`${file}: static overlay ${packageName} cannot be configured`);
    return;
  }
  if (ctx.configured.has(packageName)) {
    log.warn(`${file}: overlay ${packageName} configured more than once in partition ${ctx.partition.name}`);
    return;
  }

  const fragment: PolicyFragment = {
    packageName,
    enabled: enabled ?? DEFAULT_ENABLED_STATE,
    mutable: mutable ?? DEFAULT_MUTABILITY,
    partition: ctx.partition.name,
    origin: 'config',
    declaredIn: file,
    overlay,
  };
  ctx.configured.set(packageName, Object.freeze(fragment));
}

function parseMergeElement(element: XmlElement, file: string, depth: number, ctx: ParseContext): void {
  const result = MergeElementSchema.safeParse(element.attributes);
  if (!result.success) {
    log.warn(`${file}: invalid <${MERGE_TAG}> (${formatZodError(result.error)})`);
    return;
  }

  const target = path.resolve(ctx.configDir, result.data.path);
  if (!isPathInside(ctx.configDir, target)) {
    log.warn(`${file}: merged file ${result.data.path} is outside ${ctx.configDir}`);
    return;
  }
  if (depth + 1 > ctx.maxMergeDepth) {
    log.warn(`${file}: merge of ${result.data.path} exceeds maximum depth ${ctx.maxMergeDepth}`);
    return;
  }
  if (!fileExistsSync(target)) {
    log.warn(`${file}: merged file ${target} does not exist`);
    return;
  }
  parseConfigFile(target, depth + 1, ctx);
}

function parseConfigFile(file: string, depth: number, ctx: ParseContext): void {
  if (ctx.visited.has(file)) {
    log.warn(`${file} merged more than once in partition ${ctx.partition.name}`);
    return;
  }
  ctx.visited.add(file);

  let root: XmlElement;
  try {
    root = loadXmlSync(file);
  } catch (error) {
    log.warn(`Skipping config file: ${describe(error)}`);
    return;
  }
  if (root.tag !== CONFIG_ROOT_TAG) {
    log.warn(`${file}: root element is <${root.tag}>, expected <${CONFIG_ROOT_TAG}>`);
    return;
  }

  for (const child of root.children) {
    switch (child.tag) {
      case OVERLAY_TAG:
        parseOverlayElement(child, file, ctx);
        break;
      case MERGE_TAG:
        parseMergeElement(child, file, depth, ctx);
        break;
      default:
        log.warn(`${file}: ignoring unknown element <${child.tag}>`);
    }
  }
}

function staticFragments(overlays: readonly ParsedOverlayInfo[], partition: OverlayPartition): PolicyFragment[] {
  return overlays
    .filter((overlay) => overlay.isStatic)
    .sort((a, b) => a.priority - b.priority || compareCodeUnits(a.packageName, b.packageName))
    .map((overlay): PolicyFragment => Object.freeze({
      packageName: overlay.packageName,
      enabled: true,
      mutable: false,
      partition: partition.name,
      origin: 'static' as const,
      overlay,
    }));
}

/**
 * Create a parser reading each partition's XML config file.
 *
 * Fragments come back as configured overlays in declaration order, then
 * static overlays by priority, then the remaining overlays with default
 * policy in scan order.
 */
export function createXmlPolicyParser(options: XmlPolicyParserOptions = {}): PolicyParser {
  const configFile = options.configFile ?? DEFAULT_CONFIG_FILE;
  const maxMergeDepth = options.maxMergeDepth ?? DEFAULT_MAX_MERGE_DEPTH;

  return (partition, overlays) => {
    const entry = path.resolve(partition.overlayPath, configFile);
    const ctx: ParseContext = {
      partition,
      configDir: path.dirname(entry),
      maxMergeDepth,
      overlays: new Map<string, ParsedOverlayInfo>(overlays.map((overlay) => [overlay.packageName, overlay])),
      visited: new Set(),
      configured: new Map(),
    };

    if (fileExistsSync(entry)) {
      parseConfigFile(entry, 0, ctx);
    } else {
      log.debug(`No overlay config for partition ${partition.name}`);
    }

    const fragments: PolicyFragment[] = [...ctx.configured.values(), ...staticFragments(overlays, partition)];
    for (const overlay of overlays) {
      if (overlay.isStatic || ctx.configured.has(overlay.packageName)) continue;
      const fragment: PolicyFragment = {
        packageName: overlay.packageName,
        enabled: DEFAULT_ENABLED_STATE,
        mutable: DEFAULT_MUTABILITY,
        partition: partition.name,
        origin: 'default',
        overlay,
      };
      fragments.push(Object.freeze(fragment));
    }
    return fragments;
  };
}
