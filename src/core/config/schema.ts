/**
 * Resolver settings schema.
 */
import { z } from 'zod';
import { DEFAULT_PARTITION_ORDER_FILE } from '../partitions/order-validator.js';
import { DEFAULT_CONFIG_FILE, DEFAULT_MAX_MERGE_DEPTH } from '../policy/parser.js';
import { DEFAULT_SCAN_EXCLUDE, DEFAULT_SCAN_INCLUDE } from '../scanner/directory-scanner.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Partition config file handling. */
export const PolicySettingsSchema = z.object({
  /** Config file relative to each partition's overlay directory */
  config_file: z.string().min(1).default(DEFAULT_CONFIG_FILE),
  /** Deepest allowed chain of <merge> includes */
  max_merge_depth: z.number().int().min(0).default(DEFAULT_MAX_MERGE_DEPTH),
});

/** Overlay manifest discovery. */
export const ScanSettingsSchema = z.object({
  include: z.array(z.string()).min(1).default(() => [...DEFAULT_SCAN_INCLUDE]),
  exclude: z.array(z.string()).default(() => [...DEFAULT_SCAN_EXCLUDE]),
});

export const SettingsSchema = z.object({
  /** Partition-order override, relative to the resolver root */
  partition_order_file: z.string().min(1).default(DEFAULT_PARTITION_ORDER_FILE),
  policy: withDefaults(PolicySettingsSchema),
  scan: withDefaults(ScanSettingsSchema),
  log_level: LogLevelSchema.default('info'),
});

export type PolicySettings = z.infer<typeof PolicySettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
