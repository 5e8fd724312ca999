/**
 * Settings loading and conversion into resolver options.
 */
import * as path from 'node:path';
import { SettingsSchema, type Settings } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { createXmlPolicyParser } from '../policy/parser.js';
import { createDirectoryScannerFactory } from '../scanner/directory-scanner.js';
import type { OverlayScannerFactory } from '../scanner/types.js';
import type { ResolveOptions } from '../resolution/types.js';

export const DEFAULT_SETTINGS_PATH = '.overlayconf.yaml';

/**
 * Default settings values.
 * Used when no settings file exists.
 */
export function getDefaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Load settings from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadSettings(
  projectRoot: string,
  settingsPath?: string
): Promise<Settings> {
  const fullPath = path.resolve(projectRoot, settingsPath ?? DEFAULT_SETTINGS_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultSettings();
  }

  try {
    return await loadYamlWithSchema(fullPath, SettingsSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load settings from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial settings with defaults.
 */
export function mergeSettings(partial: Partial<Settings>): Settings {
  return SettingsSchema.parse(partial);
}

/**
 * Resolver options carrying the settings' order file and policy parser.
 */
export function toResolveOptions(settings: Settings): ResolveOptions {
  return {
    partitionOrderFile: settings.partition_order_file,
    policyParser: createXmlPolicyParser({
      configFile: settings.policy.config_file,
      maxMergeDepth: settings.policy.max_merge_depth,
    }),
  };
}

/**
 * Directory scanner factory using the settings' manifest globs.
 */
export function toScannerFactory(settings: Settings): OverlayScannerFactory {
  return createDirectoryScannerFactory({
    include: settings.scan.include,
    exclude: settings.scan.exclude,
  });
}
