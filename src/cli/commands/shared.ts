/**
 * Helpers shared by the CLI commands.
 */
import * as path from 'node:path';
import { loadSettings, toResolveOptions, toScannerFactory } from '../../core/config/loader.js';
import { OverlayConfig } from '../../core/resolution/overlay-config.js';
import type { Configuration } from '../../core/resolution/types.js';
import { logger } from '../../utils/logger.js';

export interface CommonOptions {
  config: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Load settings from the working directory and resolve beneath `root`.
 */
export async function loadOverlayConfig(root: string, options: CommonOptions): Promise<OverlayConfig> {
  const settings = await loadSettings(process.cwd(), options.config);
  logger.setLevel(options.verbose ? 'debug' : settings.log_level);

  return new OverlayConfig(
    path.resolve(root),
    toScannerFactory(settings),
    null,
    toResolveOptions(settings)
  );
}

export function configurationToJson(configuration: Configuration): Record<string, unknown> {
  return {
    package: configuration.packageName,
    target: configuration.targetPackageName,
    partition: configuration.partition,
    config_index: configuration.configIndex,
    enabled: configuration.enabled,
    mutable: configuration.mutable,
    origin: configuration.origin,
    declared_in: configuration.declaredIn,
    priority: configuration.priority,
    path: configuration.path,
  };
}
