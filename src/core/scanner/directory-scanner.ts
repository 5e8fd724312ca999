/**
 * Filesystem overlay scanner: discovers overlay manifests beneath a
 * partition's overlay directory.
 */
import { globFilesSync, isDirectorySync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { loadYamlWithSchemaSync } from '../../utils/yaml.js';
import { MANIFEST_SUFFIX, OverlayManifestSchema, toOverlayInfo } from './manifest.js';
import type { OverlayScanner, OverlayScannerFactory, ParsedOverlayInfo } from './types.js';

const log = logger.child('scanner');

export interface DirectoryScannerOptions {
  /** Globs relative to the scanned directory */
  include?: string[];
  exclude?: string[];
}

/** Manifests directly in the overlay directory or one level below it. */
export const DEFAULT_SCAN_INCLUDE = [`*${MANIFEST_SUFFIX}`, `*/*${MANIFEST_SUFFIX}`];
export const DEFAULT_SCAN_EXCLUDE = ['config/**'];

export class DirectoryOverlayScanner implements OverlayScanner {
  private readonly include: string[];
  private readonly exclude: string[];

  constructor(options: DirectoryScannerOptions = {}) {
    this.include = options.include ?? DEFAULT_SCAN_INCLUDE;
    this.exclude = options.exclude ?? DEFAULT_SCAN_EXCLUDE;
  }

  /**
   * Yield one descriptor per valid manifest, in sorted path order.
   * A missing directory yields nothing; malformed manifests are skipped.
   */
  *scanDir(directory: string): Generator<ParsedOverlayInfo> {
    if (!isDirectorySync(directory)) {
      log.debug(`Overlay directory ${directory} not present`);
      return;
    }

    const manifests = globFilesSync(this.include, { cwd: directory, ignore: this.exclude });
    for (const manifestPath of manifests) {
      const overlay = this.readManifest(manifestPath);
      if (overlay) yield overlay;
    }
  }

  private readManifest(manifestPath: string): ParsedOverlayInfo | null {
    try {
      return toOverlayInfo(loadYamlWithSchemaSync(manifestPath, OverlayManifestSchema), manifestPath);
    } catch (error) {
      log.warn(`Skipping overlay manifest: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}

export function createDirectoryScannerFactory(options: DirectoryScannerOptions = {}): OverlayScannerFactory {
  return () => new DirectoryOverlayScanner(options);
}
