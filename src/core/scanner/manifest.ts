/**
 * Overlay manifest schema.
 *
 * Example:
 * ```yaml
 * package: com.example.theme.overlay
 * target: com.example.launcher
 * target_sdk: 30
 * static: false
 * priority: 0
 * ```
 */
import { z } from 'zod';
import type { ParsedOverlayInfo } from './types.js';

export const MANIFEST_SUFFIX = '.overlay.yaml';

export const OverlayManifestSchema = z.object({
  /** Overlay package name */
  package: z.string().min(1),
  /** Package whose resources are overlaid */
  target: z.string().min(1),
  target_sdk: z.number().int().min(0).default(0),
  static: z.boolean().default(false),
  priority: z.number().int().default(0),
});

export type OverlayManifest = z.infer<typeof OverlayManifestSchema>;

export function toOverlayInfo(manifest: OverlayManifest, manifestPath: string): ParsedOverlayInfo {
  return Object.freeze({
    packageName: manifest.package,
    targetPackageName: manifest.target,
    targetSdkVersion: manifest.target_sdk,
    isStatic: manifest.static,
    priority: manifest.priority,
    path: manifestPath,
  });
}
