/**
 * Types for overlay package discovery.
 */

/**
 * Overlay package descriptor as read from its manifest.
 */
export interface ParsedOverlayInfo {
  readonly packageName: string;
  readonly targetPackageName: string;
  readonly targetSdkVersion: number;
  /** Static overlays are always enabled and immutable */
  readonly isStatic: boolean;
  /** Manifest priority hint; passed through to callers unchanged */
  readonly priority: number;
  /** Location of the package on disk */
  readonly path: string;
}

/**
 * Enumerates overlay packages beneath a directory. Each call is a single
 * lazy pass.
 */
export interface OverlayScanner {
  scanDir(directory: string): Iterable<ParsedOverlayInfo>;
}

/**
 * Creates a fresh scanner; the resolver asks for one per partition.
 */
export type OverlayScannerFactory = () => OverlayScanner;

/**
 * Source of already-parsed overlay packages, used instead of scanning.
 * Packages are assigned to the partition whose overlay directory contains
 * their path.
 */
export interface PackageProvider {
  forEachPackage(visitor: (overlay: ParsedOverlayInfo) => void): void;
}
