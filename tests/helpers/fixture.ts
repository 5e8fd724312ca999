/**
 * Temporary partition trees for tests.
 */
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { OverlayScanner, OverlayScannerFactory, ParsedOverlayInfo } from '../../src/core/scanner/types.js';

export function createTestRoot(label: string): string {
  return mkdtempSync(join(tmpdir(), `overlayconf-${label}-`));
}

export function removeTestRoot(root: string): void {
  rmSync(root, { recursive: true, force: true });
}

/**
 * Write `content` to `relativePath` beneath `root`, creating directories.
 */
export function writeAt(root: string, relativePath: string, content = ''): string {
  const filePath = join(root, relativePath);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

export function partitionOrderXml(names: string[], rootTag = 'partition-order'): string {
  const entries = names.map((name) => `  <partition name="${name}"/>`).join('\n');
  return `<${rootTag}>\n${entries}\n</${rootTag}>\n`;
}

export interface OverlayDeclaration {
  package: string;
  enabled?: boolean;
  mutable?: boolean;
}

export function configXml(overlays: OverlayDeclaration[], merges: string[] = []): string {
  const lines = [
    ...merges.map((path) => `  <merge path="${path}"/>`),
    ...overlays.map((overlay) => {
      const attrs = [`package="${overlay.package}"`];
      if (overlay.enabled !== undefined) attrs.push(`enabled="${overlay.enabled}"`);
      if (overlay.mutable !== undefined) attrs.push(`mutable="${overlay.mutable}"`);
      return `  <overlay ${attrs.join(' ')}/>`;
    }),
  ];
  return `<config>\n${lines.join('\n')}\n</config>\n`;
}

export function overlayInfo(
  packageName: string,
  path: string,
  overrides: Partial<Omit<ParsedOverlayInfo, 'packageName' | 'path'>> = {}
): ParsedOverlayInfo {
  return {
    packageName,
    targetPackageName: overrides.targetPackageName ?? 'com.example.target',
    targetSdkVersion: overrides.targetSdkVersion ?? 0,
    isStatic: overrides.isStatic ?? false,
    priority: overrides.priority ?? 0,
    path,
  };
}

/**
 * Scanner factory answering from a fixed directory -> overlays table.
 */
export function fakeScannerFactory(byDirectory: Map<string, ParsedOverlayInfo[]>): OverlayScannerFactory {
  return (): OverlayScanner => ({
    scanDir: (directory: string) => byDirectory.get(directory) ?? [],
  });
}
