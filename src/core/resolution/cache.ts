/**
 * OverlayConfigCache - holds the process-wide resolution once it has been
 * computed. Invalidation is explicit: call `invalidate()` or `rescan()`
 * after the partitions change on disk.
 */
import type { OverlayConfig } from './overlay-config.js';

export type OverlayConfigLoader = () => OverlayConfig;

export class OverlayConfigCache {
  private instance: OverlayConfig | null = null;
  private readonly loader: OverlayConfigLoader;

  constructor(loader: OverlayConfigLoader) {
    this.loader = loader;
  }

  /**
   * Return the cached configuration, resolving on first use.
   */
  get(): OverlayConfig {
    if (!this.instance) {
      this.instance = this.loader();
    }
    return this.instance;
  }

  isLoaded(): boolean {
    return this.instance !== null;
  }

  /**
   * Drop the cached configuration; the next `get()` resolves again.
   */
  invalidate(): void {
    this.instance = null;
  }

  rescan(): OverlayConfig {
    this.invalidate();
    return this.get();
  }
}
