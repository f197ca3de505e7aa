import type { ConfigSnapshot, DatasetRegistry } from '../types/Elevation';
import { createLogger } from '../utils/logger';

export type ConfigurationLoader = () => Promise<ConfigSnapshot>;

/**
 * Memoizes the config snapshot for the life of the process
 *
 * Loading enumerates dataset directories, so it runs once and every caller
 * shares the result. Concurrent callers during a load await the same
 * promise and receive the same frozen snapshot. invalidate() only drops the
 * reference; callers holding the old snapshot keep a consistent view.
 */
export class ConfigurationCache {
  private pending: Promise<ConfigSnapshot> | null = null;
  private loaded = false;
  private loads = 0;
  private readonly logger = createLogger({ component: 'ConfigurationCache' });

  constructor(private readonly loader: ConfigurationLoader) {}

  /**
   * Get the current snapshot, loading it on first use
   */
  getConfig(): Promise<ConfigSnapshot> {
    if (this.pending) {
      return this.pending;
    }

    this.loads += 1;
    this.logger.debug({ load: this.loads }, 'Loading configuration');

    const load = this.loader().then(
      (snapshot) => {
        if (this.pending === load) {
          this.loaded = true;
        }
        return snapshot;
      },
      (error: unknown) => {
        // Failed loads are not memoized, unless a newer load already replaced this one
        if (this.pending === load) {
          this.pending = null;
        }
        this.logger.error({ error }, 'Configuration load failed');
        throw error;
      },
    );
    this.pending = load;
    return load;
  }

  /**
   * Get the dataset registry of the current snapshot
   */
  async getDatasetRegistry(): Promise<DatasetRegistry> {
    const config = await this.getConfig();
    return config.datasets;
  }

  /**
   * Drop the memoized snapshot so the next call reloads
   */
  invalidate(): void {
    this.pending = null;
    this.loaded = false;
    this.logger.info('Configuration cache invalidated');
  }

  /**
   * Whether a snapshot has been loaded and not invalidated since
   */
  isLoaded(): boolean {
    return this.loaded;
  }
}
