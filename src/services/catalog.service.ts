/**
 * catalog.service.ts
 * Owns the current catalog snapshot. Readers always get a complete catalog:
 * a reload builds the new array fully before swapping one reference.
 */

import { EventEmitter } from 'events';
import { CoffeeCatalog } from '../models/coffee.model';
import catalogLoader, { CatalogLoaderService } from './catalog-loader.service';
import config from '../config/config';

export interface CatalogStats {
  path: string;
  loaded: boolean;
  loadedAt: string | null;
  totalCoffees: number;
  countries: Record<string, number>;
}

export class CatalogService extends EventEmitter {
  private snapshot: CoffeeCatalog | null = null;
  private loadedAt: Date | null = null;
  private inFlight: Promise<CoffeeCatalog> | null = null;

  constructor(
    private readonly catalogPath: string = config.CATALOG_PATH,
    private readonly loader: CatalogLoaderService = catalogLoader
  ) {
    super();
  }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Current catalog, loading it on first demand
   * @throws CatalogUnavailableError when nothing has been loaded and the file cannot be read
   */
  async getCatalog(): Promise<CoffeeCatalog> {
    if (this.snapshot) {
      return this.snapshot;
    }
    return this.reload();
  }

  /**
   * Re-read the catalog file and swap it in. Concurrent calls share one load.
   * On failure the previous snapshot stays in place and the error propagates.
   */
  reload(): Promise<CoffeeCatalog> {
    if (!this.inFlight) {
      this.inFlight = this.loader
        .loadFile(this.catalogPath)
        .then((catalog) => {
          this.snapshot = catalog;
          this.loadedAt = new Date();
          this.emit('reloaded', catalog);
          return catalog;
        })
        .finally(() => {
          this.inFlight = null;
        });
    }
    return this.inFlight;
  }

  getStats(): CatalogStats {
    const countries: Record<string, number> = {};
    for (const coffee of this.snapshot ?? []) {
      countries[coffee.country] = (countries[coffee.country] ?? 0) + 1;
    }

    return {
      path: this.catalogPath,
      loaded: this.isLoaded,
      loadedAt: this.loadedAt ? this.loadedAt.toISOString() : null,
      totalCoffees: this.snapshot?.length ?? 0,
      countries,
    };
  }
}

export default new CatalogService();
