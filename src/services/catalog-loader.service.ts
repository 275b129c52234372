/**
 * catalog-loader.service.ts
 * Reads the reviewed-coffee CSV into validated, frozen records
 */

import fs from 'fs/promises';
import { CoffeeCatalog, CoffeeScores, ICoffeeRecord } from '../models/coffee.model';
import { CatalogUnavailableError } from '../utils/errors';
import { CsvRow, parseCsv } from '../utils/csv';
import { decodeWithFallback, UndecodableTextError, CATALOG_ENCODINGS } from '../utils/text-decoding';
import countryResolver, { CountryResolverService } from './country-resolver.service';
import logger from '../utils/logger';

const REQUIRED_COLUMNS = ['name', 'origin', 'desc_1'] as const;

/**
 * Coerce a raw cell into a non-negative finite number.
 * Blank, non-numeric and negative values become 0.
 */
export const coerceScore = (raw: string | undefined): number => {
  const trimmed = (raw ?? '').trim();
  if (trimmed === '') {
    return 0;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) && value >= 0 ? value : 0;
};

export class CatalogLoaderService {
  constructor(
    private readonly resolver: CountryResolverService = countryResolver,
    private readonly encodings: readonly string[] = CATALOG_ENCODINGS
  ) {}

  /**
   * Load and validate the catalog file.
   * @throws CatalogUnavailableError if the file is missing, undecodable or lacks required columns
   */
  async loadFile(catalogPath: string): Promise<CoffeeCatalog> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(catalogPath);
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown';
      logger.error(`Catalog file could not be read: ${catalogPath}`, error);
      throw new CatalogUnavailableError(
        catalogPath,
        code === 'ENOENT' ? 'file not found' : `read failed (${code})`
      );
    }

    return this.parse(bytes, catalogPath);
  }

  /**
   * Decode and parse catalog bytes already in memory
   */
  parse(bytes: Uint8Array, source: string = '<memory>'): CoffeeCatalog {
    let text: string;
    try {
      const decoded = decodeWithFallback(bytes, this.encodings);
      text = decoded.text;
      logger.debug(`Catalog decoded as ${decoded.encoding}`, { source });
    } catch (error) {
      if (error instanceof UndecodableTextError) {
        throw new CatalogUnavailableError(source, error.message);
      }
      throw error;
    }

    const { headers, records } = parseCsv(text);
    const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
    if (missing.length > 0) {
      throw new CatalogUnavailableError(source, `missing columns: ${missing.join(', ')}`);
    }

    const catalog = records.map((row) => this.toRecord(row));
    logger.info(`✅ Catalog loaded: ${catalog.length} coffees`, { source });
    return Object.freeze(catalog);
  }

  private toRecord(row: CsvRow): Readonly<ICoffeeRecord> {
    const scores: CoffeeScores = {
      acid: coerceScore(row.acid),
      body: coerceScore(row.body),
      flavor: coerceScore(row.flavor),
      aftertaste: coerceScore(row.aftertaste),
      aroma: coerceScore(row.aroma),
      rating: coerceScore(row.rating),
    };

    return Object.freeze({
      name: row.name ?? '',
      originText: row.origin ?? '',
      country: this.resolver.resolve(row.origin),
      description: row.desc_1 ?? '',
      ...scores,
    });
  }
}

export default new CatalogLoaderService();
