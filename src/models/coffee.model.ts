/**
 * coffee.model.ts
 * In-memory shape of one reviewed coffee from the catalog file
 */

// Cupping attributes scored per coffee, in catalog column order
export const NUMERIC_ATTRIBUTES = [
  'acid',
  'body',
  'flavor',
  'aftertaste',
  'aroma',
  'rating',
] as const;

export type NumericAttribute = (typeof NUMERIC_ATTRIBUTES)[number];

export type CoffeeScores = Record<NumericAttribute, number>;

export const OTHER_COUNTRY = 'Other';

export interface ICoffeeRecord extends CoffeeScores {
  name: string;
  // Raw origin column, e.g. "Yirgacheffe growing region, southern Ethiopia"
  originText: string;
  // Canonical producer country or OTHER_COUNTRY
  country: string;
  // Tasting notes; empty string when the source cell is blank
  description: string;
}

export type CoffeeCatalog = ReadonlyArray<Readonly<ICoffeeRecord>>;
