/**
 * recommendation.model.ts
 * Taste categories and the outcomes a recommendation request can end in
 */

import { CoffeeScores } from './coffee.model';

export type TasteKind = 'floral' | 'fruity' | 'general_acidic' | 'nutty';

export interface AcidPredicate {
  op: 'gte' | 'lte';
  threshold: number;
}

export interface IPreferenceCategory {
  kind: TasteKind;
  acidPredicate: AcidPredicate;
  includeTerms: readonly string[];
  excludeTerms: readonly string[];
  priorityCountries: readonly string[];
  flavorDescription: string;
}

export interface IRecommendedCoffee extends CoffeeScores {
  name: string;
  description: string;
}

export interface ICountryRecommendation {
  country: string;
  coffees: IRecommendedCoffee[];
}

export interface InfoOutcome {
  type: 'info';
  content: string;
}

// Preference matched no taste category
export interface ClassificationErrorOutcome {
  type: 'error';
  content: string;
}

// Preference was understood but filtering left nothing
export interface NoResultsOutcome {
  type: 'no_results';
  content: string;
}

export interface RecommendationResult {
  type: 'recommendation';
  kind: TasteKind;
  flavorDescription: string;
  countries: ICountryRecommendation[];
}

export type RecommendationOutcome =
  | InfoOutcome
  | ClassificationErrorOutcome
  | NoResultsOutcome
  | RecommendationResult;
