/**
 * country-selection.service.ts
 * Picks representative countries for a filtered set and ranks coffees within each
 */

import { ICoffeeRecord, OTHER_COUNTRY } from '../models/coffee.model';
import {
  ICountryRecommendation,
  IPreferenceCategory,
  IRecommendedCoffee,
} from '../models/recommendation.model';
import { COFFEES_PER_COUNTRY, MAX_SELECTED_COUNTRIES } from '../config/taste-rules';

type Coffee = Readonly<ICoffeeRecord>;

export interface CountryRatingSummary {
  country: string;
  meanRating: number;
  count: number;
}

const toRecommendedCoffee = (coffee: Coffee): IRecommendedCoffee => ({
  name: coffee.name,
  rating: coffee.rating,
  description: coffee.description,
  aroma: coffee.aroma,
  acid: coffee.acid,
  body: coffee.body,
  flavor: coffee.flavor,
  aftertaste: coffee.aftertaste,
});

export class CountrySelectionService {
  constructor(
    private readonly maxCountries: number = MAX_SELECTED_COUNTRIES,
    private readonly coffeesPerCountry: number = COFFEES_PER_COUNTRY
  ) {}

  /**
   * Mean rating per country, best first.
   * Equal means keep the order in which countries first appear in the input.
   */
  rankCountriesByRating(coffees: readonly Coffee[]): CountryRatingSummary[] {
    const totals = new Map<string, { sum: number; count: number }>();
    for (const coffee of coffees) {
      const entry = totals.get(coffee.country) ?? { sum: 0, count: 0 };
      entry.sum += coffee.rating;
      entry.count += 1;
      totals.set(coffee.country, entry);
    }

    return Array.from(totals, ([country, { sum, count }]) => ({
      country,
      meanRating: sum / count,
      count,
    })).sort((a, b) => b.meanRating - a.meanRating);
  }

  /**
   * Every priority country that is present comes first, in category order, even past
   * the slot count. Remaining slots go to the best-rated other countries, never "Other".
   */
  selectCountries(coffees: readonly Coffee[], priorityCountries: readonly string[]): string[] {
    const present = new Set(coffees.map((coffee) => coffee.country));
    const selected = priorityCountries.filter((country) => present.has(country));

    if (selected.length < this.maxCountries) {
      for (const { country } of this.rankCountriesByRating(coffees)) {
        if (selected.length >= this.maxCountries) {
          break;
        }
        if (country !== OTHER_COUNTRY && !selected.includes(country)) {
          selected.push(country);
        }
      }
    }

    return selected;
  }

  /**
   * Highest-rated coffees of one country; equal ratings keep catalog order
   */
  topCoffees(coffees: readonly Coffee[], country: string): IRecommendedCoffee[] {
    return coffees
      .filter((coffee) => coffee.country === country)
      .sort((a, b) => b.rating - a.rating)
      .slice(0, this.coffeesPerCountry)
      .map(toRecommendedCoffee);
  }

  select(coffees: readonly Coffee[], category: IPreferenceCategory): ICountryRecommendation[] {
    return this.selectCountries(coffees, category.priorityCountries).map((country) => ({
      country,
      coffees: this.topCoffees(coffees, country),
    }));
  }
}

export default new CountrySelectionService();
