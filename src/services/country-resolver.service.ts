/**
 * country-resolver.service.ts
 * Maps free-text origin descriptions onto canonical producer countries
 */

import { OTHER_COUNTRY } from '../models/coffee.model';
import { MAJOR_COUNTRIES } from '../config/taste-rules';

export class CountryResolverService {
  private readonly lowered: ReadonlyArray<{ country: string; needle: string }>;

  constructor(countries: readonly string[] = MAJOR_COUNTRIES) {
    this.lowered = countries.map((country) => ({ country, needle: country.toLowerCase() }));
  }

  /**
   * Return the first canonical country, in list order, contained in the origin text.
   * List order is the tie-break when several names appear.
   * @param originText Raw origin column; anything that is not a string resolves to "Other"
   */
  resolve(originText: unknown): string {
    if (typeof originText !== 'string') {
      return OTHER_COUNTRY;
    }

    const haystack = originText.toLowerCase();
    const match = this.lowered.find(({ needle }) => haystack.includes(needle));
    return match ? match.country : OTHER_COUNTRY;
  }
}

export default new CountryResolverService();
