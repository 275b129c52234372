/**
 * filter-pipeline.service.ts
 * Narrows the catalog to the records that suit a taste category.
 *
 * Stage order is fixed: acid predicate, exclusions, then include-term narrowing.
 * The narrowing threshold counts matches in the set left by the first two stages.
 */

import { CoffeeCatalog, ICoffeeRecord } from '../models/coffee.model';
import { AcidPredicate, IPreferenceCategory } from '../models/recommendation.model';
import { INCLUDE_NARROWING_THRESHOLD } from '../config/taste-rules';
import { Deadline, DEADLINE_CHECK_INTERVAL } from '../utils/deadline';

type Coffee = Readonly<ICoffeeRecord>;

export const satisfiesAcid = (acid: number, predicate: AcidPredicate): boolean =>
  predicate.op === 'gte' ? acid >= predicate.threshold : acid <= predicate.threshold;

const mentionsAny = (description: string, terms: readonly string[]): boolean => {
  const text = description.toLowerCase();
  return terms.some((term) => text.includes(term.toLowerCase()));
};

export class FilterPipelineService {
  constructor(private readonly narrowingThreshold: number = INCLUDE_NARROWING_THRESHOLD) {}

  /**
   * Run every stage. An empty array means no coffee qualifies.
   * @throws RecommendationTimeoutError when the deadline passes mid-scan
   */
  filter(
    catalog: CoffeeCatalog,
    category: IPreferenceCategory,
    deadline: Deadline = Deadline.unbounded()
  ): Coffee[] {
    const byAcid = this.scan(catalog, deadline, (coffee) =>
      satisfiesAcid(coffee.acid, category.acidPredicate)
    );
    deadline.check();

    const withoutExcluded = this.scan(
      byAcid,
      deadline,
      (coffee) => !mentionsAny(coffee.description, category.excludeTerms)
    );
    deadline.check();

    const included = this.scan(withoutExcluded, deadline, (coffee) =>
      mentionsAny(coffee.description, category.includeTerms)
    );
    deadline.check();

    // Small match sets would over-narrow the pool; keep everything instead
    return included.length > this.narrowingThreshold ? included : withoutExcluded;
  }

  private scan(
    coffees: CoffeeCatalog,
    deadline: Deadline,
    keep: (coffee: Coffee) => boolean
  ): Coffee[] {
    const kept: Coffee[] = [];
    coffees.forEach((coffee, index) => {
      if (index % DEADLINE_CHECK_INTERVAL === 0) {
        deadline.check();
      }
      if (keep(coffee)) {
        kept.push(coffee);
      }
    });
    return kept;
  }
}

export default new FilterPipelineService();
