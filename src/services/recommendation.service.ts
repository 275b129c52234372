/**
 * recommendation.service.ts
 * Entry point for taste-based recommendations: meta-question handling,
 * classification, filtering and country selection under a time budget
 */

import { CoffeeCatalog } from '../models/coffee.model';
import { InfoOutcome, RecommendationOutcome } from '../models/recommendation.model';
import { CLASSIFICATION_GUIDANCE_TEXT, CRITERIA_TEXT, NO_RESULTS_TEXT } from '../config/taste-rules';
import catalogService, { CatalogService } from './catalog.service';
import preferenceClassifier, { PreferenceClassifierService } from './preference-classifier.service';
import filterPipeline, { FilterPipelineService } from './filter-pipeline.service';
import countrySelection, { CountrySelectionService } from './country-selection.service';
import { Deadline } from '../utils/deadline';
import { performanceMonitor } from '../utils/performance-monitor';
import config from '../config/config';
import logger from '../utils/logger';

export interface RecommendOptions {
  // Overrides the configured budget for this call
  timeoutMs?: number;
}

export class RecommendationService {
  constructor(
    private readonly catalog: CatalogService = catalogService,
    private readonly classifier: PreferenceClassifierService = preferenceClassifier,
    private readonly pipeline: FilterPipelineService = filterPipeline,
    private readonly selection: CountrySelectionService = countrySelection,
    private readonly defaultTimeoutMs: number = config.RECOMMENDATION_TIMEOUT_MS
  ) {}

  getCriteria(): InfoOutcome {
    return { type: 'info', content: CRITERIA_TEXT };
  }

  /**
   * Recommend coffees for a free-text preference.
   * Unrecognised preferences and empty results are outcomes, not errors.
   * @throws CatalogUnavailableError when the catalog cannot be loaded
   * @throws RecommendationTimeoutError when the pass exceeds its budget
   */
  async recommend(preference: string, options: RecommendOptions = {}): Promise<RecommendationOutcome> {
    if (this.classifier.isMetaQuestion(preference)) {
      return this.getCriteria();
    }

    const deadline = new Deadline(options.timeoutMs ?? this.defaultTimeoutMs);
    const catalog = await this.catalog.getCatalog();
    deadline.check();

    return performanceMonitor.track(
      'recommendation_pass',
      () => this.recommendFromCatalog(catalog, preference, deadline),
      { catalogSize: catalog.length }
    );
  }

  /**
   * Synchronous pass over an already-loaded catalog
   */
  recommendFromCatalog(
    catalog: CoffeeCatalog,
    preference: string,
    deadline: Deadline = Deadline.unbounded()
  ): RecommendationOutcome {
    if (this.classifier.isMetaQuestion(preference)) {
      return this.getCriteria();
    }

    const category = this.classifier.classify(preference);
    if (!category) {
      logger.debug('Preference matched no taste category', { preference });
      return { type: 'error', content: CLASSIFICATION_GUIDANCE_TEXT };
    }

    const candidates = this.pipeline.filter(catalog, category, deadline);
    if (candidates.length === 0) {
      logger.info(`No coffees left after filtering for ${category.kind}`);
      return { type: 'no_results', content: NO_RESULTS_TEXT };
    }

    const countries = this.selection.select(candidates, category);
    deadline.check();

    logger.debug(`Recommended ${countries.length} countries for ${category.kind}`, {
      candidates: candidates.length,
    });

    return {
      type: 'recommendation',
      kind: category.kind,
      flavorDescription: category.flavorDescription,
      countries,
    };
  }
}

export default new RecommendationService();
