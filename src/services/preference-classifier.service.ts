/**
 * preference-classifier.service.ts
 * Rule-based mapping from a free-text taste preference to a taste category
 */

import { IPreferenceCategory } from '../models/recommendation.model';
import {
  META_QUESTION_MAX_LENGTH,
  META_QUESTION_TRIGGERS,
  TASTE_RULES,
  TasteRule,
} from '../config/taste-rules';

export interface MetaQuestionRules {
  triggers: readonly string[];
  maxLength: number;
}

const DEFAULT_META_RULES: MetaQuestionRules = {
  triggers: META_QUESTION_TRIGGERS,
  maxLength: META_QUESTION_MAX_LENGTH,
};

const containsAny = (text: string, terms: readonly string[]): boolean =>
  terms.some((term) => text.includes(term));

export class PreferenceClassifierService {
  constructor(
    private readonly rules: readonly TasteRule[] = TASTE_RULES,
    private readonly metaRules: MetaQuestionRules = DEFAULT_META_RULES
  ) {}

  /**
   * Classify a preference against the ordered decision table.
   * @returns The first matching rule's category, or null when no rule matches
   */
  classify(preference: string): IPreferenceCategory | null {
    const lowered = preference.toLowerCase();
    const rule = this.rules.find(({ triggers }) =>
      triggers.every((group) => containsAny(lowered, group))
    );
    return rule ? rule.category : null;
  }

  /**
   * A short input containing an explain/how/criteria word asks about the rules
   * themselves. Longer inputs are left to taste classification.
   * Length counts code points, so an emoji is one character.
   */
  isMetaQuestion(preference: string): boolean {
    return (
      Array.from(preference).length < this.metaRules.maxLength &&
      containsAny(preference, this.metaRules.triggers)
    );
  }
}

export default new PreferenceClassifierService();
