/**
 * recommendation-formatter.service.ts
 * Renders recommendation outcomes as markdown for chat-style clients
 */

import { NumericAttribute } from '../models/coffee.model';
import { IRecommendedCoffee, RecommendationOutcome } from '../models/recommendation.model';
import {
  COUNTRY_FLAGS,
  DEFAULT_FLAG,
  ESPRESSO_PREAMBLE,
  TERM_DICTIONARY,
} from '../config/presentation';
import translator, { TextTranslator } from './translation.service';

const TASTE_METRICS: ReadonlyArray<{ label: string; attribute: NumericAttribute }> = [
  { label: '아로마 (Aroma)', attribute: 'aroma' },
  { label: '산미 (Acid)', attribute: 'acid' },
  { label: '바디 (Body)', attribute: 'body' },
  { label: '향미 (Flavor)', attribute: 'flavor' },
  { label: '후미 (Aftertaste)', attribute: 'aftertaste' },
];

/**
 * Ten-point score as five-star glyphs: one ★ per full star, ☆ for a remainder of at least a quarter
 */
export const createStarRating = (score: number): string => {
  if (!score) {
    return '정보 없음';
  }

  const normalized = score / 2;
  const fullStars = Math.floor(normalized);
  const hasHalf = normalized - fullStars >= 0.25;

  return `${'★'.repeat(fullStars)}${hasHalf ? '☆' : ''} (${normalized}점)`;
};

export const translateTerm = (term: string): string => TERM_DICTIONARY[term] ?? term;

export const flagFor = (country: string): string => COUNTRY_FLAGS[country] ?? DEFAULT_FLAG;

/**
 * First two sentences of a tasting note. The espresso preamble is swapped for the third.
 */
export const describeExcerpt = (description: string): [string, string] => {
  const segments = description.split('.').slice(0, 3).map((segment) => segment.trim());
  if (segments[0] === ESPRESSO_PREAMBLE) {
    segments[0] = segments[2] ?? '';
  }
  return [segments[0] ?? '', segments[1] ?? ''];
};

export class RecommendationFormatterService {
  constructor(private readonly textTranslator: TextTranslator = translator) {}

  async format(preference: string, outcome: RecommendationOutcome): Promise<string> {
    if (outcome.type !== 'recommendation') {
      return outcome.content;
    }

    const output = [
      `### ☕ ${preference} 취향 맞춤 커피 가이드`,
      `_${outcome.flavorDescription} 위주로 엄선했습니다._\n`,
    ];

    for (const { country, coffees } of outcome.countries) {
      output.push(`#### ${flagFor(country)} ${translateTerm(country)} (${country})`);
      for (const coffee of coffees) {
        output.push(...(await this.formatCoffee(coffee)));
      }
    }

    return output.join('\n');
  }

  private async formatCoffee(coffee: IRecommendedCoffee): Promise<string[]> {
    const [first, second] = describeExcerpt(coffee.description);
    const [firstTranslated, secondTranslated] = await Promise.all([
      this.textTranslator.translate(first),
      this.textTranslator.translate(second),
    ]);

    return [
      `- **${coffee.name}** (총점: ${coffee.rating}점)`,
      `  └ 📝 특징: ${firstTranslated}, ${secondTranslated}`,
      '  └ 📊 맛 지표:',
      ...TASTE_METRICS.map(
        ({ label, attribute }) => `    • ${label}: ${createStarRating(coffee[attribute])}`
      ),
      '',
    ];
  }
}

export default new RecommendationFormatterService();
