import {
  RecommendationFormatterService,
  createStarRating,
  describeExcerpt,
  flagFor,
  translateTerm,
} from '../services/recommendation-formatter.service';
import { PassthroughTranslator, TextTranslator } from '../services/translation.service';
import { RecommendationResult } from '../models/recommendation.model';

const outcome: RecommendationResult = {
  type: 'recommendation',
  kind: 'nutty',
  flavorDescription: '고소하고 묵직한 바디감 (Low Acid, No Citrus)',
  countries: [
    {
      country: 'Brazil',
      coffees: [
        {
          name: 'Cerrado Yellow',
          rating: 91,
          description: 'Almond and chocolate. Heavy body. Sweet finish.',
          aroma: 8,
          acid: 7,
          body: 9,
          flavor: 8,
          aftertaste: 0,
        },
      ],
    },
    { country: 'Peru', coffees: [] },
  ],
};

describe('Recommendation formatting', () => {
  describe('createStarRating', () => {
    it('should draw full stars for half the score', () => {
      expect(createStarRating(8)).toBe('★★★★ (4점)');
    });

    it('should add a half glyph for a remainder of a quarter or more', () => {
      expect(createStarRating(9)).toBe('★★★★☆ (4.5점)');
      expect(createStarRating(8.5)).toBe('★★★★☆ (4.25점)');
      expect(createStarRating(8.25)).toBe('★★★★ (4.125점)');
    });

    it('should report a missing score', () => {
      expect(createStarRating(0)).toBe('정보 없음');
    });
  });

  describe('describeExcerpt', () => {
    it('should take the first two sentences', () => {
      expect(describeExcerpt('Berry. Citrus. Cocoa. Long.')).toEqual(['Berry', 'Citrus']);
    });

    it('should replace the espresso preamble with the third sentence', () => {
      expect(
        describeExcerpt('Evaluated as espresso. Rich and balanced. Chocolate and almond in the cup.')
      ).toEqual(['Chocolate and almond in the cup', 'Rich and balanced']);
    });

    it('should tolerate descriptions without sentence breaks', () => {
      expect(describeExcerpt('No periods here')).toEqual(['No periods here', '']);
      expect(describeExcerpt('')).toEqual(['', '']);
    });
  });

  it('should decorate known countries and leave others plain', () => {
    expect(flagFor('Kenya')).toBe('🇰🇪');
    expect(flagFor('Peru')).toBe('🏳️');
    expect(translateTerm('Peru')).toBe('페루');
    expect(translateTerm('Vietnam')).toBe('Vietnam');
  });

  it('should render a recommendation as markdown', async () => {
    const formatter = new RecommendationFormatterService(new PassthroughTranslator());

    const markdown = await formatter.format('고소한 맛', outcome);

    expect(markdown).toBe(
      [
        '### ☕ 고소한 맛 취향 맞춤 커피 가이드',
        '_고소하고 묵직한 바디감 (Low Acid, No Citrus) 위주로 엄선했습니다._\n',
        '#### 🇧🇷 브라질 (Brazil)',
        '- **Cerrado Yellow** (총점: 91점)',
        '  └ 📝 특징: Almond and chocolate, Heavy body',
        '  └ 📊 맛 지표:',
        '    • 아로마 (Aroma): ★★★★ (4점)',
        '    • 산미 (Acid): ★★★☆ (3.5점)',
        '    • 바디 (Body): ★★★★☆ (4.5점)',
        '    • 향미 (Flavor): ★★★★ (4점)',
        '    • 후미 (Aftertaste): 정보 없음',
        '',
        '#### 🏳️ 페루 (Peru)',
      ].join('\n')
    );
  });

  it('should pass description excerpts through the translator', async () => {
    const translator: TextTranslator = {
      translate: jest.fn(async (text: string) => `[ko] ${text}`),
    };
    const formatter = new RecommendationFormatterService(translator);

    const markdown = await formatter.format('고소한 맛', outcome);

    expect(markdown).toContain('  └ 📝 특징: [ko] Almond and chocolate, [ko] Heavy body');
    expect(translator.translate).toHaveBeenCalledTimes(2);
  });

  it('should render other outcomes as their content', async () => {
    const formatter = new RecommendationFormatterService(new PassthroughTranslator());

    await expect(
      formatter.format('달콤', { type: 'error', content: 'guidance' })
    ).resolves.toBe('guidance');
    await expect(
      formatter.format('기준', { type: 'info', content: 'criteria' })
    ).resolves.toBe('criteria');
  });
});
