/**
 * taste-rules.ts
 * Static lexicons and the ordered taste decision table.
 * Everything here is read-only; services take these tables through their constructors.
 */

import { IPreferenceCategory, TasteKind } from '../models/recommendation.model';

export const MAJOR_COUNTRIES: readonly string[] = Object.freeze([
  'Ethiopia',
  'Kenya',
  'Colombia',
  'Brazil',
  'Panama',
  'Guatemala',
  'Costa Rica',
  'Indonesia',
  'Honduras',
  'El Salvador',
  'Peru',
  'Rwanda',
  'Mexico',
  'Uganda',
  'Tanzania',
  'Nicaragua',
  'Yemen',
  'Sumatra',
  'India',
  'Vietnam',
]);

// Supergroup triggers
export const ACIDIC_TRIGGERS = Object.freeze([
  '산미',
  '신맛',
  '상큼',
  '과일',
  '화사',
  '꽃',
  '플로럴',
  '향기',
  'floral',
  '베리',
  '시트러스',
  'fruit',
]);

export const FLORAL_TRIGGERS = Object.freeze(['꽃', '플로럴', '자스민', '향기', 'floral']);

export const FRUITY_TRIGGERS = Object.freeze(['과일', '베리', '시트러스', '레몬', '사과', 'fruit']);

export const NUTTY_TRIGGERS = Object.freeze(['고소', '견과', '구수', '묵직', '초콜릿', '바디', '쓴맛']);

const ACIDIC_EXCLUDE_TERMS = Object.freeze([
  'earthy',
  'tobacco',
  'smoke',
  'ash',
  'leather',
  'musty',
  'rubber',
]);

const ACIDIC_PRIORITY_COUNTRIES = Object.freeze(['Ethiopia', 'Panama', 'Kenya']);

const HIGH_ACID = Object.freeze({ op: 'gte', threshold: 9.0 } as const);

const floral: IPreferenceCategory = Object.freeze({
  kind: 'floral',
  acidPredicate: HIGH_ACID,
  includeTerms: Object.freeze([
    'floral',
    'jasmine',
    'rose',
    'lily',
    'blossom',
    'lavender',
    'tea-like',
    'lemongrass',
    'magnolia',
    'hibiscus',
  ]),
  excludeTerms: ACIDIC_EXCLUDE_TERMS,
  priorityCountries: ACIDIC_PRIORITY_COUNTRIES,
  flavorDescription: '은은한 꽃향기와 화사한 산미 (Floral & High Acid)',
});

const fruity: IPreferenceCategory = Object.freeze({
  kind: 'fruity',
  acidPredicate: HIGH_ACID,
  includeTerms: Object.freeze([
    'fruit',
    'berry',
    'citrus',
    'lemon',
    'orange',
    'apple',
    'grape',
    'peach',
    'stone fruit',
    'tropical',
  ]),
  excludeTerms: ACIDIC_EXCLUDE_TERMS,
  priorityCountries: ACIDIC_PRIORITY_COUNTRIES,
  flavorDescription: '상큼 달콤한 과일의 풍미 (Fruity & High Acid)',
});

const generalAcidic: IPreferenceCategory = Object.freeze({
  kind: 'general_acidic',
  acidPredicate: HIGH_ACID,
  includeTerms: Object.freeze(['acid', 'fruit', 'floral', 'bright']),
  excludeTerms: ACIDIC_EXCLUDE_TERMS,
  priorityCountries: ACIDIC_PRIORITY_COUNTRIES,
  flavorDescription: '화사한 산미와 과일향 (High Acid, No Earthy)',
});

const nutty: IPreferenceCategory = Object.freeze({
  kind: 'nutty',
  acidPredicate: Object.freeze({ op: 'lte', threshold: 8.0 } as const),
  includeTerms: Object.freeze([
    'nut',
    'chocolate',
    'cocoa',
    'almond',
    'walnut',
    'savory',
    'caramel',
    'toffee',
    'body',
  ]),
  excludeTerms: Object.freeze([
    'bright',
    'tart',
    'citrus',
    'lemon',
    'lime',
    'grapefruit',
    'wine',
    'sour',
    'vinegar',
  ]),
  priorityCountries: Object.freeze(['Brazil', 'Colombia', 'Guatemala', 'Indonesia', 'India']),
  flavorDescription: '고소하고 묵직한 바디감 (Low Acid, No Citrus)',
});

export interface TasteRule {
  kind: TasteKind;
  // Every trigger group must share at least one term with the preference
  triggers: ReadonlyArray<readonly string[]>;
  category: IPreferenceCategory;
}

/**
 * Evaluated top to bottom; the first rule whose trigger groups all match wins.
 * Acidic sub-kinds precede the nutty rule, so an acidic word always beats a nutty one.
 */
export const TASTE_RULES: readonly TasteRule[] = [
  { kind: 'floral', triggers: [ACIDIC_TRIGGERS, FLORAL_TRIGGERS], category: floral },
  { kind: 'fruity', triggers: [ACIDIC_TRIGGERS, FRUITY_TRIGGERS], category: fruity },
  { kind: 'general_acidic', triggers: [ACIDIC_TRIGGERS], category: generalAcidic },
  { kind: 'nutty', triggers: [NUTTY_TRIGGERS], category: nutty },
];

export const META_QUESTION_TRIGGERS = Object.freeze([
  '기준',
  '어떻게',
  '원리',
  '알려줘',
  '설명',
  '로직',
  '분류',
]);

// Meta-question detection only applies to inputs shorter than this
export const META_QUESTION_MAX_LENGTH = 15;

// Include-term narrowing applies only when more records than this match
export const INCLUDE_NARROWING_THRESHOLD = 5;

export const MAX_SELECTED_COUNTRIES = 3;

export const COFFEES_PER_COUNTRY = 2;

export const CRITERIA_TEXT = [
  '### 🔍 커피 추천 로직 및 분류 기준',
  '',
  '**1. 산미 (Acidic)**',
  '- **과일 계열 (Fruity)**: 산미 점수 9점 이상 + (Berry, Citrus, Fruit 키워드)',
  '- **꽃향 계열 (Floral)**: 산미 점수 9점 이상 + (Floral, Jasmine, Rose 키워드)',
  '- 🚫 제외: 흙내(Earthy), 담배(Tobacco) 등 텁텁한 표현',
  '- 🏳️ 추천 국가: 에티오피아, 파나마, 케냐',
  '',
  '**2. 고소한 맛 (Nutty)**',
  '- **조건**: 산미 점수 8점 이하',
  '- 🚫 제외: 시큼함(Tart), 와인(Wine), 톡 쏘는 산미(Bright/Citrus)',
  '- 🏳️ 추천 국가: 브라질, 콜롬비아, 과테말라, 인도네시아',
  '',
  '※ 위 조건을 만족하는 그룹 내에서 **평점(Rating)**이 높은 순서대로 추천합니다.',
].join('\n');

export const CLASSIFICATION_GUIDANCE_TEXT =
  "죄송합니다. '고소한 맛', '과일 같은 산미', '꽃향기' 등으로 질문해 주세요.\n" +
  "(궁금하시다면 '추천 기준'이라고 물어봐 주세요.)";

export const NO_RESULTS_TEXT = '조건에 맞는 커피를 찾을 수 없습니다.';
