/**
 * presentation.ts
 * Display dictionaries for the markdown formatter
 */

// Korean display names for countries and tasting attributes
export const TERM_DICTIONARY: Readonly<Record<string, string>> = Object.freeze({
  Ethiopia: '에티오피아',
  Kenya: '케냐',
  Colombia: '콜롬비아',
  Brazil: '브라질',
  Panama: '파나마',
  Guatemala: '과테말라',
  Indonesia: '인도네시아',
  'Costa Rica': '코스타리카',
  Honduras: '온두라스',
  'El Salvador': '엘살바도르',
  Peru: '페루',
  Rwanda: '르완다',
  Aroma: '아로마',
  Acid: '산미',
  Body: '바디',
  Flavor: '향미',
  Aftertaste: '후미',
});

export const COUNTRY_FLAGS: Readonly<Record<string, string>> = Object.freeze({
  Ethiopia: '🇪🇹',
  Kenya: '🇰🇪',
  Colombia: '🇨🇴',
  Brazil: '🇧🇷',
  Panama: '🇵🇦',
  Guatemala: '🇬🇹',
  Indonesia: '🇮🇩',
});

export const DEFAULT_FLAG = '🏳️';

// Description lead-in that carries no tasting information
export const ESPRESSO_PREAMBLE = 'Evaluated as espresso';
