/**
 * Static range tables: which Unicode blocks each supported language needs.
 *
 * Groups are stored as the exact comma-joined strings passed to lv_font_conv's
 * `-r` flag. No group straddles the BMP limit, so partitioning never has to
 * split an interval.
 */

/** Named Range Groups: one script or symbol category each */
export const RANGE_GROUPS = Object.freeze({
  latin: '0x20-0x7E', // Basic Latin
  latin_extended: '0xA0-0xFF', // Latin-1 Supplement
  cyrillic: '0x0400-0x04FF',
  greek: '0x0370-0x03FF',
  japanese: '0x3040-0x309F,0x30A0-0x30FF,0x4E00-0x9FFF', // Hiragana, Katakana, common Kanji
  korean: '0xAC00-0xD7AF', // Hangul Syllables
  chinese: '0x4E00-0x9FFF', // CJK Unified Ideographs
  devanagari: '0x0900-0x097F',
  emoji: [
    '0x2190-0x21FF', // Arrows
    '0x2300-0x23FF', // Miscellaneous Technical
    '0x2500-0x257F', // Box Drawing
    '0x2600-0x26FF', // Miscellaneous Symbols
    '0x1F000-0x1F02F', // Mahjong Tiles
    '0x1F0A0-0x1F0FF', // Playing Cards
    '0x1F100-0x1F1FF', // Enclosed Alphanumeric Supplement
    '0x1F200-0x1F2FF', // Enclosed Ideographic Supplement
    '0x1F300-0x1F9FF', // Miscellaneous Symbols and Pictographs
    '0x1FA00-0x1FA6F', // Chess Symbols
    '0x1FA70-0x1FAFF', // Symbols and Pictographs Extended-A
  ].join(','),
} as const);

export type RangeGroupName = keyof typeof RANGE_GROUPS;

/** Freezes the profile table and each profile's group list */
function freezeProfiles<T extends Record<string, readonly RangeGroupName[]>>(profiles: T): Readonly<T> {
  for (const groups of Object.values(profiles)) {
    Object.freeze(groups);
  }
  return Object.freeze(profiles);
}

/** Language Profiles: the groups each language needs on top of the defaults */
export const LANGUAGE_RANGES = freezeProfiles({
  cs: ['latin', 'latin_extended'], // Czech
  de_DE: ['latin', 'latin_extended'], // German
  el: ['latin', 'greek'], // Greek
  en_GB: ['latin'], // British English
  en_US: ['latin'], // US English
  en_x_pirate: ['latin'], // Pirate English
  es: ['latin', 'latin_extended'], // Spanish
  fil: ['latin'], // Filipino
  fr: ['latin', 'latin_extended'], // French
  hi: ['latin', 'devanagari'], // Hindi
  ID: ['latin'], // Indonesian
  it_IT: ['latin', 'latin_extended'], // Italian
  ja: ['latin', 'japanese'], // Japanese
  ko: ['latin', 'korean'], // Korean
  nl: ['latin', 'latin_extended'], // Dutch
  pl: ['latin', 'latin_extended'], // Polish
  pt_BR: ['latin', 'latin_extended'], // Brazilian Portuguese
  ru: ['latin', 'cyrillic'], // Russian
  sv: ['latin', 'latin_extended'], // Swedish
  tr: ['latin', 'latin_extended'], // Turkish
  zh_Latn_pinyin: ['latin', 'latin_extended'], // Pinyin
} as const satisfies Record<string, readonly RangeGroupName[]>);

export type LanguageCode = keyof typeof LANGUAGE_RANGES;

/** Groups merged into every language's selection, ahead of its own groups */
export const ALWAYS_INCLUDED_GROUPS: readonly RangeGroupName[] = Object.freeze<RangeGroupName[]>(['emoji']);

/** Glyphs at or above this code point come from the upper font */
export const BMP_LIMIT = 0x10000;

/** Private Use Area taken from the Nerd Font icon font */
export const ICON_FONT_RANGE = '0xE000-0xF8FF';

/** Language whose base font is swapped for the Japanese Unifont variant */
export const CJK_LANGUAGE: LanguageCode = 'ja';
