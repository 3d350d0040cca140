export interface LanguageInfo {
  /** Human-readable track title. */
  readonly name: string;
  /** ISO 639-2 code written into the container's language tag. */
  readonly iso639_2: string;
}

const LANGUAGES: Readonly<Record<string, LanguageInfo>> = {
  en: { name: 'English', iso639_2: 'eng' },
  it: { name: 'Italiano', iso639_2: 'ita' },
  es: { name: 'Español', iso639_2: 'spa' },
  fr: { name: 'Français', iso639_2: 'fre' },
  de: { name: 'Deutsch', iso639_2: 'ger' },
  pt: { name: 'Português', iso639_2: 'por' },
  nl: { name: 'Nederlands', iso639_2: 'dut' },
  pl: { name: 'Polski', iso639_2: 'pol' },
  ru: { name: 'Русский', iso639_2: 'rus' },
  uk: { name: 'Українська', iso639_2: 'ukr' },
  tr: { name: 'Türkçe', iso639_2: 'tur' },
  ar: { name: 'العربية', iso639_2: 'ara' },
  hi: { name: 'हिन्दी', iso639_2: 'hin' },
  ja: { name: '日本語', iso639_2: 'jpn' },
  ko: { name: '한국어', iso639_2: 'kor' },
  zh: { name: '中文', iso639_2: 'chi' },
  sv: { name: 'Svenska', iso639_2: 'swe' },
  da: { name: 'Dansk', iso639_2: 'dan' },
  no: { name: 'Norsk', iso639_2: 'nor' },
  fi: { name: 'Suomi', iso639_2: 'fin' },
  el: { name: 'Ελληνικά', iso639_2: 'gre' },
  ro: { name: 'Română', iso639_2: 'rum' },
};

/**
 * Track metadata for a language code; unknown codes fall back to the code itself.
 */
export const getLanguageInfo = (code: string): LanguageInfo => {
  const primary = code.toLowerCase().split('-')[0];
  return LANGUAGES[primary] ?? { name: code, iso639_2: primary };
};
