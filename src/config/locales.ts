export const SUPPORTED_LANGUAGES = ['ru', 'en', 'de'] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: SupportedLanguage = 'en';

export const LANGUAGE_NAMES: Record<SupportedLanguage, { name: string; native_name: string }> = {
  ru: { name: 'Russian', native_name: 'Русский' },
  en: { name: 'English', native_name: 'English' },
  de: { name: 'German', native_name: 'Deutsch' },
};

export function isSupportedLanguage(language: string | null | undefined): language is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((supported) => supported === language);
}

/**
 * Pick the first supported language from an Accept-Language header,
 * honouring the order the browser sent (q-values are not re-sorted).
 */
export function languageFromAcceptHeader(header: string | undefined): SupportedLanguage | null {
  if (!header) {
    return null;
  }

  for (const part of header.split(',')) {
    const tag = part.split(';')[0]?.trim().toLowerCase() ?? '';
    const primary = tag.split('-')[0] ?? '';
    if (isSupportedLanguage(primary)) {
      return primary;
    }
  }

  return null;
}
