import translations from './translations.json';

export type ClientLanguage = keyof typeof translations;

const catalogs: Record<string, Record<string, string>> = translations;

export function isClientLanguage(value: string): value is ClientLanguage {
  return value in catalogs;
}

/**
 * Look up a UI string; unknown languages use English, unknown keys the fallback or the key itself.
 * `{name}` placeholders are filled from `values`.
 */
export function t(key: string, lang: string = 'en', fallback?: string, values: Record<string, string | number> = {}): string {
  const catalog = catalogs[lang] ?? catalogs.en ?? {};
  const text = catalog[key] || fallback || key;
  return text.replace(/\{(\w+)\}/g, (match, name: string) => (name in values ? String(values[name]) : match));
}
