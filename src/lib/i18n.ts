import en from '../locales/en.json';

type Catalogue = Record<string, string>;

export const DEFAULT_LOCALE = 'en';

const catalogues: Record<string, Catalogue> = {
  en,
};

// Discord reports locales as `en-US`, `pt-BR`, ...; catalogues are keyed by language
export function resolveLocale(locale?: string): string {
  if (!locale) return DEFAULT_LOCALE;
  if (catalogues[locale]) return locale;
  const language = locale.split('-')[0];
  return catalogues[language] ? language : DEFAULT_LOCALE;
}

export function t(locale: string | undefined, key: string, vars: Record<string, string | number> = {}): string {
  const template = catalogues[resolveLocale(locale)][key] ?? catalogues[DEFAULT_LOCALE][key] ?? key;
  return template.replace(/{{(\w+)}}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match,
  );
}
