/**
 * Currency and locale used to render money
 */
export type MoneyFormat = {
  currency: string;
  locale: string;
};

const COUNTRY_FORMATS: Record<string, MoneyFormat> = {
  US: { currency: 'USD', locale: 'en-US' },
  CA: { currency: 'CAD', locale: 'en-CA' },
  GB: { currency: 'GBP', locale: 'en-GB' },
  DE: { currency: 'EUR', locale: 'de-DE' },
  FR: { currency: 'EUR', locale: 'fr-FR' },
  ES: { currency: 'EUR', locale: 'es-ES' },
  IT: { currency: 'EUR', locale: 'it-IT' },
  PL: { currency: 'PLN', locale: 'pl-PL' },
  UA: { currency: 'UAH', locale: 'uk-UA' },
  BG: { currency: 'BGN', locale: 'bg-BG' },
  JP: { currency: 'JPY', locale: 'ja-JP' },
  AU: { currency: 'AUD', locale: 'en-AU' },
  IN: { currency: 'INR', locale: 'en-IN' },
  MX: { currency: 'MXN', locale: 'es-MX' },
  BR: { currency: 'BRL', locale: 'pt-BR' },
};

/**
 * Formats an amount as currency for a locale.
 * Unknown currency codes or locale tags fall back to `"1234.50 XYZ"`.
 */
export function formatCurrency(amount: number, currency: string, locale: string): string {
  try {
    return new Intl.NumberFormat(locale, {
      style: 'currency',
      currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    }).format(amount);
  } catch {
    return `${amount.toFixed(2)} ${currency}`;
  }
}

/**
 * Currency and locale for a country code, or the fallback when unknown
 */
export function resolveFormat(country: string | null | undefined, fallback: MoneyFormat): MoneyFormat {
  if (!country) {
    return fallback;
  }
  return COUNTRY_FORMATS[country.trim().toUpperCase()] ?? fallback;
}
