/**
 * Careerjet client constants: public search API
 */

export const CAREERJET_SEARCH_URL = "http://public.api.careerjet.net/search";

export const CAREERJET_DEFAULT_LOCALE = "en_US";

export const CAREERJET_DEFAULT_PAGE_SIZE = 50;

/**
 * Careerjet rejects page sizes above 99
 */
export const CAREERJET_MAX_PAGE_SIZE = 99;

export const CAREERJET_HTTP_TIMEOUT_MS = 15_000;

export const CAREERJET_HTTP_MAX_ATTEMPTS = 2;

/**
 * Careerjet requires the caller's IP and user agent; a batch service sends
 * its own placeholders
 */
export const CAREERJET_USER_IP = "127.0.0.1";

/**
 * Currency implied by each Careerjet locale
 */
export const CAREERJET_LOCALE_CURRENCIES: Readonly<Record<string, string>> = {
  en_US: "USD",
  en_GB: "GBP",
  en_CA: "CAD",
  en_AU: "AUD",
  en_IN: "INR",
  en_KE: "KES",
  fr_FR: "EUR",
  de_DE: "EUR",
  es_ES: "EUR",
  it_IT: "EUR",
  pt_BR: "BRL",
};
