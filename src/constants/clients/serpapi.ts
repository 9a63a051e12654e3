/**
 * SerpApi client constants: Google Jobs engine
 *
 * API documentation: https://serpapi.com/google-jobs-api
 */

export const SERPAPI_SEARCH_URL = "https://serpapi.com/search";

export const SERPAPI_ENGINE = "google_jobs";

/**
 * Google Jobs returns pages of 10; the page size is fixed by the engine
 */
export const SERPAPI_PAGE_SIZE = 10;

export const SERPAPI_HTTP_TIMEOUT_MS = 15_000;

export const SERPAPI_HTTP_MAX_ATTEMPTS = 2;

export const SERPAPI_DEFAULT_LANGUAGE = "en";

/**
 * Error text SerpApi returns (with HTTP 200) when a search has no results
 */
export const SERPAPI_NO_RESULTS_ERROR_FRAGMENT = "hasn't returned any results";

/**
 * Location substrings mapped to Google country codes (gl parameter)
 * First match wins; unmatched locations use SERPAPI_DEFAULT_COUNTRY
 */
export const SERPAPI_COUNTRY_CODES: ReadonlyArray<readonly [string, string]> = [
  ["kenya", "ke"],
  ["nairobi", "ke"],
  ["united states", "us"],
  ["usa", "us"],
  ["united kingdom", "gb"],
  ["uk", "gb"],
  ["canada", "ca"],
  ["india", "in"],
  ["australia", "au"],
  ["germany", "de"],
  ["france", "fr"],
  ["netherlands", "nl"],
  ["singapore", "sg"],
  ["nigeria", "ng"],
  ["south africa", "za"],
];

export const SERPAPI_DEFAULT_COUNTRY = "us";
