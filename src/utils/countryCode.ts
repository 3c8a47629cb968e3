const COUNTRY_CODE_PATTERN = /^[A-Z]{2}$/;

/**
 * Trims and upper-cases user input. Returns null unless the result is a
 * two-letter code; whether the country exists is left to the listing.
 */
export function normalizeCountryCode(input: string): string | null {
  const code = input.trim().toUpperCase();
  return COUNTRY_CODE_PATTERN.test(code) ? code : null;
}

export function isCountryCode(value: string): boolean {
  return COUNTRY_CODE_PATTERN.test(value);
}
