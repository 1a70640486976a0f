/**
 * Supported countries and law types
 *
 * Adding a country here is enough for its collection to be created on first ingestion.
 */

export const SUPPORTED_COUNTRIES = ['egypt', 'jordan', 'uae', 'saudi', 'kuwait'] as const;
export type SupportedCountry = (typeof SUPPORTED_COUNTRIES)[number];

export const LAW_TYPES = [
  'criminal',
  'civil',
  'commercial',
  'economic',
  'administrative',
  'arbitration',
  'labor',
  'personal_status',
] as const;
export type LawType = (typeof LAW_TYPES)[number];

export function isSupportedCountry(value: string): value is SupportedCountry {
  return SUPPORTED_COUNTRIES.some((country) => country === value);
}

export function isLawType(value: string): value is LawType {
  return LAW_TYPES.some((lawType) => lawType === value);
}
