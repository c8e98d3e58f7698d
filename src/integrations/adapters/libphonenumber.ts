import { getCountries, parsePhoneNumberWithError, type CountryCode } from 'libphonenumber-js';
import type { IPhoneNormalizer } from '../interfaces/phone';

const SUPPORTED_REGIONS: readonly CountryCode[] = getCountries();

/**
 * Phone normalizer backed by libphonenumber-js.
 *
 * PMS exports often drop the leading "+" from international numbers
 * ("447700900123"), so anything that is not already international and does
 * not start with a national trunk prefix ("0") gets one before parsing.
 */
export class LibPhoneNumberNormalizer implements IPhoneNormalizer {
  normalize(raw: string, regionHint: string): string {
    const trimmed = raw.trim();
    if (trimmed.length === 0) return raw;

    const candidate =
      trimmed.startsWith('0') || trimmed.startsWith('+') ? trimmed : `+${trimmed}`;
    const region = SUPPORTED_REGIONS.find((code) => code === regionHint.toUpperCase());

    try {
      return parsePhoneNumberWithError(candidate, region).number;
    } catch {
      return raw;
    }
  }
}
