import iso639 from './iso639.json';

const TWO_TO_THREE: Record<string, string> = iso639;

const BASE_SUBTAG = /^[a-z]{2,3}$/;
const OTHER_SUBTAG = /^[a-z0-9]{1,8}$/;

export class LanguageTagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LanguageTagError';
  }
}

export interface LanguageBase {
  /** Base subtag as written in the tag, lower-cased (`pt` for `pt-BR`). */
  base: string;
  /** ISO 639-3 code for the base (`por`). */
  iso3: string;
}

/**
 * Parses a BCP 47 language tag (`en`, `pt-BR`, `zh_Hant_TW`) down to its base
 * language. Region, script and variant subtags only need to be well-formed.
 * Two-letter bases must have an ISO 639-3 equivalent.
 */
export function parseLanguageBase(tag: string): LanguageBase {
  const normalized = tag.trim().replace(/_/g, '-').toLowerCase();
  if (!normalized) {
    throw new LanguageTagError('language tag is empty');
  }

  const [base, ...rest] = normalized.split('-');
  if (!BASE_SUBTAG.test(base)) {
    throw new LanguageTagError(`language tag "${tag}" is not well-formed`);
  }
  for (const subtag of rest) {
    if (!OTHER_SUBTAG.test(subtag)) {
      throw new LanguageTagError(`language tag "${tag}" is not well-formed`);
    }
  }

  if (base.length === 2) {
    const iso3 = TWO_TO_THREE[base];
    if (!iso3) {
      throw new LanguageTagError(`language subtag "${base}" is well-formed but unknown`);
    }
    return { base, iso3 };
  }

  // three-letter bases are already ISO 639-3
  return { base, iso3: base };
}
