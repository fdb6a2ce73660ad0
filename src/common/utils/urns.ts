/**
 * URNs identify a contact on a channel as `scheme:path`.
 * The path format is checked per scheme when the URN is built.
 */

export type URNScheme = 'tel' | 'whatsapp' | 'telegram' | 'ext';

const PATH_PATTERNS: Record<URNScheme, RegExp> = {
  tel: /^\+?[a-zA-Z0-9]{1,64}$/,
  whatsapp: /^[0-9]+$/,
  telegram: /^-?[0-9]+$/,
  ext: /^\S+$/,
};

export class URNError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'URNError';
  }
}

export function isURNScheme(value: string): value is URNScheme {
  return Object.prototype.hasOwnProperty.call(PATH_PATTERNS, value);
}

export class URN {
  private constructor(
    readonly scheme: URNScheme,
    readonly path: string,
  ) {}

  /**
   * Builds a URN from its parts, validating the path for the scheme.
   *
   * @throws URNError for an unknown scheme or a path the scheme rejects
   */
  static fromParts(scheme: string, path: string): URN {
    if (!isURNScheme(scheme)) {
      throw new URNError(`unknown URN scheme: ${scheme}`);
    }

    const trimmed = path.trim();
    if (!trimmed) {
      throw new URNError(`empty path for ${scheme} URN`);
    }
    if (!PATH_PATTERNS[scheme].test(trimmed)) {
      throw new URNError(`invalid path for ${scheme} URN: ${trimmed}`);
    }

    return new URN(scheme, trimmed);
  }

  static whatsApp(number: string): URN {
    return URN.fromParts('whatsapp', number);
  }

  /** Parses `scheme:path`. */
  static parse(value: string): URN {
    const idx = value.indexOf(':');
    if (idx <= 0) {
      throw new URNError(`URN must be scheme:path, got "${value}"`);
    }
    return URN.fromParts(value.slice(0, idx), value.slice(idx + 1));
  }

  /** Identity used as the lookup key in the contact store. */
  get identity(): string {
    return `${this.scheme}:${this.path}`;
  }

  toString(): string {
    return this.identity;
  }

  equals(other: URN): boolean {
    return this.identity === other.identity;
  }
}
