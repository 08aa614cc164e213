// Precompiled patterns shared by contracts and validator.

/** Exactly 8 lowercase hex characters, e.g. "0a1b2c3d". */
export const RE_HEX8 = /^[0-9a-f]{8}$/;

/** ISO-3166-1 alpha-2 country, optionally with a subdivision: "US", "US-CA". */
export const RE_ISO3166 = /^[A-Z]{2}(-[A-Z0-9]{1,3})?$/;

export function isDedupHash(x: string): boolean {
  return RE_HEX8.test(x);
}

export function isIso3166Code(x: string): boolean {
  return RE_ISO3166.test(x);
}
