// src/identity.ts — Device identity (MAC address) normalization and file naming

export const IDENTITY_LENGTH = 12;
export const FILE_PREFIX = "SEP";
export const FILE_SUFFIX = ".cnf.xml";

const NON_HEX = /[^0-9a-f]/gi;
const IDENTITY_SHAPE = /^[0-9A-F]{12}$/;

/**
 * Keep hexadecimal digits only, uppercase them and cut the result at 12 characters.
 * Short input stays short; `isValidIdentity` rejects it later.
 *
 * @example normalizeIdentity("aa:bb-cc 11 22 33 extra") // "AABBCC112233"
 */
export function normalizeIdentity(raw: string): string {
  return raw.replace(NON_HEX, "").toUpperCase().slice(0, IDENTITY_LENGTH);
}

export function isValidIdentity(identity: string): boolean {
  return IDENTITY_SHAPE.test(identity);
}

export function destinationFileName(identity: string): string {
  return `${FILE_PREFIX}${identity}${FILE_SUFFIX}`;
}
