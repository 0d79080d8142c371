import type { AddressParts } from '@src/types/pipeline';
import { collapseWhitespace } from './text';

/**
 * Fingerprints are the join keys of the pipeline: the enrichment cache is
 * keyed by the property-address fingerprint, the litigator blocklist by
 * name key + address fingerprint. Both sides must use these functions.
 */

const STREET_WORDS: Record<string, string> = {
  street: 'st',
  avenue: 'ave',
  road: 'rd',
  drive: 'dr',
  lane: 'ln',
  boulevard: 'blvd',
  court: 'ct',
  place: 'pl',
  circle: 'cir',
  terrace: 'ter',
  parkway: 'pkwy',
  highway: 'hwy',
  north: 'n',
  south: 's',
  east: 'e',
  west: 'w',
  apartment: 'apt',
  suite: 'ste',
};

const NAME_SUFFIXES = new Set(['jr', 'sr', 'ii', 'iii', 'iv']);

function simplify(value: string): string {
  return collapseWhitespace(
    value
      .toLowerCase()
      .replace(/[.,#]/g, ' '),
  );
}

function simplifyStreet(street: string): string {
  return simplify(street)
    .split(' ')
    .map((word) => STREET_WORDS[word] ?? word)
    .join(' ');
}

/**
 * "12 Main Street, Springfield, il 62701-1234" and "12  main st" in
 * Springfield IL 62701 produce the same fingerprint.
 */
export function addressFingerprint(address: AddressParts): string {
  return [
    simplifyStreet(address.street),
    simplify(address.city),
    simplify(address.state),
    address.zipcode.replace(/\D/g, '').slice(0, 5),
  ].join('|');
}

export function hasStreet(address: AddressParts): boolean {
  return address.street.trim() !== '';
}

/**
 * Last name (letters only, generational suffix removed) + first initial.
 * Returns null when either part is missing, since a bare address must never
 * match a blocklist entry on its own.
 */
export function nameKey(firstName: string, lastName: string): string | null {
  const lastWords = lastName
    .toLowerCase()
    .replace(/[^a-z\s]/g, '')
    .split(/\s+/)
    .filter((word) => word !== '' && !NAME_SUFFIXES.has(word));
  const last = lastWords.join('');
  const initial = firstName.toLowerCase().replace(/[^a-z]/g, '').charAt(0);

  if (!last || !initial) {
    return null;
  }
  return `${last}:${initial}`;
}

export function litigatorFingerprint(
  firstName: string,
  lastName: string,
  address: AddressParts,
): string | null {
  const key = nameKey(firstName, lastName);
  if (!key || !hasStreet(address)) {
    return null;
  }
  return `${key}|${addressFingerprint(address)}`;
}
