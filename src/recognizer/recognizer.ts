/**
 * Address Recognizer
 * Offline checks for text that looks like a three-word address.
 * None of these functions contact the service; whether a match is a real
 * address is answered by GeocodingClient.isValidAddress.
 */

import {
  DID_YOU_MEAN_PATTERN,
  EMBEDDED_ADDRESS_PATTERN,
  POSSIBLE_ADDRESS_PATTERN,
} from './patterns.js';

/**
 * True when the whole input (surrounding whitespace ignored) is three
 * letter-only words joined by the same full stop twice.
 *
 * @example
 * isPossibleAddress('filled.count.soap'); // true
 * isPossibleAddress('not.a 3wa'); // false
 */
export function isPossibleAddress(text: string): boolean {
  return POSSIBLE_ADDRESS_PATTERN.test(text.trim());
}

/**
 * Every standalone address-shaped substring of `text`, left to right,
 * exactly as written.
 */
export function findPossibleAddresses(text: string): string[] {
  // matchAll works on a copy of the regex, so lastIndex never leaks between calls
  return Array.from(text.matchAll(EMBEDDED_ADDRESS_PATTERN), (match) => match[0]);
}

/**
 * Looser than isPossibleAddress: the words may also be joined by a space,
 * hyphen or similar, as long as both joins are the same.
 * Run-together words are never accepted.
 */
export function didYouMean(text: string): boolean {
  return DID_YOU_MEAN_PATTERN.test(text.trim());
}
