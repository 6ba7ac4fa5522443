/**
 * Hashing utilities: SHA-256 over bytes and over canonical JSON (RFC 8785).
 */

import canonicalizeJson from 'canonicalize';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';

/** Canonical JSON (RFC 8785) */
export function canonicalize(obj: unknown): string {
  const result = canonicalizeJson(obj);
  if (result === undefined) {
    throw new Error('Failed to canonicalize object');
  }
  return result;
}

/** SHA-256 of raw bytes, hex encoded */
export function sha256Hex(data: Uint8Array): string {
  return bytesToHex(sha256(data));
}

/** SHA-256 of a UTF-8 string, hex encoded */
export function sha256HexOfText(text: string): string {
  return sha256Hex(utf8ToBytes(text));
}

/** Hash of several JSON values, each canonicalized and concatenated in order. */
export function hashCanonical(...values: unknown[]): string {
  return sha256HexOfText(values.map(canonicalize).join(''));
}

/** Structural equality through canonical JSON */
export function canonicalEquals(a: unknown, b: unknown): boolean {
  if (a === undefined || b === undefined) return a === b;
  return canonicalize(a) === canonicalize(b);
}
