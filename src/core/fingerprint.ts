/**
 * Content fingerprints
 * Deterministic normalization so that the same evidence always maps to the
 * same key, regardless of casing, punctuation, spacing or entry order.
 */

import { createHash } from 'crypto';

export interface FingerprintSource {
  actionText: string;
  resultText: string;
}

/**
 * Normalize free text for comparison
 *
 * 1. NFKC unicode normalization
 * 2. Lowercase conversion
 * 3. Punctuation removal (unicode aware)
 * 4. Whitespace collapse
 */
export function canonicalizeText(text: string): string {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function canonicalLine(source: FingerprintSource): string {
  return `${canonicalizeText(source.actionText)}\n${canonicalizeText(source.resultText)}`;
}

/**
 * Fingerprint a single piece of evidence.
 * Equal to `fingerprintEntries([source])`.
 */
export function fingerprintLine(source: FingerprintSource): string {
  return createHash('sha256').update(canonicalLine(source)).digest('hex');
}

/**
 * Fingerprint a group of activity entries.
 * Duplicate entries collapse and order is irrelevant.
 */
export function fingerprintEntries(sources: FingerprintSource[]): string {
  const lines = [...new Set(sources.map(canonicalLine))].sort();
  return createHash('sha256').update(lines.join('\n\n')).digest('hex');
}

export function isSameEvidence(a: FingerprintSource[], b: FingerprintSource[]): boolean {
  return fingerprintEntries(a) === fingerprintEntries(b);
}
