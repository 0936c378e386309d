import { describe, it, expect } from 'vitest';

import { canonicalizeText, canonicalLine, fingerprintEntries, fingerprintLine, isSameEvidence } from '../src/core/fingerprint.js';

describe('canonicalizeText', () => {
  it('lowercases, strips punctuation and collapses whitespace', () => {
    expect(canonicalizeText('  Helm  Rollback, FAILED!! ')).toBe('helm rollback failed');
  });

  it('splits punctuated tokens', () => {
    expect(canonicalizeText('CI/CD pipeline')).toBe('ci cd pipeline');
  });

  it('applies NFKC before comparison', () => {
    // Fullwidth letters fold to ASCII
    expect(canonicalizeText('ＨＥＬＭ')).toBe('helm');
  });
});

describe('fingerprintEntries', () => {
  const scale = { actionText: 'Scale deployment', resultText: 'ok' };
  const rollback = { actionText: 'rollback release', resultText: 'restored' };

  it('produces a sha256 hex digest', () => {
    expect(fingerprintEntries([scale])).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores entry order', () => {
    expect(fingerprintEntries([scale, rollback])).toBe(fingerprintEntries([rollback, scale]));
  });

  it('collapses duplicate evidence', () => {
    expect(fingerprintEntries([scale, scale, scale])).toBe(fingerprintEntries([scale]));
  });

  it('ignores casing and punctuation differences', () => {
    expect(isSameEvidence([scale], [{ actionText: 'scale   DEPLOYMENT.', resultText: 'OK!' }])).toBe(true);
  });

  it('distinguishes different content', () => {
    expect(isSameEvidence([scale], [rollback])).toBe(false);
  });

  it('keeps the action/result boundary', () => {
    const a = canonicalLine({ actionText: 'scale deployment', resultText: 'ok' });
    const b = canonicalLine({ actionText: 'scale', resultText: 'deployment ok' });
    expect(a).not.toBe(b);
  });
});

describe('fingerprintLine', () => {
  it('matches the fingerprint of a one-entry group', () => {
    const scale = { actionText: 'Scale deployment', resultText: 'ok' };
    expect(fingerprintLine(scale)).toBe(fingerprintEntries([scale]));
  });

  it('normalizes the same way as canonicalLine', () => {
    expect(fingerprintLine({ actionText: 'Scale deployment!', resultText: 'OK' }))
      .toBe(fingerprintLine({ actionText: 'scale deployment', resultText: 'ok' }));
  });
});
