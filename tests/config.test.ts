import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { DEFAULT_CONFIG_PATH, loadConfig, parseConfig, resolveDatabasePath } from '../src/core/config.js';
import { ConfigurationError } from '../src/core/errors.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'knowledge-router-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads the shipped defaults', () => {
    const config = loadConfig(DEFAULT_CONFIG_PATH, {});

    expect(config.domains.map((d) => d.id)).toEqual(['kubernetes', 'infrastructure', 'security', 'ml', 'general']);
    expect(config.router.highConfidenceThreshold).toBe(0.75);
    expect(config.router.manualReviewDomainId).toBe('general');
    expect(config.consolidation.jobName).toBe('nightly-consolidation');
    expect(config.server.port).toBe(37888);
  });

  it('applies environment overrides', () => {
    const config = loadConfig(DEFAULT_CONFIG_PATH, {
      KNOWLEDGE_ROUTER_STORAGE: '/tmp/kr-test',
      PORT: '4100'
    });

    expect(config.storage.path).toBe('/tmp/kr-test');
    expect(config.server.port).toBe(4100);
    expect(resolveDatabasePath(config)).toBe(path.join('/tmp/kr-test', 'knowledge.sqlite'));
  });

  it('reads the path from KNOWLEDGE_ROUTER_CONFIG', () => {
    const file = path.join(tempDir, 'custom.json');
    fs.writeFileSync(file, JSON.stringify({ domains: [{ id: 'ops', name: 'Ops' }] }));

    const config = loadConfig(undefined, { KNOWLEDGE_ROUTER_CONFIG: file });
    expect(config.domains.map((d) => d.id)).toEqual(['ops']);
  });

  it('fails on a missing file', () => {
    expect(() => loadConfig(path.join(tempDir, 'missing.json'), {})).toThrow(ConfigurationError);
  });

  it('fails on malformed JSON', () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{ "domains": [');
    expect(() => loadConfig(file, {})).toThrow(/not valid JSON/);
  });

  it('fails when no domains are registered', () => {
    const file = path.join(tempDir, 'empty.json');
    fs.writeFileSync(file, JSON.stringify({ domains: [] }));
    expect(() => loadConfig(file, {})).toThrow('No domains registered');
  });
});

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig({ domains: [{ id: 'ops', name: 'Ops' }] });

    expect(config.domains[0].weights).toEqual({ primary: 3, secondary: 1, complexity: 0.5, priority: 0.5, category: 2 });
    expect(config.domains[0].primary).toEqual([]);
    expect(config.storage.dbFile).toBe('knowledge.sqlite');
    expect(config.consolidation.lockTtlMs).toBe(15 * 60 * 1000);
  });

  it('rejects duplicate domain ids', () => {
    expect(() => parseConfig({ domains: [{ id: 'ops', name: 'A' }, { id: 'ops', name: 'B' }] }))
      .toThrow('Duplicate domain id "ops"');
  });

  it('rejects malformed domain ids', () => {
    expect(() => parseConfig({ domains: [{ id: 'Bad Id', name: 'Bad' }] })).toThrow(/^Invalid configuration: domains\.0\.id/);
  });

  it('rejects blank keywords and trims the rest', () => {
    expect(() => parseConfig({ domains: [{ id: 'ops', name: 'Ops', primary: ['helm', '   '] }] }))
      .toThrow(/^Invalid configuration: domains\.0\.primary\.1/);
    expect(() => parseConfig({ domains: [{ id: 'ops', name: 'Ops' }], classifier: { indicators: { priority: ['\t'] } } }))
      .toThrow(/^Invalid configuration: classifier\.indicators\.priority\.0/);

    const config = parseConfig({ domains: [{ id: 'ops', name: 'Ops', secondary: ['  kubectl '] }] });
    expect(config.domains[0].secondary).toEqual(['kubectl']);
  });

  it('rejects inverted thresholds', () => {
    expect(() => parseConfig({
      router: { highConfidenceThreshold: 0.4, mediumConfidenceThreshold: 0.6 },
      domains: [{ id: 'ops', name: 'Ops' }]
    })).toThrow(ConfigurationError);
  });

  it('rejects references to unregistered domains', () => {
    expect(() => parseConfig({
      router: { manualReviewDomainId: 'triage' },
      domains: [{ id: 'ops', name: 'Ops' }]
    })).toThrow('router.manualReviewDomainId "triage" is not a registered domain');

    expect(() => parseConfig({
      consolidation: { fallbackDomainId: 'triage' },
      domains: [{ id: 'ops', name: 'Ops' }]
    })).toThrow('consolidation.fallbackDomainId "triage" is not a registered domain');
  });
});

describe('resolveDatabasePath', () => {
  it('expands the home directory', () => {
    const config = parseConfig({ storage: { path: '~/.kr' }, domains: [{ id: 'ops', name: 'Ops' }] });
    expect(resolveDatabasePath(config)).toBe(path.join(os.homedir(), '.kr', 'knowledge.sqlite'));
  });

  it('passes :memory: through', () => {
    const config = parseConfig({ storage: { path: ':memory:' }, domains: [{ id: 'ops', name: 'Ops' }] });
    expect(resolveDatabasePath(config)).toBe(':memory:');
  });
});
