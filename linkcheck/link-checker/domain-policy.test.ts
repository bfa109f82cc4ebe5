import { describe, it, expect } from 'vitest';
import { classifyDomain, createDomainPolicy, normalizeDomain, getHostname } from './domain-policy.ts';

const policy = createDomainPolicy(
  ['wikipedia.org', 'ko-fi.com'],
  ['local.example.com', 'defunct.site'],
);

describe('classifyDomain', () => {
  // ── Skip ────────────────────────────────────────────────────────────────────

  it('wikipedia.org → skip', () => {
    expect(classifyDomain('https://wikipedia.org/wiki/Foo', policy)).toBe('skip');
  });

  it('en.wikipedia.org → skip (subdomain)', () => {
    expect(classifyDomain('https://en.wikipedia.org/wiki/Foo', policy)).toBe('skip');
  });

  it('host comparison is case-insensitive', () => {
    expect(classifyDomain('https://KO-FI.com/someone', policy)).toBe('skip');
  });

  // ── Auto-broken ─────────────────────────────────────────────────────────────

  it('exact auto-broken host → auto-broken', () => {
    expect(classifyDomain('http://local.example.com/page', policy)).toBe('auto-broken');
  });

  it('subdomain of auto-broken host → auto-broken', () => {
    expect(classifyDomain('https://www.defunct.site/', policy)).toBe('auto-broken');
  });

  it('auto-broken wins when a host is in both lists', () => {
    const both = createDomainPolicy(['example.org'], ['example.org']);
    expect(classifyDomain('https://example.org/', both)).toBe('auto-broken');
  });

  // ── No match ────────────────────────────────────────────────────────────────

  it('suffix without a dot boundary does not match', () => {
    expect(classifyDomain('https://notwikipedia.org/', policy)).toBe('none');
  });

  it('parent of a listed domain does not match', () => {
    expect(classifyDomain('https://example.com/', policy)).toBe('none');
  });

  it('invalid URL falls through to none', () => {
    expect(classifyDomain('not-a-url', policy)).toBe('none');
  });

  it('empty policy matches nothing', () => {
    expect(classifyDomain('https://wikipedia.org/', createDomainPolicy())).toBe('none');
  });
});

describe('normalizeDomain', () => {
  it('strips scheme, path, wildcard and case', () => {
    expect(normalizeDomain(' https://Sub.Example.com/path?q=1 ')).toBe('sub.example.com');
    expect(normalizeDomain('*.example.com')).toBe('example.com');
    expect(normalizeDomain('example.com.')).toBe('example.com');
  });

  it('drops blank entries when building a policy', () => {
    const p = createDomainPolicy(['', '  ', 'A.com']);
    expect([...p.skip]).toEqual(['a.com']);
  });
});

describe('getHostname', () => {
  it('returns null for unparsable input', () => {
    expect(getHostname('::::')).toBeNull();
    expect(getHostname('https://Example.COM:8080/x')).toBe('example.com');
  });
});
