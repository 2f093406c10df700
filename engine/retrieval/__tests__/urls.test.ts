import { describe, expect, it } from 'vitest';
import { cacheKeyFor, hostOf, normalizeResourceId, toAbsoluteUrl } from '../urls';

describe('normalizeResourceId', () => {
  it('drops fragments, default ports and tracking parameters and sorts the query', () => {
    expect(normalizeResourceId('HTTPS://Mag.Example.com:443/a/b?utm_source=x&b=2&fbclid=abc&a=1#frag')).toBe(
      'https://mag.example.com/a/b?a=1&b=2',
    );
  });

  it('maps equivalent identifiers to one value', () => {
    expect(normalizeResourceId(' https://mag.example.com/x?b=1&a=2 ')).toBe(
      normalizeResourceId('https://MAG.example.com/x?a=2&b=1#top'),
    );
  });

  it('keeps non-default ports', () => {
    expect(normalizeResourceId('http://mag.example.com:8080/a')).toBe('http://mag.example.com:8080/a');
  });

  it('rejects untrusted protocols and malformed input', () => {
    expect(() => normalizeResourceId('ftp://mag.example.com/file')).toThrow('Unsupported protocol: ftp:');
    expect(() => normalizeResourceId('not a url')).toThrow();
  });
});

describe('cacheKeyFor', () => {
  it('prefixes the normalized identifier with the render mode', () => {
    expect(cacheKeyFor('https://mag.example.com/a#x', 'static')).toBe('static:https://mag.example.com/a');
    expect(cacheKeyFor('https://mag.example.com/a', 'rendered')).toBe('rendered:https://mag.example.com/a');
  });
});

describe('hostOf / toAbsoluteUrl', () => {
  it('lowercases hosts and tolerates garbage', () => {
    expect(hostOf('https://WWW.Example.com/a')).toBe('www.example.com');
    expect(hostOf('::')).toBe('unknown');
  });

  it('resolves relative links against a base', () => {
    expect(toAbsoluteUrl('/magazine/2020', 'https://mag.example.com/x/y')).toBe('https://mag.example.com/magazine/2020');
    expect(toAbsoluteUrl('a', 'not a base')).toBeNull();
  });
});
