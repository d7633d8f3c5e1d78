import { describe, expect, it } from 'vitest';
import { isOriginAllowed, normalizeOrigin, parseAllowedOrigins } from '../config/cors.js';

describe('CORS allow list', () => {
  it('normalizes origins to lowercase scheme, host and port', () => {
    expect(normalizeOrigin(' HTTPS://Docs.Example.com/path ')).toBe('https://docs.example.com');
    expect(normalizeOrigin('http://localhost:5173/')).toBe('http://localhost:5173');
    expect(normalizeOrigin('Not A Url')).toBe('not a url');
  });

  it('parses a comma separated list without duplicates', () => {
    expect(parseAllowedOrigins('https://a.example.com/, https://A.example.com,,http://localhost:5173')).toEqual([
      'https://a.example.com',
      'http://localhost:5173'
    ]);
  });

  it('admits configured origins and requests without an origin', () => {
    expect(isOriginAllowed(undefined)).toBe(true);
    expect(isOriginAllowed('http://LOCALHOST:5173')).toBe(true);
  });

  it('rejects other loopback ports outside development', () => {
    expect(isOriginAllowed('http://localhost:3000')).toBe(false);
    expect(isOriginAllowed('https://evil.example.com')).toBe(false);
  });
});
