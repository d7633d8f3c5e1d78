import { describe, it, expect } from 'vitest';
import { sanitizeText } from '../middleware/sanitize.js';

describe('sanitizeText', () => {
  it('removes script blocks and HTML tags', () => {
    expect(sanitizeText('What is <b>Azure</b> Monitor?<script>alert("x")</script>')).toBe('What is Azure Monitor?');
  });

  it('turns code and pre tags into backticks', () => {
    expect(sanitizeText('Run <code>az login</code> first')).toBe('Run `az login` first');
  });

  it('normalizes line endings, non-breaking spaces and blank runs', () => {
    expect(sanitizeText('  first line   \r\n\r\n\r\n\r\nsecond line  ')).toBe('first line\n\nsecond line');
  });

  it('returns an empty string when only markup remains', () => {
    expect(sanitizeText('<div></div>')).toBe('');
  });
});
