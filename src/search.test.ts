import { describe, expect, it } from 'vitest';
import { generateSearchUrls, quote } from './search.js';

describe('search', () => {
  describe('quote', () => {
    it('should encode spaces and reserved characters', () => {
      expect(quote('Jane Doe')).toBe('Jane%20Doe');
      expect(quote('a&b=c')).toBe('a%26b%3Dc');
      expect(quote("it's (x)*!")).toBe('it%27s%20%28x%29%2A%21');
    });

    it('should keep slashes and unreserved characters', () => {
      expect(quote('site:linkedin.com/in')).toBe('site%3Alinkedin.com/in');
      expect(quote('a-b_c.d~e')).toBe('a-b_c.d~e');
    });

    it('should encode non-latin text as UTF-8', () => {
      expect(quote('علی')).toBe('%D8%B9%D9%84%DB%8C');
    });
  });

  describe('generateSearchUrls', () => {
    it('should cover every category with the encoded name', () => {
      const urls = generateSearchUrls('Ali Khamenei');

      expect(Object.keys(urls)).toEqual([
        'linkedin',
        'sanctions',
        'corporate',
        'social_media',
        'web_search',
      ]);

      for (const links of Object.values(urls)) {
        const values = Object.values(links);
        expect(values.length).toBeGreaterThan(0);
        for (const url of values) {
          expect(url).toContain('Ali%20Khamenei');
        }
      }
    });

    it('should build exact urls', () => {
      const urls = generateSearchUrls('Jane Doe');

      expect(urls.web_search).toEqual({
        google: 'https://www.google.com/search?q=Jane%20Doe',
        google_news: 'https://www.google.com/search?q=Jane%20Doe&tbm=nws',
        duckduckgo: 'https://duckduckgo.com/?q=Jane%20Doe',
      });
      expect(urls.linkedin.google_public).toBe(
        'https://www.google.com/search?q=site%3Alinkedin.com/in%20%22Jane%20Doe%22'
      );
      expect(urls.social_media.twitter).toBe('https://twitter.com/search?q=Jane%20Doe&f=user');
    });

    it('should add a persian category only for a localized name', () => {
      expect(generateSearchUrls('Jane Doe')).not.toHaveProperty('persian');
      expect(generateSearchUrls('Jane Doe', '')).not.toHaveProperty('persian');

      const urls = generateSearchUrls('Jane Doe', 'علی');
      expect(urls.persian).toEqual({
        google: 'https://www.google.com/search?q=%D8%B9%D9%84%DB%8C',
        linkedin: 'https://www.linkedin.com/search/results/people/?keywords=%D8%B9%D9%84%DB%8C',
        twitter: 'https://twitter.com/search?q=%D8%B9%D9%84%DB%8C',
      });
    });

    it('should be deterministic', () => {
      expect(generateSearchUrls('Jane Doe', 'علی')).toEqual(generateSearchUrls('Jane Doe', 'علی'));
    });
  });
});
