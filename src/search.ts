/**
 * Search URL generator
 *
 * Builds links into public search engines, sanctions lists and registries
 * for a subject's name. Nothing is fetched; only URLs are constructed.
 */

import type { SearchUrls } from './types.js';

type Template = (q: string) => string;

/**
 * Percent-encode everything outside the RFC 3986 unreserved set, keeping '/'.
 * Stricter than encodeURIComponent, which leaves !'()* alone.
 */
export function quote(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%2F/g, '/');
}

const google = (query: string) => `https://www.google.com/search?q=${quote(query)}`;

const CATEGORIES: Record<string, Record<string, Template>> = {
  linkedin: {
    people_search: (q) => `https://www.linkedin.com/search/results/people/?keywords=${quote(q)}`,
    google_public: (q) => google(`site:linkedin.com/in "${q}"`),
    iran_connection: (q) => google(`site:linkedin.com/in "${q}" (Iran OR Tehran OR IRGC)`),
  },
  sanctions: {
    ofac: (q) => `https://sanctionssearch.ofac.treas.gov/Details.aspx?id=${quote(q)}`,
    opensanctions: (q) => `https://www.opensanctions.org/search/?q=${quote(q)}`,
    uk_sanctions: (q) => `https://search-uk-sanctions-list.service.gov.uk/?searchTerm=${quote(q)}`,
    eu_sanctions: (q) => `https://www.sanctionsmap.eu/#/main?search=${quote(q)}`,
  },
  corporate: {
    opencorporates: (q) => `https://opencorporates.com/companies?q=${quote(q)}`,
    uk_companies: (q) =>
      `https://find-and-update.company-information.service.gov.uk/search?q=${quote(q)}`,
    icij_offshore: (q) => `https://offshoreleaks.icij.org/search?q=${quote(q)}`,
  },
  social_media: {
    twitter: (q) => `https://twitter.com/search?q=${quote(q)}&f=user`,
    instagram: (q) => google(`site:instagram.com "${q}"`),
    facebook: (q) => google(`site:facebook.com "${q}"`),
  },
  web_search: {
    google: (q) => google(q),
    google_news: (q) => `${google(q)}&tbm=nws`,
    duckduckgo: (q) => `https://duckduckgo.com/?q=${quote(q)}`,
  },
};

// Only emitted when a localized (Persian) spelling is supplied
const LOCALIZED: Record<string, Template> = {
  google: (q) => google(q),
  linkedin: (q) => `https://www.linkedin.com/search/results/people/?keywords=${quote(q)}`,
  twitter: (q) => `https://twitter.com/search?q=${quote(q)}`,
};

function render(templates: Record<string, Template>, query: string): Record<string, string> {
  return Object.fromEntries(
    Object.entries(templates).map(([label, template]) => [label, template(query)])
  );
}

export function generateSearchUrls(name: string, nameFa?: string): SearchUrls {
  const urls: SearchUrls = {};

  for (const [category, templates] of Object.entries(CATEGORIES)) {
    urls[category] = render(templates, name);
  }

  if (nameFa) {
    urls.persian = render(LOCALIZED, nameFa);
  }

  return urls;
}
