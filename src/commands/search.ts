import { output } from '../cli/output.js';
import type { OutputOptions, SearchResult } from '../cli/types.js';
import { generateSearchUrls } from '../search.js';

export interface SearchOptions extends OutputOptions {
  fa?: string;
}

/**
 * Build search links for a name (pure, no store needed)
 */
export function doSearch(name: string, options: Omit<SearchOptions, keyof OutputOptions>): SearchResult {
  return {
    kind: 'search',
    name,
    nameFa: options.fa || null,
    urls: generateSearchUrls(name, options.fa),
  };
}

export function runSearch(name: string, options: SearchOptions): void {
  output(doSearch(name, options), options);
}
