/**
 * Web Research Module
 */

export { DuckDuckGoSearch, normalizeResultLink } from './DuckDuckGoSearch.js';
export type { DuckDuckGoSearchOptions } from './DuckDuckGoSearch.js';
export { DEFAULT_MAX_RESULTS } from './types.js';
export type { WebSearchProvider } from './types.js';
