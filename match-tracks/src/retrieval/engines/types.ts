/**
 * Types for search-engine backends.
 */

/**
 * A single search hit.
 */
export interface EngineSearchResult {
  /** Title of the web page */
  title: string;
  /** URL of the result */
  url: string;
  /** Snippet/description of the result */
  description: string;
}

/**
 * Search request parameters.
 */
export interface EngineSearchRequest {
  /** Search query string, including any site filter */
  query: string;
  /** Maximum number of results to return */
  count?: number;
}
