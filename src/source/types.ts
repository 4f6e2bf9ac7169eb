/**
 * Types for topic sources.
 *
 * @module source/types
 */

/**
 * One section of a fetched article, in document order.
 */
export interface Section {
  /** Heading text; null for the lead section. */
  title: string | null;
  /** Plain text of the section body (subsections excluded). */
  text: string;
  /** Page URL, with a `#anchor` for non-lead sections. */
  url: string;
}

export interface Article {
  /** Canonical page title after redirects. */
  title: string;
  url: string;
  sections: Section[];
}

/**
 * Resolves a topic name to an article.
 */
export interface SourceProvider {
  /** Source kind recorded on retrieved chunks. */
  readonly kind: 'wikipedia';
  fetch(topic: string): Promise<Article>;
}
