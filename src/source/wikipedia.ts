/**
 * Wikipedia article source over the MediaWiki action API.
 *
 * Fetches the plain-text extract of a page with wiki-style section headings
 * (`== Heading ==`, `=== Sub ===`) and splits it into a lead section plus
 * one section per heading, in document order.
 */

import { z } from 'zod';
import type { Article, Section, SourceProvider } from './types.js';
import { InvalidInputError, SourceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('wikipedia');

/** Headings whose sections (and subsections) carry no article prose. */
export const BLACKLISTED_SECTIONS: ReadonlySet<string> = new Set([
  'references',
  'external links',
  'see also',
  'further reading',
  'notes',
  'sources',
  'bibliography',
]);

const HEADING = /^(={2,6})\s*(.+?)\s*\1\s*$/;

/** Response shape for `action=query&formatversion=2`. Unknown keys are ignored. */
const queryResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(
        z.object({
          title: z.string(),
          missing: z.boolean().optional(),
          invalid: z.boolean().optional(),
          extract: z.string().optional(),
        }),
      ),
    })
    .optional(),
  error: z.object({ code: z.string(), info: z.string() }).optional(),
});

type QueryPage = NonNullable<z.infer<typeof queryResponseSchema>['query']>['pages'][number];

export interface WikipediaSourceOptions {
  /** Language edition. Default: 'en'. */
  language?: string;
  userAgent?: string;
  /** Request timeout. Default: 15000. */
  timeoutMs?: number;
}

/**
 * URL-encode a path segment the way wiki links are written: every reserved
 * character escaped except `/`.
 */
export function encodeTitle(title: string): string {
  return encodeURIComponent(title.replace(/ /g, '_'))
    .replace(/%2F/g, '/')
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

export function pageUrl(title: string, language: string = 'en'): string {
  return `https://${language}.wikipedia.org/wiki/${encodeTitle(title)}`;
}

export function sectionUrl(url: string, title: string): string {
  return `${url}#${encodeTitle(title)}`;
}

function isBlacklisted(title: string): boolean {
  return BLACKLISTED_SECTIONS.has(title.trim().toLowerCase());
}

/**
 * Split a wiki-formatted plain-text extract into sections.
 *
 * The lead (text before the first heading) comes first when non-empty.
 * A blacklisted heading drops its own section and every deeper heading
 * nested under it. A heading that repeats gets the anchor MediaWiki gives
 * it (`Examples`, `Examples_2`, ...), so every section URL is distinct.
 */
export function parseExtract(extract: string, url: string): Section[] {
  const sections: Section[] = [];
  const lead: string[] = [];
  // Open headings from the outermost down to the current one.
  const stack: Array<{ level: number; skipped: boolean }> = [];
  let current: { title: string; anchor: string; lines: string[] } | null = null;
  // Occurrences per anchor, skipped headings included.
  const anchors = new Map<string, number>();

  const flush = (): void => {
    if (current) {
      sections.push({
        title: current.title,
        text: current.lines.join('\n').trim(),
        url: sectionUrl(url, current.anchor),
      });
      current = null;
    }
  };

  for (const line of extract.split('\n')) {
    const match = HEADING.exec(line);
    if (!match) {
      if (current) {
        current.lines.push(line);
      } else if (stack.length === 0) {
        lead.push(line);
      }
      continue;
    }

    flush();
    const level = match[1].length;
    const title = match[2];
    while (stack.length > 0 && stack[stack.length - 1].level >= level) {
      stack.pop();
    }
    const key = encodeTitle(title);
    const seen = (anchors.get(key) ?? 0) + 1;
    anchors.set(key, seen);
    const skipped = isBlacklisted(title) || stack.some((h) => h.skipped);
    stack.push({ level, skipped });
    if (!skipped) {
      current = { title, anchor: seen === 1 ? title : `${title}_${seen}`, lines: [] };
    }
  }
  flush();

  const leadText = lead.join('\n').trim();
  return leadText ? [{ title: null, text: leadText, url }, ...sections] : sections;
}

/**
 * Wikipedia implementation of SourceProvider.
 */
export class WikipediaSource implements SourceProvider {
  readonly kind = 'wikipedia';
  readonly language: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(options: WikipediaSourceOptions = {}) {
    this.language = options.language ?? 'en';
    this.userAgent = options.userAgent ?? 'lectern/0.1 (topic retrieval pipeline)';
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  get apiUrl(): string {
    return `https://${this.language}.wikipedia.org/w/api.php`;
  }

  async fetch(topic: string): Promise<Article> {
    const wanted = topic.trim();
    if (!wanted) {
      throw new InvalidInputError('topic must be a non-empty string', 'EMPTY_TOPIC');
    }

    let page = await this.queryPage(wanted);
    if (!page) {
      const alt = wanted.charAt(0).toUpperCase() + wanted.slice(1);
      if (alt !== wanted) {
        log.debug(`No page for "${wanted}", retrying as "${alt}"`);
        page = await this.queryPage(alt);
      }
    }
    if (!page) {
      throw new SourceError(`Wikipedia page not found for topic: "${wanted}"`, 'SOURCE_NOT_FOUND');
    }

    const url = pageUrl(page.title, this.language);
    const sections = parseExtract(page.extract ?? '', url);
    log.info(`Fetched "${page.title}"`, { sections: sections.length });
    return { title: page.title, url, sections };
  }

  /**
   * Look up one title. Returns null when the page does not exist.
   */
  private async queryPage(title: string): Promise<QueryPage | null> {
    const params = new URLSearchParams({
      action: 'query',
      format: 'json',
      formatversion: '2',
      prop: 'extracts|info',
      explaintext: '1',
      exsectionformat: 'wiki',
      redirects: '1',
      inprop: 'url',
      titles: title,
    });

    let body: unknown;
    try {
      const response = await fetch(`${this.apiUrl}?${params.toString()}`, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      throw new SourceError(
        `Wikipedia request failed for "${title}": ${errorMessage(error)}`,
        'SOURCE_FETCH_FAILED',
        error,
      );
    }

    const parsed = queryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SourceError(
        `Unexpected Wikipedia response for "${title}": ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        'SOURCE_FETCH_FAILED',
        parsed.error,
      );
    }
    if (parsed.data.error) {
      throw new SourceError(
        `Wikipedia API error for "${title}": ${parsed.data.error.info}`,
        'SOURCE_FETCH_FAILED',
      );
    }

    const page = parsed.data.query?.pages[0];
    if (!page || page.missing || page.invalid) {
      return null;
    }
    return page;
  }
}
