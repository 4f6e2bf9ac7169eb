export { WikipediaSource, parseExtract, pageUrl, sectionUrl, encodeTitle, BLACKLISTED_SECTIONS } from './wikipedia.js';
export type { WikipediaSourceOptions } from './wikipedia.js';
export type { Article, Section, SourceProvider } from './types.js';
