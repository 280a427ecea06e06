export { GraphCrawler, detectRoot } from './graph.js';
export type { CrawlerConfig, CrawlResult, RootInfo } from './graph.js';
export { CrawlState } from './state.js';
