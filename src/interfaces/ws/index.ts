export { default as liveFeed } from './live-feed.js';
export type { LiveFeedOptions } from './live-feed.js';
