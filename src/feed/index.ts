// RSS 2.0 生成
export { buildRssXml, escapeXml, cdata } from "./rss.js";
export type { RssChannel, RssEntry, RssEnclosure, PodcastChannelMeta } from "./types.js";
