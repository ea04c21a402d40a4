// feed 定义：类型、校验、加载与回调辅助函数
export { createFeedDescriptor, defineFeed, DEFAULT_CACHE_LIMIT } from "./schema.js";
export { loadFeedDefinitions } from "./loader.js";
export { FeedConfigError, FeedNotFoundError } from "./errors.js";
export { cleanLink, detectPaywall, getPath, PAYWALL_MARKER } from "./helpers.js";
export { parseHtmlDocument, parseXmlDocument, selectNodes, selectFirst, nodeText, nodeHtml } from "../feeder/xpath.js";
export { purifyHtml } from "../fetcher/purify.js";
export type { PurifyOptions } from "../fetcher/purify.js";
export { downloadViaForm } from "../podcast/altDownload.js";
export type * from "./types.js";
