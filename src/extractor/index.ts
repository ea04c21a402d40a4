// 正文提取：接口 + Readability 实现
export { ReadabilityExtractor } from "./readability.js";
export type { ContentExtractor, ExtractedArticle } from "./types.js";
