// 条目正文解析
export { ContentResolver, cacheKeyFor, FORBIDDEN_MARKER, FAILURE_MARKER } from "./content.js";
export type { ResolvedItem, ResolveStatus, ContentResolverDeps } from "./content.js";
export { normalizeText, isBlank, stripQuery } from "./normalize.js";
