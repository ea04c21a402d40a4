// Feeder：按信源类型生成 RSS
export { FeedAssembler, buildErrorRss } from "./feeder.js";
export type { FeedAssemblerDeps, GenerateResult } from "./types.js";
