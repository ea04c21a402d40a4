// 播客：音频附件、封面与备用下载
export { PodcastResolver } from "./resolver.js";
export type { ResolvedEnclosure, PodcastResolverDeps, ImageSource } from "./resolver.js";
export { ExternalMediaTools, extensionForMime, normalizeMime, parseMediainfoDuration } from "./media.js";
export type { MediaTools } from "./media.js";
export { prepareCoverImage, PODCAST_IMAGE_MIN_SIZE, PODCAST_IMAGE_MAX_SIZE } from "./image.js";
export { downloadViaForm } from "./altDownload.js";
export type { FormDownloadOptions } from "./altDownload.js";
