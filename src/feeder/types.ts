// Feeder 依赖与返回类型

import type { Fetcher } from "../fetcher/types.js";
import type { PodcastResolver } from "../podcast/resolver.js";
import type { ContentResolver } from "../resolver/content.js";
import type { Clock } from "../utils/time.js";


export interface FeedAssemblerDeps {
  fetcher: Fetcher;
  resolver: ContentResolver;
  podcast: PodcastResolver;
  /** 条目并发解析数，默认 1 */
  itemConcurrency?: number;
  now?: Clock;
}


export type GenerateResult =
  | { ok: true; xml: string; itemCount: number }
  | { ok: false; reason: string };


/** 信源处理函数共用的上下文 */
export interface SourceContext {
  resolver: ContentResolver;
  podcast: PodcastResolver;
  concurrency: number;
  now: Clock;
}
