// feed 定义：静态配置（FeedDefinition）与校验后的只读描述（FeedDescriptor）

import type { Fetcher } from "../fetcher/types.js";


/** 信源类型：feed 为已有 RSS/Atom，page 为 HTML 页面 + XPath，json 为 JSON 接口 */
export type SourceKind = "feed" | "page" | "json";


/** 回调可修改的条目字段；time 为 Unix 秒，0 表示未知 */
export interface ItemDraft {
  title: string;
  content: string;
  time: number;
}


/** 回调上下文 */
export interface ItemHookContext {
  feed: FeedDescriptor;
  /** 条目 URL */
  url: string;
  fetcher: Fetcher;
}


/** 详情页回调：拿到转码后的原始 HTML，可改写草稿中任意字段 */
export type ItemTransform = (body: string, draft: ItemDraft, ctx: ItemHookContext) => void | Promise<void>;


/** 从 JSON 响应中取出条目数组 */
export type JsonItemsEnumerator = (data: unknown) => unknown[];


/** JSON 详情回调：草稿初始值为列表中的原始字段 */
export type JsonItemTransform = (data: unknown, draft: ItemDraft, ctx: ItemHookContext) => void | Promise<void>;


/** JSON 字段：点分路径（如 "data.title"）或从条目取值的函数 */
export type JsonFieldSelector<T> = string | ((item: unknown) => T | null | undefined);


export interface JsonSourceOptions {
  items: JsonItemsEnumerator;
  link: JsonFieldSelector<string>;
  title?: JsonFieldSelector<string>;
  content?: JsonFieldSelector<string>;
  /** 日期字符串或 Unix 秒 */
  time?: JsonFieldSelector<string | number>;
  /** 条目详情使用的 JSON 接口，缺省时抓取 link */
  jsonUrl?: JsonFieldSelector<string>;
  itemTransform?: JsonItemTransform;
}


/** feed 级封面的上下文：page 为列表页文档，json 为列表响应 */
export type PodcastSourceContext =
  | { kind: "page"; url: string; document: Document }
  | { kind: "json"; url: string; data: unknown };


/** 条目级封面的上下文 */
export type PodcastItemContext =
  | { kind: "page"; link: string; node: Node }
  | { kind: "json"; link: string; item: unknown };


type MaybePromise<T> = T | Promise<T>;


/** 返回 feed 封面的原图 URL */
export type PodcastImageResolver = (ctx: PodcastSourceContext) => MaybePromise<string | null | undefined>;


/** 返回条目封面的原图 URL */
export type PodcastItemImageResolver = (ctx: PodcastItemContext) => MaybePromise<string | null | undefined>;


export interface EnclosureFallbackContext {
  feed: FeedDescriptor;
  /** 条目 URL */
  url: string;
  /** 需写入的目标文件（无扩展名） */
  destPath: string;
  fetcher: Fetcher;
}


/** 下载器失败后的备用下载，成功写入 destPath 时返回 true */
export type EnclosureFallbackDownloader = (ctx: EnclosureFallbackContext) => Promise<boolean>;


/** 输出前对整份 XML 的最后处理 */
export type FeedFinalizer = (xml: string) => string;


export interface PodcastOwner {
  name: string;
  email: string;
}


export interface PodcastDefinition {
  image?: PodcastImageResolver;
  itemImage?: PodcastItemImageResolver;
  enclosureFallback?: EnclosureFallbackDownloader;
  category?: string;
  author?: string;
  owner?: PodcastOwner;
  /** itunes:block，默认 true（不进入公开目录） */
  block?: boolean;
  explicit?: boolean;
}


export interface PodcastOptions extends PodcastDefinition {
  block: boolean;
  explicit: boolean;
}


/** feeds/*.feed.ts 默认导出的对象 */
export interface FeedDefinition {
  /** 缺省为文件名（去掉 .feed.ts） */
  name?: string;
  sourceKind?: SourceKind;
  url: string;
  title?: string;
  description?: string;
  language?: string;
  itemsXpath?: string;
  itemLinkXpath?: string;
  itemLinkPrefix?: string;
  itemTitleXpath?: string;
  itemContentXpath?: string;
  itemTimeXpath?: string;
  json?: JsonSourceOptions;
  itemTransform?: ItemTransform;
  readability?: boolean;
  /** 缓存保留秒数，默认 7 天 */
  cacheLimit?: number;
  /** 缓存键是否去掉 query 与 hash */
  cacheKeyStripQuery?: boolean;
  xmlNamespaces?: Record<string, string>;
  finalize?: FeedFinalizer;
  podcast?: PodcastDefinition;
}


/** 校验并补全默认值后的只读描述 */
export interface FeedDescriptor {
  readonly name: string;
  readonly sourceKind: SourceKind;
  readonly url: string;
  readonly title: string | null;
  readonly description: string;
  readonly language: string;
  readonly itemsXpath: string;
  readonly itemLinkXpath: string;
  readonly itemLinkPrefix: string;
  readonly itemTitleXpath: string | null;
  readonly itemContentXpath: string | null;
  readonly itemTimeXpath: string | null;
  readonly json: JsonSourceOptions | null;
  readonly itemTransform: ItemTransform | null;
  readonly readability: boolean;
  readonly cacheLimit: number;
  readonly cacheKeyStripQuery: boolean;
  readonly xmlNamespaces: Readonly<Record<string, string>>;
  readonly finalize: FeedFinalizer | null;
  readonly podcast: PodcastOptions | null;
}
