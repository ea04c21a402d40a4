// 条目正文解析：先查缓存，未命中则抓取 → 转码 → Readability → feed 回调 → 规整 → 落库
// 运行期任何失败都折算为 status=error 并带回兜底字段，不抛出

import type { ItemCache } from "../db/index.js";
import type { ContentExtractor, ExtractedArticle } from "../extractor/types.js";
import { decodeBody } from "../fetcher/encoding.js";
import type { Fetcher } from "../fetcher/types.js";
import type { FeedDescriptor, ItemDraft, ItemHookContext } from "../feeds/types.js";
import { logger, errMessage, type LogMeta } from "../logger/index.js";
import { isBlank, normalizeText, stripQuery } from "./normalize.js";


export type ResolveStatus = "cache" | "new" | "error";


export interface ResolvedItem extends ItemDraft {
  status: ResolveStatus;
  /** 抓取失败时加在标题前的标记 */
  marker?: string;
}


/** 访问被拒（403） */
export const FORBIDDEN_MARKER = "⛔️ ";


/** 其它抓取失败 */
export const FAILURE_MARKER = "⚠️ ";


interface DraftOutcome {
  draft: ItemDraft;
  /** 提取失败或回调抛错 */
  failed: boolean;
}


export interface ContentResolverDeps {
  cache: ItemCache;
  fetcher: Fetcher;
  extractor: ContentExtractor;
}


/** 缓存键：默认原样使用 URL，feed 开启 cacheKeyStripQuery 时去掉 query 与 hash */
export function cacheKeyFor(feed: FeedDescriptor, url: string): string {
  return feed.cacheKeyStripQuery ? stripQuery(url) : url;
}


/** 非空的兜底值优先于空结果 */
function applyFallback(draft: ItemDraft, fallback: ItemDraft, withTime: boolean): void {
  if (isBlank(draft.title)) draft.title = fallback.title;
  if (isBlank(draft.content)) draft.content = fallback.content;
  if (withTime && !draft.time) draft.time = fallback.time;
}


export class ContentResolver {
  constructor(private readonly deps: ContentResolverDeps) {}

  /**
   * 解析单个条目。
   * 命中缓存时刷新访问时间；未命中时抓取 jsonUrl ?? url，只有 status=new 才写缓存。
   */
  async resolve(feed: FeedDescriptor, url: string, fallback: ItemDraft, jsonUrl?: string): Promise<ResolvedItem> {
    const { cache, fetcher } = this.deps;
    const key = cacheKeyFor(feed, url);
    const meta = { feed: feed.name, item_url: url };

    const cached = cache.getArticle(feed.name, key);
    if (cached) {
      cache.touchArticle(feed.name, key);
      logger.debug("resolver", "命中缓存", meta);
      return { status: "cache", title: cached.title, content: cached.content, time: cached.time };
    }

    const target = jsonUrl ?? url;
    const res = await fetcher.fetch(target);
    if (res.statusCode !== 200) {
      logger.warn("resolver", "抓取条目失败", { ...meta, status: res.statusCode });
      const marker = res.statusCode === 403 ? FORBIDDEN_MARKER : FAILURE_MARKER;
      return { status: "error", marker, title: marker + fallback.title, content: fallback.content, time: fallback.time };
    }

    const ctx: ItemHookContext = { feed, url, fetcher };
    const { draft, failed } = feed.sourceKind === "json"
      ? await this.fromJson(res.body, fallback, ctx)
      : await this.fromHtml(decodeBody(res.body, res.contentType), res.finalUrl, fallback, ctx);
    applyFallback(draft, fallback, true);
    const title = normalizeText(draft.title);
    const content = normalizeText(draft.content);
    let status: ResolveStatus = failed ? "error" : "new";
    if (isBlank(title) && isBlank(content)) {
      logger.warn("resolver", "解析结果为空，不写缓存", meta);
      status = "error";
    }
    if (status === "new") {
      cache.putArticle(feed.name, key, { title, content, time: draft.time });
      logger.debug("resolver", "已写入缓存", meta);
    }
    return { status, title, content, time: draft.time };
  }

  /**
   * 列表已给出完整字段、无需抓详情的条目：只登记缓存行（已存在则刷新访问时间）。
   * 播客条目的音频与封面靠这一行参与过期清理。
   */
  remember(feed: FeedDescriptor, url: string, fields: ItemDraft): void {
    const { cache } = this.deps;
    const key = cacheKeyFor(feed, url);
    if (!cache.putArticle(feed.name, key, fields)) cache.touchArticle(feed.name, key);
  }

  /** HTML 详情页：Readability → 兜底 → itemTransform（回调拿到的 time 初始为 0） */
  private async fromHtml(body: string, finalUrl: string, fallback: ItemDraft, ctx: ItemHookContext): Promise<DraftOutcome> {
    const meta = { feed: ctx.feed.name, item_url: ctx.url };
    const draft: ItemDraft = { title: "", content: "", time: 0 };
    let failed = false;
    if (ctx.feed.readability) {
      const article = this.extract(body, finalUrl, meta);
      if (article) {
        draft.title = article.title;
        draft.content = article.content;
      } else {
        failed = true;
      }
    }
    applyFallback(draft, fallback, false);
    const transform = ctx.feed.itemTransform;
    if (transform && !(await this.runHook(() => transform(body, draft, ctx), meta))) failed = true;
    return { draft, failed };
  }

  /** JSON 详情：解析失败只记警告，兜底字段原样通过；成功则交给 json.itemTransform */
  private async fromJson(raw: Buffer, fallback: ItemDraft, ctx: ItemHookContext): Promise<DraftOutcome> {
    const meta = { feed: ctx.feed.name, item_url: ctx.url };
    const draft: ItemDraft = { ...fallback };
    let data: unknown;
    try {
      data = JSON.parse(raw.toString("utf-8"));
    } catch (err) {
      logger.warn("resolver", "条目 JSON 解析失败，保留原始字段", { ...meta, err: errMessage(err) });
      return { draft, failed: false };
    }
    const transform = ctx.feed.json?.itemTransform;
    if (transform && !(await this.runHook(() => transform(data, draft, ctx), meta))) {
      return { draft, failed: true };
    }
    return { draft, failed: false };
  }

  /** Readability 返回 null 或抛错均视为提取失败 */
  private extract(body: string, url: string, meta: LogMeta): ExtractedArticle | null {
    try {
      const article = this.deps.extractor.extract(body, url);
      if (!article) logger.warn("resolver", "Readability 未能提取正文", meta);
      return article;
    } catch (err) {
      logger.warn("resolver", "Readability 解析异常", { ...meta, err: errMessage(err) });
      return null;
    }
  }

  /** 执行 feed 回调；抛错时记警告并返回 false */
  private async runHook(hook: () => void | Promise<void>, meta: LogMeta): Promise<boolean> {
    try {
      await hook();
      return true;
    } catch (err) {
      logger.warn("resolver", "feed 回调异常", { ...meta, err: errMessage(err) });
      return false;
    }
  }
}
