// JSON 接口：json.items 取条目数组，字段用点分路径或函数读取，详情可走单独的 jsonUrl

import type { RssEntry } from "../../feed/types.js";
import type { FetchResult } from "../../fetcher/types.js";
import { decodeBody } from "../../fetcher/encoding.js";
import { getPath } from "../../feeds/helpers.js";
import type { FeedDescriptor, ItemDraft, JsonFieldSelector, JsonSourceOptions } from "../../feeds/types.js";
import { logger, errMessage } from "../../logger/index.js";
import { isBlank } from "../../resolver/normalize.js";
import { mapBounded } from "../../utils/concurrency.js";
import { parseTime } from "../../utils/time.js";
import type { GenerateResult, SourceContext } from "../types.js";
import { fillGaps, isHttpUrl, listedItem, synthesizeRss } from "./common.js";
import { podcastChannel, podcastItem } from "./podcast.js";


function pick(item: unknown, selector: JsonFieldSelector<string | number> | undefined): unknown {
  if (selector == null) return undefined;
  return typeof selector === "string" ? getPath(item, selector) : selector(item);
}


function pickString(item: unknown, selector: JsonFieldSelector<string> | undefined): string {
  const v = pick(item, selector);
  if (typeof v === "string") return v.trim();
  if (typeof v === "number") return String(v);
  return "";
}


/** 数字视为 Unix 秒，字符串按日期解析；无法解析为 0 */
function pickTime(item: unknown, selector: JsonFieldSelector<string | number> | undefined): number {
  const v = pick(item, selector);
  if (typeof v === "number" && Number.isFinite(v)) return Math.floor(v);
  if (typeof v === "string") return parseTime(v) ?? 0;
  return 0;
}


function enumerate(options: JsonSourceOptions, data: unknown): unknown[] | string {
  try {
    const items = options.items(data);
    return Array.isArray(items) ? items : "json.items 未返回数组";
  } catch (err) {
    return `json.items 异常: ${errMessage(err)}`;
  }
}


export async function generateFromJson(feed: FeedDescriptor, res: FetchResult, ctx: SourceContext): Promise<GenerateResult> {
  const options = feed.json;
  if (!options) return { ok: false, reason: "缺少 json 配置" };
  let data: unknown;
  try {
    data = JSON.parse(decodeBody(res.body, res.contentType));
  } catch (err) {
    return { ok: false, reason: `JSON 解析失败: ${errMessage(err)}` };
  }
  const items = enumerate(options, data);
  if (typeof items === "string") return { ok: false, reason: items };
  if (items.length === 0) return { ok: false, reason: "未找到条目" };
  const now = ctx.now();
  const { podcast } = feed;

  const entries = await mapBounded(items, ctx.concurrency, async (item, index): Promise<RssEntry | null> => {
    const link = pickString(item, options.link);
    if (!isHttpUrl(link)) {
      logger.warn("feeder", "条目链接无效，已跳过", { feed: feed.name, index, link });
      return null;
    }
    const fallback: ItemDraft = {
      title: pickString(item, options.title),
      content: pickString(item, options.content),
      time: pickTime(item, options.time) || now,
    };
    const jsonUrl = pickString(item, options.jsonUrl) || undefined;
    // 绑定了详情接口或回调时总是取详情，由回调决定字段；否则只补列表中为空的字段
    let draft: ItemDraft;
    if (jsonUrl || options.itemTransform) draft = await ctx.resolver.resolve(feed, link, fallback, jsonUrl);
    else if (isBlank(fallback.title) || isBlank(fallback.content)) draft = await fillGaps(feed, link, fallback, ctx);
    else draft = listedItem(feed, link, fallback, ctx);
    const entry: RssEntry = { title: draft.title, link, description: draft.content, time: draft.time };
    if (!podcast) return entry;
    return { ...entry, ...(await podcastItem(feed, podcast, ctx.podcast, { kind: "json", link, item })) };
  });

  const channel = podcast
    ? await podcastChannel(feed, podcast, ctx.podcast, { kind: "json", url: feed.url, data })
    : undefined;
  const kept = entries.filter((e): e is RssEntry => e !== null);
  return { ok: true, xml: synthesizeRss(feed, kept, now, channel), itemCount: kept.length };
}
