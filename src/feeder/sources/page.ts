// HTML 列表页：按 XPath 取条目，缺标题或正文时才去解析详情

import type { RssEntry } from "../../feed/types.js";
import type { FetchResult } from "../../fetcher/types.js";
import { decodeBody } from "../../fetcher/encoding.js";
import type { FeedDescriptor, ItemDraft } from "../../feeds/types.js";
import { logger } from "../../logger/index.js";
import { isBlank } from "../../resolver/normalize.js";
import { mapBounded } from "../../utils/concurrency.js";
import { parseTime } from "../../utils/time.js";
import type { GenerateResult, SourceContext } from "../types.js";
import { nodeHtml, nodeText, parseHtmlDocument, selectFirst, selectNodes } from "../xpath.js";
import { fillGaps, isHttpUrl, listedItem, synthesizeRss } from "./common.js";
import { podcastChannel, podcastItem } from "./podcast.js";


export async function generateFromPage(feed: FeedDescriptor, res: FetchResult, ctx: SourceContext): Promise<GenerateResult> {
  const dom = parseHtmlDocument(decodeBody(res.body, res.contentType), res.finalUrl || feed.url);
  const items = selectNodes(dom, feed.itemsXpath);
  if (items.length === 0) return { ok: false, reason: "未找到条目" };
  const now = ctx.now();
  const { podcast } = feed;

  const entries = await mapBounded(items, ctx.concurrency, async (node, index): Promise<RssEntry | null> => {
    const raw = nodeText(selectFirst(dom, feed.itemLinkXpath, node)).trim();
    const link = feed.itemLinkPrefix + raw;
    if (!raw || !isHttpUrl(link)) {
      logger.warn("feeder", "条目链接无效，已跳过", { feed: feed.name, index, link });
      return null;
    }
    const rawTime = feed.itemTimeXpath ? nodeText(selectFirst(dom, feed.itemTimeXpath, node)) : "";
    const listed: ItemDraft = {
      title: feed.itemTitleXpath ? nodeText(selectFirst(dom, feed.itemTitleXpath, node)).trim() : "",
      content: feed.itemContentXpath ? nodeHtml(selectFirst(dom, feed.itemContentXpath, node)).trim() : "",
      time: parseTime(rawTime) ?? now,
    };
    const draft = isBlank(listed.title) || isBlank(listed.content)
      ? await fillGaps(feed, link, listed, ctx)
      : listedItem(feed, link, listed, ctx);
    const entry: RssEntry = { title: draft.title, link, description: draft.content, time: draft.time };
    if (!podcast) return entry;
    return { ...entry, ...(await podcastItem(feed, podcast, ctx.podcast, { kind: "page", link, node })) };
  });

  const channel = podcast
    ? await podcastChannel(feed, podcast, ctx.podcast, { kind: "page", url: feed.url, document: dom.window.document })
    : undefined;
  const kept = entries.filter((e): e is RssEntry => e !== null);
  return { ok: true, xml: synthesizeRss(feed, kept, now, channel), itemCount: kept.length };
}
