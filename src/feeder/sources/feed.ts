// 已有 RSS/Atom：原地改写条目的标题与正文，其余结构保持不变

import type { FetchResult } from "../../fetcher/types.js";
import { decodeBody, rewriteXmlEncoding } from "../../fetcher/encoding.js";
import type { FeedDescriptor } from "../../feeds/types.js";
import { logger } from "../../logger/index.js";
import { mapBounded } from "../../utils/concurrency.js";
import type { GenerateResult, SourceContext } from "../types.js";
import { nodeText, parseXmlDocument, replaceContentCdata, selectFirst, selectNodes, serializeXml } from "../xpath.js";


export async function generateFromFeed(feed: FeedDescriptor, res: FetchResult, ctx: SourceContext): Promise<GenerateResult> {
  const xml = rewriteXmlEncoding(decodeBody(res.body, res.contentType));
  const dom = parseXmlDocument(xml);
  if (!dom) return { ok: false, reason: "无法解析 XML" };

  const ns = feed.xmlNamespaces;
  const items = selectNodes(dom, feed.itemsXpath, undefined, ns);
  if (items.length === 0) return { ok: false, reason: "未找到条目" };

  await mapBounded(items, ctx.concurrency, async (item, index) => {
    const link = nodeText(selectFirst(dom, feed.itemLinkXpath, item, ns)).trim();
    if (!link) {
      logger.warn("feeder", "条目缺少链接，原样保留", { feed: feed.name, index });
      return;
    }
    const titleNode = feed.itemTitleXpath ? selectFirst(dom, feed.itemTitleXpath, item, ns) : null;
    const contentNode = feed.itemContentXpath ? selectFirst(dom, feed.itemContentXpath, item, ns) : null;
    const fallback = { title: nodeText(titleNode), content: nodeText(contentNode), time: 0 };
    const resolved = await ctx.resolver.resolve(feed, link, fallback);
    if (titleNode && resolved.title !== fallback.title) replaceContentCdata(titleNode, resolved.title);
    if (contentNode && resolved.content !== fallback.content) replaceContentCdata(contentNode, resolved.content);
  });

  return { ok: true, xml: serializeXml(dom), itemCount: items.length };
}
