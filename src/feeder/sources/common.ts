// page 与 json 信源共用：链接校验、列表字段补全与 RSS 合成

import { buildRssXml } from "../../feed/rss.js";
import type { PodcastChannelMeta, RssEntry } from "../../feed/types.js";
import type { FeedDescriptor, ItemDraft } from "../../feeds/types.js";
import { isBlank, normalizeText } from "../../resolver/normalize.js";
import type { SourceContext } from "../types.js";


/** 只接受绝对 http(s) 地址 */
export function isHttpUrl(link: string): boolean {
  if (!/^https?:\/\//i.test(link)) return false;
  try {
    new URL(link);
    return true;
  } catch {
    return false;
  }
}


/** 列表已给出标题与正文时不抓详情；播客 feed 仍登记缓存行，清理时才能级联删除媒体 */
export function listedItem(feed: FeedDescriptor, link: string, listed: ItemDraft, ctx: SourceContext): ItemDraft {
  const draft = { title: normalizeText(listed.title), content: normalizeText(listed.content), time: listed.time };
  if (feed.podcast) ctx.resolver.remember(feed, link, draft);
  return draft;
}


/** 只用详情结果填补列表中为空的字段；抓取失败的标记照样加在标题前 */
export async function fillGaps(feed: FeedDescriptor, link: string, listed: ItemDraft, ctx: SourceContext): Promise<ItemDraft> {
  const resolved = await ctx.resolver.resolve(feed, link, listed);
  return {
    title: isBlank(listed.title) ? resolved.title : (resolved.marker ?? "") + normalizeText(listed.title),
    content: isBlank(listed.content) ? resolved.content : normalizeText(listed.content),
    time: resolved.time,
  };
}


export function synthesizeRss(
  feed: FeedDescriptor,
  entries: RssEntry[],
  buildTime: number,
  podcast?: PodcastChannelMeta
): string {
  return buildRssXml(
    {
      title: feed.title ?? feed.name,
      link: feed.url,
      description: feed.description,
      language: feed.language,
      podcast,
      buildTime,
    },
    entries
  );
}
